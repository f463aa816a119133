import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@docindex/types";
import { classifyUpstreamError, withRetry } from "@docindex/errors";
import type { RetryOptions } from "@docindex/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

type InputType = "search_document" | "search_query";

interface CohereEmbedResponse {
  embeddings: { float?: number[][] };
  meta?: { billedUnits?: { inputTokens?: number } };
}

/** The slice of the Cohere v2 client this provider calls. */
export interface CohereEmbedApi {
  embed(request: {
    texts: string[];
    model: string;
    inputType: InputType;
    embeddingTypes: "float"[];
  }): PromiseLike<CohereEmbedResponse>;
}

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  retry?: RetryOptions;
  client?: CohereEmbedApi;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private readonly api: CohereEmbedApi;
  private readonly model: string;
  private readonly retry?: RetryOptions;

  constructor(config: CohereProviderConfig) {
    this.api = config.client ?? new CohereClient({ token: config.apiKey }).v2;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.retry = config.retry;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedAll([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedAll(texts, "search_document");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async embedAll(texts: string[], inputType: InputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await withRetry(async () => {
        try {
          return await this.api.embed({
            texts: batch,
            model: this.model,
            inputType,
            embeddingTypes: ["float"],
          });
        } catch (error: unknown) {
          throw classifyUpstreamError(this.name, error);
        }
      }, this.retry);

      const vectors = response.embeddings.float ?? [];
      if (vectors.length !== batch.length) {
        throw classifyUpstreamError(
          this.name,
          new Error(`Expected ${String(batch.length)} embeddings, received ${String(vectors.length)}`),
        );
      }
      allEmbeddings.push(...vectors);

      // Use actual tokensUsed from Cohere response for billing accuracy
      totalTokens += response.meta?.billedUnits?.inputTokens ?? 0;
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
