import OpenAI from "openai";
import type { EmbeddingResult } from "@docindex/types";
import { ExternalServiceError, classifyUpstreamError, withRetry } from "@docindex/errors";
import type { RetryOptions } from "@docindex/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;
const BATCH_SIZE = 2048; // OpenAI input limit per request

/** The slice of the OpenAI client this provider calls. */
export interface OpenAIEmbeddingsApi {
  create(body: OpenAI.EmbeddingCreateParams): PromiseLike<OpenAI.CreateEmbeddingResponse>;
}

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  retry?: RetryOptions;
  /** Replaces the SDK client, e.g. with a stub. */
  client?: OpenAIEmbeddingsApi;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly dimensions: number;
  private readonly api: OpenAIEmbeddingsApi;
  private readonly model: string;
  private readonly retry?: RetryOptions;

  constructor(config: OpenAIProviderConfig) {
    this.api = config.client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }).embeddings;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.retry = config.retry;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      const response = await withRetry(() => this.request(batch), this.retry);

      if (response.data.length !== batch.length) {
        throw new ExternalServiceError(
          `Expected ${String(batch.length)} embeddings, received ${String(response.data.length)}`,
          this.name,
          { retryable: false },
        );
      }

      // The API reports each vector's input position; never trust arrival order
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      allEmbeddings.push(...ordered.map((item) => item.embedding));
      totalTokens += response.usage.prompt_tokens;
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async request(input: string[]): Promise<OpenAI.CreateEmbeddingResponse> {
    try {
      return await this.api.create({
        model: this.model,
        input,
        encoding_format: "float",
        ...(this.model.startsWith("text-embedding-3") ? { dimensions: this.dimensions } : {}),
      });
    } catch (error: unknown) {
      throw classifyUpstreamError(this.name, error);
    }
  }
}
