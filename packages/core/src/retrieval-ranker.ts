import pLimit from "p-limit";
import type { MetadataFilter, ScoreBoostPolicy, SearchResult } from "@docindex/types";
import type { IEmbeddingProvider } from "@docindex/embeddings";
import { VectorIndex } from "@docindex/vector-store";
import type { VectorMatch } from "@docindex/vector-store";
import type { ICompletionProvider } from "@docindex/llm";
import { ExternalServiceError } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import { readSourceType, readString } from "./payload.js";
import { validateFilter } from "./filter-validator.js";

export const SUMMARY_UNAVAILABLE = "Summary unavailable";

/**
 * Re-ranking bias toward denser source kinds. A tunable policy, not a
 * calibrated value.
 */
export const DEFAULT_BOOSTS: ScoreBoostPolicy = {
  doc: 1.0,
  code: 1.3,
  research: 1.25,
  web: 1.1,
};

const MAX_SCORE = 1.0;

const SUMMARY_SYSTEM_PROMPT =
  "You summarize documentation excerpts. Answer in two or three sentences, focusing on what is relevant to the user's query.";

export interface RankOptions {
  topK?: number;
  filter?: MetadataFilter;
  includeSummaries?: boolean;
  maxSummaries?: number;
}

export interface RetrievalRankerOptions {
  embeddings: IEmbeddingProvider;
  logger: Logger;
  boosts?: ScoreBoostPolicy;
  /** `null` disables summaries regardless of `includeSummaries`. */
  summarizer?: ICompletionProvider | null;
  summaryConcurrency?: number;
  maxSummaries?: number;
}

export class RetrievalRanker {
  private readonly embeddings: IEmbeddingProvider;
  private readonly logger: Logger;
  private readonly boosts: ScoreBoostPolicy;
  private readonly summarizer: ICompletionProvider | null;
  private readonly summaryConcurrency: number;
  private readonly maxSummaries: number;

  constructor(options: RetrievalRankerOptions) {
    this.embeddings = options.embeddings;
    this.logger = options.logger;
    this.boosts = options.boosts ?? DEFAULT_BOOSTS;
    this.summarizer = options.summarizer ?? null;
    this.summaryConcurrency = options.summaryConcurrency ?? 5;
    this.maxSummaries = options.maxSummaries ?? 5;
  }

  /**
   * Embed once, query every index, boost, merge and truncate globally.
   * Several indexes make a composite search.
   */
  async rank(
    indexes: VectorIndex | readonly VectorIndex[],
    query: string,
    options: RankOptions = {},
  ): Promise<SearchResult[]> {
    const topK = options.topK ?? 10;
    if (options.filter) {
      validateFilter(options.filter);
    }

    const vector = await this.embedQuery(query);
    const targets = indexes instanceof VectorIndex ? [indexes] : indexes;
    const perIndex = await Promise.all(
      targets.map((index) => index.query({ vector, topK, filter: options.filter })),
    );

    const results = this.merge(perIndex.flat(), topK);

    if (options.includeSummaries) {
      await this.summarize(query, results, options.maxSummaries ?? this.maxSummaries);
    }
    return results;
  }

  /**
   * Neighbours of a stored chunk, boosted like any other search. The chunk
   * itself is left out; an unknown id gives no results.
   */
  async similarTo(index: VectorIndex, chunkId: string, topK = 5): Promise<SearchResult[]> {
    const [record] = await index.fetch([chunkId]);
    if (!record || record.vector.length === 0) {
      return [];
    }
    const matches = await index.query({ vector: record.vector, topK: topK + 1 });
    return this.merge(
      matches.filter((match) => match.id !== chunkId),
      topK,
    );
  }

  /** Boosted score, clamped to the maximum similarity. */
  boost(rawScore: number, sourceType: SearchResult["sourceType"]): number {
    return Math.min(rawScore * this.boosts[sourceType], MAX_SCORE);
  }

  private async embedQuery(query: string): Promise<number[]> {
    const result = await this.embeddings.embed(query);
    const vector = result.embeddings[0];
    if (!vector) {
      throw new ExternalServiceError("Failed to generate embedding for query", this.embeddings.name, {
        retryable: false,
      });
    }
    return vector;
  }

  private merge(matches: VectorMatch[], topK: number): SearchResult[] {
    return matches
      .map((match) => this.toResult(match))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  private toResult(match: VectorMatch): SearchResult {
    const { payload } = match;
    const sourceType = readSourceType(payload);
    const url = readString(payload, "url");
    const title = readString(payload, "title");

    return {
      chunkId: match.id,
      score: this.boost(match.score, sourceType),
      rawScore: match.score,
      text: readString(payload, "text"),
      sourceFile: readString(payload, "sourceFile"),
      docCategory: readString(payload, "docCategory"),
      objectType: readString(payload, "objectType"),
      sourceType,
      ...(url ? { url } : {}),
      ...(title ? { title } : {}),
      metadata: payload,
    };
  }

  private async summarize(query: string, results: SearchResult[], maxSummaries: number): Promise<void> {
    const summarizer = this.summarizer;
    if (!summarizer) {
      return;
    }

    const limit = pLimit(this.summaryConcurrency);
    // Each task writes only to its own result
    await Promise.all(
      results.slice(0, Math.max(0, maxSummaries)).map((result) =>
        limit(async () => {
          try {
            const completion = await summarizer.complete(
              SUMMARY_SYSTEM_PROMPT,
              `Query: ${query}\n\nExcerpt from ${result.sourceFile}:\n${result.text}`,
              { maxTokens: 200 },
            );
            result.summary = completion.text.trim();
          } catch (error: unknown) {
            this.logger.warn({ err: error, chunkId: result.chunkId }, "Summarization failed");
            result.summary = SUMMARY_UNAVAILABLE;
          }
        }),
      ),
    );
  }
}
