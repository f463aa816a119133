import type { Chunk, IndexingStats, NormalizedDocument, VectorRecord } from "@docindex/types";
import type { DocumentChunker } from "@docindex/chunker";
import type { IEmbeddingProvider } from "@docindex/embeddings";
import type { CollectionStats, VectorIndex } from "@docindex/vector-store";
import { CancelledError, ExternalServiceError } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import { chunkPayload } from "./payload.js";

export interface IndexerOptions {
  chunker: DocumentChunker;
  embeddings: IEmbeddingProvider;
  index: VectorIndex;
  logger: Logger;
  batchSize?: number;
  /** Pause between consecutive batches, to stay under provider rate limits. */
  batchDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface IndexAllOptions {
  maxDocuments?: number;
  signal?: AbortSignal;
  onProgress?: (processed: number, stats: IndexingStats) => void;
}

interface DocumentOutcome {
  chunks: number;
  vectors: number;
  tokens: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Write path: chunk -> batch embed -> upsert. Chunk ids are content
 * addressed, so re-indexing an unchanged document overwrites its records.
 */
export class Indexer {
  private readonly chunker: DocumentChunker;
  private readonly embeddings: IEmbeddingProvider;
  private readonly index: VectorIndex;
  private readonly logger: Logger;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: IndexerOptions) {
    this.chunker = options.chunker;
    this.embeddings = options.embeddings;
    this.index = options.index;
    this.logger = options.logger;
    this.batchSize = options.batchSize ?? 100;
    this.batchDelayMs = options.batchDelayMs ?? 100;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Index one document and return the number of vectors written. */
  async indexDocument(document: NormalizedDocument): Promise<number> {
    const outcome = await this.process(document);
    return outcome.vectors;
  }

  /**
   * Index every document. A failing document is logged and counted and the
   * run moves on; only cancellation stops it early.
   */
  async indexAll(
    documents: Iterable<NormalizedDocument> | AsyncIterable<NormalizedDocument>,
    options: IndexAllOptions = {},
  ): Promise<IndexingStats> {
    const started = Date.now();
    const stats: IndexingStats = {
      documentsProcessed: 0,
      chunksCreated: 0,
      vectorsUpserted: 0,
      errors: 0,
      totalTokens: 0,
      durationMs: 0,
    };

    for await (const document of documents) {
      if (options.maxDocuments !== undefined && stats.documentsProcessed >= options.maxDocuments) {
        break;
      }
      if (options.signal?.aborted) {
        throw new CancelledError("Indexing cancelled", { details: { ...stats } });
      }

      try {
        const outcome = await this.process(document);
        stats.chunksCreated += outcome.chunks;
        stats.vectorsUpserted += outcome.vectors;
        stats.totalTokens += outcome.tokens;
      } catch (error: unknown) {
        stats.errors++;
        this.logger.error({ err: error, sourceId: document.sourceId }, "Failed to index document");
      }
      stats.documentsProcessed++;
      options.onProgress?.(stats.documentsProcessed, stats);
    }

    stats.durationMs = Date.now() - started;
    this.logger.info({ ...stats }, "Indexing run finished");
    return stats;
  }

  async deleteAll(): Promise<void> {
    await this.index.deleteAll();
    this.logger.warn({ collection: this.index.collectionName }, "Deleted all vectors");
  }

  stats(): Promise<CollectionStats> {
    return this.index.stats();
  }

  private async process(document: NormalizedDocument): Promise<DocumentOutcome> {
    const chunks = this.chunker.chunk(document);
    const outcome: DocumentOutcome = { chunks: chunks.length, vectors: 0, tokens: 0 };

    for (let i = 0; i < chunks.length; i += this.batchSize) {
      if (i > 0 && this.batchDelayMs > 0) {
        await this.sleep(this.batchDelayMs);
      }
      const batch = chunks.slice(i, i + this.batchSize);
      const { records, tokens } = await this.embedBatch(batch);
      await this.index.upsert(records);
      outcome.vectors += records.length;
      outcome.tokens += tokens;
      this.logger.debug(
        { sourceId: document.sourceId, batch: i / this.batchSize + 1, vectors: records.length },
        "Upserted batch",
      );
    }

    return outcome;
  }

  private async embedBatch(batch: Chunk[]): Promise<{ records: VectorRecord[]; tokens: number }> {
    const result = await this.embeddings.batchEmbed(batch.map((chunk) => chunk.text));

    const records = batch.map((chunk, position) => {
      const vector = result.embeddings[position];
      if (!vector) {
        throw new ExternalServiceError(
          `Embedding missing for chunk ${String(position)} of ${String(batch.length)}`,
          this.embeddings.name,
          { retryable: false },
        );
      }
      return { id: chunk.id, vector, payload: chunkPayload(chunk) };
    });

    return { records, tokens: result.tokensUsed };
  }
}
