import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import type { MetadataFilter, Payload, SimilarityMetric, VectorRecord } from "@docindex/types";
import { ExternalServiceError, classifyUpstreamError, withRetry } from "@docindex/errors";
import type { RetryOptions } from "@docindex/errors";
import type {
  CollectionSettings,
  CollectionStats,
  IVectorStore,
  VectorMatch,
  VectorQuery,
} from "./vector-store.interface.js";
import { flattenFilter } from "./filter.js";
import { isNumberArray, toPayload } from "./payload.js";

const BATCH_SIZE = 100;
const RECORD_ID_KEY = "recordId";
const INDEXED_FIELDS = ["sourceType", "docCategory", "objectType", "url"] as const;

type QdrantDistance = "Cosine" | "Dot" | "Euclid";

const DISTANCES: Record<SimilarityMetric, QdrantDistance> = {
  cosine: "Cosine",
  dot: "Dot",
  euclidean: "Euclid",
};

interface QdrantCondition {
  key: string;
  match: { value: string | number | boolean };
}

interface QdrantFilter {
  must?: QdrantCondition[];
  must_not?: QdrantCondition[];
}

interface QdrantPoint {
  id: string | number;
  payload?: Record<string, unknown> | null;
  vector?: unknown;
}

/** The slice of `QdrantClient` this adapter calls. */
export interface QdrantApi {
  getCollections(): Promise<{ collections: { name: string }[] }>;
  getCollection(collectionName: string): Promise<{
    status: string;
    points_count?: number | null;
    config: { params: { vectors?: unknown } };
  }>;
  createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: QdrantDistance } },
  ): Promise<unknown>;
  createPayloadIndex(
    collectionName: string,
    args: { field_name: string; field_schema: "keyword"; wait?: boolean },
  ): Promise<unknown>;
  deleteCollection(collectionName: string): Promise<unknown>;
  upsert(
    collectionName: string,
    args: {
      wait?: boolean;
      points: { id: string; vector: number[]; payload: Record<string, unknown> }[];
    },
  ): Promise<unknown>;
  search(
    collectionName: string,
    args: { vector: number[]; limit: number; filter?: QdrantFilter; with_payload?: boolean },
  ): Promise<(QdrantPoint & { score: number })[]>;
  retrieve(
    collectionName: string,
    args: { ids: string[]; with_payload?: boolean; with_vector?: boolean },
  ): Promise<QdrantPoint[]>;
}

export interface QdrantStoreConfig {
  url: string;
  apiKey?: string;
  retry?: RetryOptions;
  /** How long `ensureCollection` waits for a new collection to turn green. */
  readyTimeoutMs?: number;
  pollIntervalMs?: number;
  client?: QdrantApi;
  sleep?: (ms: number) => Promise<void>;
}

const HEX_ID = /^[0-9a-f]{32}$/;

/**
 * Qdrant only accepts unsigned integers or UUIDs as point ids. Chunk ids are
 * 32 hex chars and map onto a UUID directly; anything else is hashed first.
 */
export function toPointId(recordId: string): string {
  const hex = HEX_ID.test(recordId)
    ? recordId
    : createHash("sha256").update(recordId).digest("hex").slice(0, 32);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

export function toQdrantFilter(filter: MetadataFilter | undefined): QdrantFilter | undefined {
  if (!filter) {
    return undefined;
  }
  const must: QdrantCondition[] = [];
  const mustNot: QdrantCondition[] = [];
  for (const predicate of flattenFilter(filter)) {
    const condition = { key: predicate.field, match: { value: predicate.value } };
    (predicate.op === "eq" ? must : mustNot).push(condition);
  }
  if (must.length === 0 && mustNot.length === 0) {
    return undefined;
  }
  return {
    ...(must.length > 0 ? { must } : {}),
    ...(mustNot.length > 0 ? { must_not: mustNot } : {}),
  };
}

function readVectorSize(vectors: unknown): number {
  if (typeof vectors === "object" && vectors !== null && "size" in vectors) {
    return typeof vectors.size === "number" ? vectors.size : 0;
  }
  return 0;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class QdrantVectorStore implements IVectorStore {
  readonly name = "qdrant";
  private readonly client: QdrantApi;
  private readonly retry?: RetryOptions;
  private readonly readyTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: QdrantStoreConfig) {
    this.client =
      config.client ??
      new QdrantClient({ url: config.url, apiKey: config.apiKey, checkCompatibility: false });
    this.retry = config.retry;
    this.readyTimeoutMs = config.readyTimeoutMs ?? 60_000;
    this.pollIntervalMs = config.pollIntervalMs ?? 1_000;
    this.sleep = config.sleep ?? defaultSleep;
  }

  async ensureCollection(collectionName: string, settings: CollectionSettings): Promise<void> {
    const collections = await this.call(() => this.client.getCollections());
    const exists = collections.collections.some((c) => c.name === collectionName);

    if (!exists) {
      await this.call(() =>
        this.client.createCollection(collectionName, {
          vectors: { size: settings.dimensions, distance: DISTANCES[settings.metric] },
        }),
      );

      // Payload indexes back the metadata filters
      for (const field of INDEXED_FIELDS) {
        await this.call(() =>
          this.client.createPayloadIndex(collectionName, {
            field_name: field,
            field_schema: "keyword",
            wait: true,
          }),
        );
      }
    }

    await this.waitUntilReady(collectionName);
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);
      await this.call(() =>
        this.client.upsert(collectionName, {
          wait: true,
          points: batch.map((r) => ({
            id: toPointId(r.id),
            vector: r.vector,
            payload: { ...r.payload, [RECORD_ID_KEY]: r.id },
          })),
        }),
      );
    }
  }

  async query(collectionName: string, query: VectorQuery): Promise<VectorMatch[]> {
    const filter = toQdrantFilter(query.filter);
    const results = await this.call(() =>
      this.client.search(collectionName, {
        vector: query.vector,
        limit: query.topK,
        with_payload: true,
        ...(filter ? { filter } : {}),
      }),
    );

    return results.map((point) => {
      const { id, payload } = this.unwrap(point);
      return { id, score: point.score, payload };
    });
  }

  async fetch(collectionName: string, ids: string[]): Promise<VectorRecord[]> {
    if (ids.length === 0) {
      return [];
    }
    const points = await this.call(() =>
      this.client.retrieve(collectionName, {
        ids: ids.map(toPointId),
        with_payload: true,
        with_vector: true,
      }),
    );

    return points.map((point) => {
      const { id, payload } = this.unwrap(point);
      return { id, vector: isNumberArray(point.vector) ? point.vector : [], payload };
    });
  }

  async deleteAll(collectionName: string): Promise<void> {
    const collections = await this.call(() => this.client.getCollections());
    if (collections.collections.some((c) => c.name === collectionName)) {
      await this.call(() => this.client.deleteCollection(collectionName));
    }
  }

  async stats(collectionName: string): Promise<CollectionStats> {
    const info = await this.call(() => this.client.getCollection(collectionName));
    return {
      count: info.points_count ?? 0,
      dimensions: readVectorSize(info.config.params.vectors),
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async waitUntilReady(collectionName: string): Promise<void> {
    const deadline = Date.now() + this.readyTimeoutMs;
    for (;;) {
      const info = await this.call(() => this.client.getCollection(collectionName));
      if (info.status === "green") {
        return;
      }
      if (Date.now() >= deadline) {
        throw new ExternalServiceError(
          `Collection "${collectionName}" not ready after ${String(this.readyTimeoutMs)}ms (status ${info.status})`,
          this.name,
          { retryable: true },
        );
      }
      await this.sleep(this.pollIntervalMs);
    }
  }

  private unwrap(point: QdrantPoint): { id: string; payload: Payload } {
    const payload = toPayload(point.payload);
    const recordId = payload[RECORD_ID_KEY];
    delete payload[RECORD_ID_KEY];
    return { id: typeof recordId === "string" ? recordId : String(point.id), payload };
  }

  private call<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(async () => {
      try {
        return await fn();
      } catch (error: unknown) {
        throw classifyUpstreamError(this.name, error);
      }
    }, this.retry);
  }
}
