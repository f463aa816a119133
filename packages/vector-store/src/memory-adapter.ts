import type { SimilarityMetric, VectorRecord } from "@docindex/types";
import { NotFoundError, ValidationError } from "@docindex/errors";
import type {
  CollectionSettings,
  CollectionStats,
  IVectorStore,
  VectorMatch,
  VectorQuery,
} from "./vector-store.interface.js";
import { matchesFilter } from "./filter.js";

interface Collection {
  settings: CollectionSettings;
  records: Map<string, VectorRecord>;
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function similarity(metric: SimilarityMetric, a: number[], b: number[]): number {
  switch (metric) {
    case "dot":
      return dot(a, b);
    case "euclidean": {
      let sum = 0;
      for (let i = 0; i < a.length; i++) {
        const d = (a[i] ?? 0) - (b[i] ?? 0);
        sum += d * d;
      }
      // Distance mapped onto (0, 1], higher is closer
      return 1 / (1 + Math.sqrt(sum));
    }
    case "cosine": {
      const norm = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
      return norm === 0 ? 0 : dot(a, b) / norm;
    }
  }
}

/**
 * Process-local vector store. Backs local runs without a Qdrant server and
 * the test suites.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly name = "memory";
  private readonly collections = new Map<string, Collection>();

  async ensureCollection(collectionName: string, settings: CollectionSettings): Promise<void> {
    if (!this.collections.has(collectionName)) {
      this.collections.set(collectionName, { settings: { ...settings }, records: new Map() });
    }
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    const collection = this.get(collectionName);
    for (const record of records) {
      if (record.vector.length !== collection.settings.dimensions) {
        throw new ValidationError("Vector dimension mismatch", {
          [record.id]: `expected ${String(collection.settings.dimensions)}, got ${String(record.vector.length)}`,
        });
      }
      collection.records.set(record.id, {
        id: record.id,
        vector: [...record.vector],
        payload: { ...record.payload },
      });
    }
  }

  async query(collectionName: string, query: VectorQuery): Promise<VectorMatch[]> {
    const collection = this.get(collectionName);
    const matches: VectorMatch[] = [];

    for (const record of collection.records.values()) {
      if (!matchesFilter(record.payload, query.filter)) {
        continue;
      }
      matches.push({
        id: record.id,
        score: similarity(collection.settings.metric, query.vector, record.vector),
        payload: { ...record.payload },
      });
    }

    // Array.prototype.sort is stable: ties keep insertion order
    return matches.sort((a, b) => b.score - a.score).slice(0, query.topK);
  }

  async fetch(collectionName: string, ids: string[]): Promise<VectorRecord[]> {
    const collection = this.get(collectionName);
    const records: VectorRecord[] = [];
    for (const id of ids) {
      const record = collection.records.get(id);
      if (record) {
        records.push({ id, vector: [...record.vector], payload: { ...record.payload } });
      }
    }
    return records;
  }

  async deleteAll(collectionName: string): Promise<void> {
    this.collections.delete(collectionName);
  }

  async stats(collectionName: string): Promise<CollectionStats> {
    const collection = this.get(collectionName);
    return { count: collection.records.size, dimensions: collection.settings.dimensions };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private get(collectionName: string): Collection {
    const collection = this.collections.get(collectionName);
    if (!collection) {
      throw new NotFoundError(`Collection "${collectionName}" does not exist`);
    }
    return collection;
  }
}
