import type { MetadataFilter, Payload, SimilarityMetric, VectorRecord } from "@docindex/types";

export interface CollectionSettings {
  dimensions: number;
  metric: SimilarityMetric;
}

export interface VectorQuery {
  vector: number[];
  topK: number;
  filter?: MetadataFilter;
}

export interface VectorMatch {
  id: string;
  score: number;
  payload: Payload;
}

export interface CollectionStats {
  count: number;
  dimensions: number;
}

export interface IVectorStore {
  readonly name: string;
  /** Create the collection if missing and wait until it accepts writes. */
  ensureCollection(collectionName: string, settings: CollectionSettings): Promise<void>;
  /** Insert or overwrite by record id. */
  upsert(collectionName: string, records: VectorRecord[]): Promise<void>;
  /** Matches ordered by descending score. */
  query(collectionName: string, query: VectorQuery): Promise<VectorMatch[]>;
  /** Records for the ids that exist; unknown ids are omitted. */
  fetch(collectionName: string, ids: string[]): Promise<VectorRecord[]>;
  /** Drop every record by removing the collection itself. */
  deleteAll(collectionName: string): Promise<void>;
  stats(collectionName: string): Promise<CollectionStats>;
  healthCheck(): Promise<boolean>;
}
