export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export type PayloadValue = string | number | boolean;

export type Payload = Record<string, PayloadValue>;

export interface VectorRecord {
  id: string;
  vector: number[];
  payload: Payload;
}

export interface IndexingStats {
  documentsProcessed: number;
  chunksCreated: number;
  vectorsUpserted: number;
  errors: number;
  totalTokens: number;
  durationMs: number;
}
