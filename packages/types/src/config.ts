import type { SourceType } from "./document.js";

export type EmbeddingProviderName = "openai" | "cohere";
export type VectorStoreName = "qdrant" | "memory";
export type SimilarityMetric = "cosine" | "dot" | "euclidean";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  openai: OpenAIConfig;
  cohere: CohereConfig;
  embedding: EmbeddingConfig;
  vectorStore: VectorStoreConfig;
  chunking: ChunkingSettings;
  indexing: IndexingSettings;
  webSearch: WebSearchConfig;
  llm: LlmConfig;
  retrieval: RetrievalConfig;
}

export interface OpenAIConfig {
  apiKey?: string;
}

export interface CohereConfig {
  apiKey?: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  dimensions: number;
}

export interface VectorStoreConfig {
  provider: VectorStoreName;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  indexName: string;
  metric: SimilarityMetric;
}

export interface ChunkingSettings {
  chunkSize: number;
  overlap: number;
  encoding: string;
}

export interface IndexingSettings {
  batchSize: number;
  batchDelayMs: number;
}

export interface WebSearchConfig {
  tavilyApiKey?: string;
  cacheDays: number;
  queryPrefix: string;
}

export interface LlmConfig {
  model: string;
  researchModel: string;
}

export type ScoreBoostPolicy = Record<SourceType, number>;

export interface RetrievalConfig {
  summaryConcurrency: number;
  maxSummaries: number;
  boosts: ScoreBoostPolicy;
}
