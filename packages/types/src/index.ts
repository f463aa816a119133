export type {
  SourceType,
  MetadataValue,
  DocProvenance,
  CodeType,
  CodeComponent,
  CodeProvenance,
  ResearchProvenance,
  WebProvenance,
  DocumentMetadata,
  NormalizedDocument,
  Classification,
} from "./document.js";

export type { ChunkMetadata, Chunk, ChunkingConfig, ChunkingEstimate } from "./chunk.js";

export type {
  EmbeddingResult,
  PayloadValue,
  Payload,
  VectorRecord,
  IndexingStats,
} from "./pipeline.js";

export { FILTER_FIELD_ALLOWLIST } from "./query.js";
export type {
  FilterValue,
  MetadataFilter,
  SearchOptions,
  SearchResult,
  SearchResponse,
  WebSearchResult,
  WebSearchResponse,
  ContextFormat,
  DocSource,
  WebSource,
  RagAnswer,
} from "./query.js";

export type {
  JobStatus,
  JobSnapshot,
  JobProgress,
  ResearchRequest,
  ResearchSection,
  ResearchReport,
  ResearchJobResult,
} from "./job.js";

export type {
  EmbeddingProviderName,
  VectorStoreName,
  SimilarityMetric,
  AppConfig,
  OpenAIConfig,
  CohereConfig,
  EmbeddingConfig,
  VectorStoreConfig,
  ChunkingSettings,
  IndexingSettings,
  WebSearchConfig,
  LlmConfig,
  ScoreBoostPolicy,
  RetrievalConfig,
} from "./config.js";
