import type { SourceType } from "./document.js";
import type { Payload, PayloadValue } from "./pipeline.js";

export type FilterValue = PayloadValue;

export type MetadataFilter =
  | { op: "eq"; field: string; value: FilterValue }
  | { op: "ne"; field: string; value: FilterValue }
  | { op: "and"; filters: MetadataFilter[] };

// Payload fields a caller may filter on
export const FILTER_FIELD_ALLOWLIST = [
  "sourceType",
  "sourceFile",
  "docCategory",
  "objectType",
  "language",
  "codeType",
  "component",
  "className",
  "packageName",
  "format",
  "section",
  "connectorId",
  "url",
  "pageNumber",
] as const;

export interface SearchOptions {
  topK?: number;
  filter?: MetadataFilter;
  includeSummaries?: boolean;
  maxSummaries?: number;
}

export interface SearchResult {
  chunkId: string;
  /** Boosted score, clamped to 1.0. */
  score: number;
  /** Similarity reported by the vector index before boosting. */
  rawScore: number;
  text: string;
  sourceFile: string;
  docCategory: string;
  objectType: string;
  sourceType: SourceType;
  url?: string;
  title?: string;
  summary?: string;
  metadata: Payload;
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
  totalResults: number;
}

export interface WebSearchResult {
  url: string;
  title: string;
  content: string;
  score: number;
  searchDate: string;
  isCached: boolean;
}

export interface WebSearchResponse {
  query: string;
  results: WebSearchResult[];
  totalResults: number;
  cachedCount: number;
  freshCount: number;
}

export type ContextFormat = "plain" | "markdown" | "xml";

export interface DocSource {
  sourceFile: string;
  docCategory: string;
  sourceType: SourceType;
  score: number;
}

export interface WebSource {
  url: string;
  title: string;
  score: number;
}

export interface RagAnswer {
  question: string;
  answer: string;
  docSources: DocSource[];
  webSources: WebSource[];
  /** Leading excerpt of the context handed to the model. */
  contextPreview: string;
}
