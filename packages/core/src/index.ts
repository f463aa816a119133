export { Indexer } from "./indexer.js";
export type { IndexerOptions, IndexAllOptions } from "./indexer.js";

export { WebSearchCache, webCacheId } from "./web-search-cache.js";
export type { WebSearchCacheOptions, WebCacheSearchOptions } from "./web-search-cache.js";

export { RetrievalRanker, DEFAULT_BOOSTS, SUMMARY_UNAVAILABLE } from "./retrieval-ranker.js";
export type { RankOptions, RetrievalRankerOptions } from "./retrieval-ranker.js";

export { SearchService } from "./search-service.js";
export type { SearchServiceOptions } from "./search-service.js";

export { RagOrchestrator, NO_CONTEXT_ANSWER, DEFAULT_SYSTEM_PROMPT, preview } from "./rag-orchestrator.js";
export type { AskOptions, RagOrchestratorOptions } from "./rag-orchestrator.js";

export { assembleContext, fromSearchResult, fromWebResult } from "./context-assembler.js";
export type { ContextEntry } from "./context-assembler.js";

export { loggedRetry } from "./retry-logging.js";

export { validateFilter } from "./filter-validator.js";
export { chunkPayload, PAYLOAD_TEXT_LIMIT } from "./payload.js";

export { createServices, requireService } from "./services.js";
export type { ServiceContainer, ServiceName, ServiceOverrides } from "./services.js";
