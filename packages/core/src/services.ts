import type { AppConfig } from "@docindex/types";
import { checkCredentials } from "@docindex/config";
import type { ComponentName, CredentialReport } from "@docindex/config";
import { DocumentChunker, TiktokenCounter } from "@docindex/chunker";
import { createEmbeddingProvider } from "@docindex/embeddings";
import type { IEmbeddingProvider } from "@docindex/embeddings";
import { VectorIndex, VectorIndexRegistry, createVectorStore } from "@docindex/vector-store";
import type { IVectorStore } from "@docindex/vector-store";
import { TavilyWebSearchProvider } from "@docindex/web-search";
import type { IWebSearchProvider } from "@docindex/web-search";
import { OpenAICompletionProvider } from "@docindex/llm";
import type { ICompletionProvider } from "@docindex/llm";
import { ServiceUnavailableError } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import { createChildLogger } from "@docindex/logger";
import { Indexer } from "./indexer.js";
import { RetrievalRanker } from "./retrieval-ranker.js";
import { WebSearchCache } from "./web-search-cache.js";
import { SearchService } from "./search-service.js";
import { RagOrchestrator } from "./rag-orchestrator.js";
import { loggedRetry } from "./retry-logging.js";

/** Collaborators supplied by the caller instead of built from configuration. */
export interface ServiceOverrides {
  embeddings?: IEmbeddingProvider | null;
  vectorStore?: IVectorStore | null;
  webSearch?: IWebSearchProvider | null;
  llm?: ICompletionProvider | null;
  sleep?: (ms: number) => Promise<void>;
}

export interface ServiceContainer {
  readonly config: AppConfig;
  readonly logger: Logger;
  /** Missing credential per component, `null` when present. */
  readonly credentials: CredentialReport;
  readonly chunker: DocumentChunker;
  readonly embeddings: IEmbeddingProvider | null;
  readonly vectorStore: IVectorStore | null;
  readonly index: VectorIndex | null;
  readonly connectorIndexes: VectorIndexRegistry | null;
  readonly webSearch: IWebSearchProvider | null;
  readonly llm: ICompletionProvider | null;
  readonly indexer: Indexer | null;
  readonly webCache: WebSearchCache | null;
  readonly search: SearchService | null;
  readonly rag: RagOrchestrator | null;
  /** Register a shutdown hook, run in reverse order by `close()`. */
  onClose(hook: () => Promise<void>): void;
  close(): Promise<void>;
}

export type ServiceName = Exclude<
  keyof ServiceContainer,
  "config" | "logger" | "credentials" | "chunker" | "onClose" | "close"
>;

const DEPENDS_ON: Record<ServiceName, readonly ComponentName[]> = {
  embeddings: ["embeddings"],
  vectorStore: ["vectorStore"],
  index: ["vectorStore"],
  connectorIndexes: ["vectorStore"],
  webSearch: ["webSearch"],
  llm: ["llm"],
  indexer: ["embeddings", "vectorStore"],
  webCache: ["embeddings", "vectorStore"],
  search: ["embeddings", "vectorStore"],
  rag: ["embeddings", "vectorStore", "llm"],
};

function buildEmbeddings(config: AppConfig, logger: Logger): IEmbeddingProvider | null {
  const { provider, model, dimensions } = config.embedding;
  const apiKey = provider === "cohere" ? config.cohere.apiKey : config.openai.apiKey;
  if (!apiKey) {
    return null;
  }
  const settings = { apiKey, model, dimensions, retry: loggedRetry(logger) };
  return createEmbeddingProvider(
    provider === "cohere" ? { provider, cohere: settings } : { provider, openai: settings },
  );
}

function buildVectorStore(config: AppConfig, logger: Logger): IVectorStore | null {
  const { provider, qdrantUrl, qdrantApiKey } = config.vectorStore;
  if (provider === "qdrant" && !qdrantUrl) {
    return null;
  }
  return createVectorStore({ provider, qdrantUrl, qdrantApiKey, retry: loggedRetry(logger) });
}

/**
 * Build every service once. A component whose credential is missing is
 * `null`, and so is everything that depends on it; the rest still work.
 */
export function createServices(
  config: AppConfig,
  logger: Logger,
  overrides: ServiceOverrides = {},
): ServiceContainer {
  const credentials = checkCredentials(config);
  const log = (component: string) => createChildLogger(logger, { component });

  for (const [component, variable] of Object.entries(credentials)) {
    if (variable) {
      logger.warn({ component, variable }, "Component disabled: missing credential");
    }
  }

  const chunker = new DocumentChunker({
    chunkSize: config.chunking.chunkSize,
    overlap: config.chunking.overlap,
    counter: new TiktokenCounter(config.chunking.encoding),
  });

  const embeddings = overrides.embeddings !== undefined ? overrides.embeddings : buildEmbeddings(config, log("embeddings"));
  const vectorStore =
    overrides.vectorStore !== undefined ? overrides.vectorStore : buildVectorStore(config, log("vector-store"));
  const webSearch =
    overrides.webSearch !== undefined
      ? overrides.webSearch
      : config.webSearch.tavilyApiKey
        ? new TavilyWebSearchProvider({
            apiKey: config.webSearch.tavilyApiKey,
            queryPrefix: config.webSearch.queryPrefix,
            retry: loggedRetry(log("web-search")),
          })
        : null;
  const llm =
    overrides.llm !== undefined
      ? overrides.llm
      : config.openai.apiKey
        ? new OpenAICompletionProvider({
            apiKey: config.openai.apiKey,
            model: config.llm.model,
            retry: loggedRetry(log("llm")),
          })
        : null;

  const collection = {
    dimensions: config.embedding.dimensions,
    metric: config.vectorStore.metric,
  };
  const index = vectorStore ? new VectorIndex(vectorStore, config.vectorStore.indexName, collection) : null;
  const connectorIndexes = vectorStore ? new VectorIndexRegistry(vectorStore, collection) : null;

  const indexer =
    embeddings && index
      ? new Indexer({
          chunker,
          embeddings,
          index,
          logger: log("indexer"),
          batchSize: config.indexing.batchSize,
          batchDelayMs: config.indexing.batchDelayMs,
          sleep: overrides.sleep,
        })
      : null;

  const webCache =
    embeddings && index
      ? new WebSearchCache({
          embeddings,
          index,
          provider: webSearch,
          cacheDays: config.webSearch.cacheDays,
          logger: log("web-search-cache"),
        })
      : null;

  const search =
    embeddings && index && connectorIndexes
      ? new SearchService({
          ranker: new RetrievalRanker({
            embeddings,
            logger: log("retrieval-ranker"),
            boosts: config.retrieval.boosts,
            summarizer: llm,
            summaryConcurrency: config.retrieval.summaryConcurrency,
            maxSummaries: config.retrieval.maxSummaries,
          }),
          index,
          registry: connectorIndexes,
          webCache,
        })
      : null;

  const rag =
    search && llm ? new RagOrchestrator({ search, llm, webCache, logger: log("rag") }) : null;

  const hooks: (() => Promise<void>)[] = [];

  return {
    config,
    logger,
    credentials,
    chunker,
    embeddings,
    vectorStore,
    index,
    connectorIndexes,
    webSearch,
    llm,
    indexer,
    webCache,
    search,
    rag,
    onClose(hook) {
      hooks.push(hook);
    },
    async close() {
      const failures: unknown[] = [];
      for (const hook of hooks.splice(0).reverse()) {
        try {
          await hook();
        } catch (error: unknown) {
          logger.error({ err: error }, "Shutdown hook failed");
          failures.push(error);
        }
      }
      if (failures.length === 1) {
        throw failures[0];
      }
      if (failures.length > 1) {
        throw new AggregateError(failures, `${String(failures.length)} shutdown hooks failed`);
      }
    },
  };
}

/** Narrow an optional service, or fail with the credential that disabled it. */
export function requireService<K extends ServiceName>(
  container: ServiceContainer,
  name: K,
): NonNullable<ServiceContainer[K]> {
  const service = container[name];
  if (service === null || service === undefined) {
    const variable = DEPENDS_ON[name]
      .map((component) => container.credentials[component])
      .find((missing) => missing !== null);
    throw new ServiceUnavailableError(
      name,
      variable ? `${name} is not initialized (set ${variable})` : undefined,
    );
  }
  return service;
}
