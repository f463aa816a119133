import type {
  SearchOptions,
  SearchResponse,
  SearchResult,
  WebSearchResponse,
} from "@docindex/types";
import type { CollectionStats, VectorIndex, VectorIndexRegistry } from "@docindex/vector-store";
import { and, eq, ne } from "@docindex/vector-store";
import { ServiceUnavailableError } from "@docindex/errors";
import type { RetrievalRanker } from "./retrieval-ranker.js";
import type { WebSearchCache } from "./web-search-cache.js";

export interface SearchServiceOptions {
  ranker: RetrievalRanker;
  index: VectorIndex;
  registry?: VectorIndexRegistry;
  webCache?: WebSearchCache | null;
}

function respond(query: string, results: SearchResult[]): SearchResponse {
  return { query, results, totalResults: results.length };
}

export class SearchService {
  private readonly ranker: RetrievalRanker;
  private readonly index: VectorIndex;
  private readonly registry?: VectorIndexRegistry;
  private readonly webCache: WebSearchCache | null;

  constructor(options: SearchServiceOptions) {
    this.ranker = options.ranker;
    this.index = options.index;
    this.registry = options.registry;
    this.webCache = options.webCache ?? null;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    return respond(query, await this.ranker.rank(this.index, query, options));
  }

  /** Everything except cached web pages. */
  async searchDocsOnly(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    return this.search(query, { ...options, filter: and(ne("sourceType", "web"), options.filter) });
  }

  /** Only cached web pages; no live search. */
  async searchWebOnly(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    return this.search(query, { ...options, filter: and(eq("sourceType", "web"), options.filter) });
  }

  /** Composite search across the per-connector indexes, merged by score. */
  async searchConnectors(
    connectorIds: readonly string[],
    query: string,
    options: SearchOptions = {},
  ): Promise<SearchResponse> {
    const registry = this.registry;
    if (!registry) {
      throw new ServiceUnavailableError("connectorIndexes");
    }
    const indexes = connectorIds.map((id) => registry.forConnector(id));
    return respond(query, await this.ranker.rank(indexes, query, options));
  }

  /** Chunks closest to a stored chunk in the main index. */
  async findSimilar(chunkId: string, topK = 5): Promise<SearchResponse> {
    return respond(`Similar to ${chunkId}`, await this.ranker.similarTo(this.index, chunkId, topK));
  }

  async webSearch(query: string, topK = 5, forceRefresh = false): Promise<WebSearchResponse> {
    if (!this.webCache) {
      throw new ServiceUnavailableError("webSearch");
    }
    return this.webCache.search(query, { topK, forceRefresh });
  }

  stats(): Promise<CollectionStats> {
    return this.index.stats();
  }
}
