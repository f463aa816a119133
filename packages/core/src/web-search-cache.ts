import { createHash } from "node:crypto";
import type { Payload, WebSearchResponse, WebSearchResult } from "@docindex/types";
import type { IEmbeddingProvider } from "@docindex/embeddings";
import type { VectorIndex } from "@docindex/vector-store";
import { eq } from "@docindex/vector-store";
import type { IWebSearchProvider, SearchDepth } from "@docindex/web-search";
import type { Logger } from "@docindex/logger";
import { PAYLOAD_TEXT_LIMIT, readString } from "./payload.js";

const EMBED_INPUT_LIMIT = 8000;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Record id of a cached page: one record per URL, however often it is searched. */
export function webCacheId(url: string): string {
  return `web_${createHash("sha256").update(url).digest("hex").slice(0, 24)}`;
}

export interface WebSearchCacheOptions {
  embeddings: IEmbeddingProvider;
  index: VectorIndex;
  /** `null` leaves the cache in cached-only mode. */
  provider: IWebSearchProvider | null;
  cacheDays: number;
  logger: Logger;
  now?: () => Date;
}

export interface WebCacheSearchOptions {
  topK?: number;
  forceRefresh?: boolean;
  depth?: SearchDepth;
}

/**
 * Web search backed by the vector index. Cached pages younger than the TTL
 * are served first; a live search tops up the rest and its pages are stored
 * for next time.
 */
export class WebSearchCache {
  private readonly embeddings: IEmbeddingProvider;
  private readonly index: VectorIndex;
  private readonly provider: IWebSearchProvider | null;
  private readonly cacheDays: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: WebSearchCacheOptions) {
    this.embeddings = options.embeddings;
    this.index = options.index;
    this.provider = options.provider;
    this.cacheDays = options.cacheDays;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  get hasLiveSearch(): boolean {
    return this.provider !== null;
  }

  async search(query: string, options: WebCacheSearchOptions = {}): Promise<WebSearchResponse> {
    const topK = options.topK ?? 5;
    const forceRefresh = options.forceRefresh ?? false;

    const cached = forceRefresh ? [] : await this.searchCached(query, topK);
    const freshCached = cached.filter((result) => !this.isStale(result.searchDate));

    let live: WebSearchResult[] = [];
    let stored = 0;
    if (this.provider && (forceRefresh || freshCached.length < topK)) {
      const seen = new Set(freshCached.map((result) => result.url));
      live = (await this.searchLive(this.provider, query, topK, options.depth)).filter((result) => {
        if (seen.has(result.url)) {
          return false;
        }
        seen.add(result.url);
        return true;
      });
      stored = await this.store(live, query);
    }

    const results = [...freshCached, ...live].sort((a, b) => b.score - a.score).slice(0, topK);

    return {
      query,
      results,
      totalResults: results.length,
      cachedCount: freshCached.length,
      freshCount: stored,
    };
  }

  /** Age strictly greater than the TTL is stale; so is an unreadable date. */
  isStale(searchDate: string): boolean {
    const searchedAt = Date.parse(searchDate);
    if (Number.isNaN(searchedAt)) {
      return true;
    }
    return (this.now().getTime() - searchedAt) / DAY_MS > this.cacheDays;
  }

  private async searchCached(query: string, topK: number): Promise<WebSearchResult[]> {
    try {
      const result = await this.embeddings.embed(query);
      const vector = result.embeddings[0];
      if (!vector) {
        return [];
      }
      const matches = await this.index.query({ vector, topK, filter: eq("sourceType", "web") });
      return matches.map((match) => toCachedResult(match.payload, match.score));
    } catch (error: unknown) {
      this.logger.warn({ err: error, query }, "Web cache lookup failed");
      return [];
    }
  }

  private async searchLive(
    provider: IWebSearchProvider,
    query: string,
    topK: number,
    depth: SearchDepth | undefined,
  ): Promise<WebSearchResult[]> {
    const searchDate = this.now().toISOString();
    try {
      const hits = await provider.search(query, { maxResults: topK, depth });
      return hits.map((hit) => ({ ...hit, searchDate, isCached: false }));
    } catch (error: unknown) {
      this.logger.warn({ err: error, query, provider: provider.name }, "Live web search failed");
      return [];
    }
  }

  private async store(results: WebSearchResult[], query: string): Promise<number> {
    const storable = results.filter((result) => result.content.length > 0);
    if (storable.length === 0) {
      return 0;
    }

    try {
      const embedded = await this.embeddings.batchEmbed(
        storable.map((result) => result.content.slice(0, EMBED_INPUT_LIMIT)),
      );
      const records = storable.flatMap((result, position) => {
        const vector = embedded.embeddings[position];
        return vector ? [{ id: webCacheId(result.url), vector, payload: webPayload(result, query) }] : [];
      });
      await this.index.upsert(records);
      return records.length;
    } catch (error: unknown) {
      this.logger.warn({ err: error, query, results: storable.length }, "Failed to cache web results");
      return 0;
    }
  }
}

function webPayload(result: WebSearchResult, query: string): Payload {
  return {
    text: result.content.slice(0, PAYLOAD_TEXT_LIMIT),
    sourceType: "web",
    sourceFile: "web_search",
    url: result.url,
    title: result.title,
    searchQuery: query,
    searchDate: result.searchDate,
    docCategory: "WEB",
    objectType: "General",
  };
}

function toCachedResult(payload: Payload, score: number): WebSearchResult {
  return {
    url: readString(payload, "url"),
    title: readString(payload, "title", "Unknown"),
    content: readString(payload, "text"),
    score,
    searchDate: readString(payload, "searchDate"),
    isCached: true,
  };
}
