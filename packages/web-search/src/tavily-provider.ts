import type CircuitBreaker from "opossum";
import { z } from "zod";
import {
  ExternalServiceError,
  classifyUpstreamError,
  createCircuitBreaker,
  withRetry,
} from "@docindex/errors";
import type { CircuitBreakerOptions, RetryOptions } from "@docindex/errors";
import type {
  IWebSearchProvider,
  LiveSearchHit,
  LiveSearchOptions,
} from "./web-search-provider.interface.js";

const TAVILY_ENDPOINT = "https://api.tavily.com/search";

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        url: z.string(),
        title: z.string().default("Unknown"),
        content: z.string().default(""),
        score: z.number().default(0),
      }),
    )
    .default([]),
});

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface TavilyProviderConfig {
  apiKey: string;
  /** Prepended to every query, e.g. a product name to keep results on topic. */
  queryPrefix?: string;
  retry?: RetryOptions;
  breaker?: CircuitBreakerOptions;
  fetch?: FetchFn;
}

function isOpenCircuit(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "EOPENBREAKER";
}

class TavilyHttpError extends Error {
  constructor(
    readonly status: number,
    readonly headers: Headers,
    body: string,
  ) {
    super(`HTTP ${String(status)}: ${body.slice(0, 200)}`);
    this.name = "TavilyHttpError";
  }
}

export class TavilyWebSearchProvider implements IWebSearchProvider {
  readonly name = "tavily";
  private readonly breaker: CircuitBreaker<[string, LiveSearchOptions], LiveSearchHit[]>;
  private readonly apiKey: string;
  private readonly queryPrefix: string;
  private readonly retry?: RetryOptions;
  private readonly fetchFn: FetchFn;

  constructor(config: TavilyProviderConfig) {
    this.apiKey = config.apiKey;
    this.queryPrefix = config.queryPrefix?.trim() ?? "";
    this.retry = config.retry;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.breaker = createCircuitBreaker(
      this.name,
      (query: string, options: LiveSearchOptions) => this.request(query, options),
      { volumeThreshold: 5, ...config.breaker },
    );
  }

  async search(query: string, options: LiveSearchOptions): Promise<LiveSearchHit[]> {
    return withRetry(async () => {
      try {
        return await this.breaker.fire(query, options);
      } catch (error: unknown) {
        if (isOpenCircuit(error)) {
          throw new ExternalServiceError(`${this.name} circuit is open`, this.name, { retryable: false });
        }
        throw error;
      }
    }, this.retry);
  }

  private async request(query: string, options: LiveSearchOptions): Promise<LiveSearchHit[]> {
    const fullQuery = this.queryPrefix ? `${this.queryPrefix} ${query}` : query;
    try {
      const response = await this.fetchFn(TAVILY_ENDPOINT, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query: fullQuery,
          max_results: options.maxResults,
          search_depth: options.depth ?? "basic",
          include_answer: false,
        }),
      });

      if (!response.ok) {
        throw new TavilyHttpError(response.status, response.headers, await response.text());
      }

      const parsed = tavilyResponseSchema.parse(await response.json());
      return parsed.results.map((r) => ({
        url: r.url,
        title: r.title,
        content: r.content,
        score: r.score,
      }));
    } catch (error: unknown) {
      throw classifyUpstreamError(this.name, error);
    }
  }
}
