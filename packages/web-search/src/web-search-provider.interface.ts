export type SearchDepth = "basic" | "advanced";

export interface LiveSearchHit {
  url: string;
  title: string;
  content: string;
  /** Provider relevance score, used as-is. */
  score: number;
}

export interface LiveSearchOptions {
  maxResults: number;
  depth?: SearchDepth;
}

export interface IWebSearchProvider {
  readonly name: string;
  search(query: string, options: LiveSearchOptions): Promise<LiveSearchHit[]>;
}
