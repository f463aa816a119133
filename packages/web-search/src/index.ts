export type {
  IWebSearchProvider,
  LiveSearchHit,
  LiveSearchOptions,
  SearchDepth,
} from "./web-search-provider.interface.js";
export { TavilyWebSearchProvider } from "./tavily-provider.js";
export type { TavilyProviderConfig } from "./tavily-provider.js";
