import type { EmbeddingResult } from "@docindex/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Embed a search query. */
  embed(text: string): Promise<EmbeddingResult>;
  /**
   * Embed documents. `embeddings[i]` always belongs to `texts[i]`; callers
   * zip vectors back onto their inputs by position.
   */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
