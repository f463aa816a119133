import type { ChunkingConfig } from "@docindex/types";

export interface IChunker {
  readonly strategy: string;
  split(text: string, config: ChunkingConfig): string[];
}
