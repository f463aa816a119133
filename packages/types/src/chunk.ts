import type { DocumentMetadata } from "./document.js";

export type ChunkMetadata = DocumentMetadata & {
  chunkIndex: number;
  totalChunks: number;
};

export interface Chunk {
  id: string;
  text: string;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
  separators?: readonly string[];
}

export interface ChunkingEstimate {
  documents: number;
  characters: number;
  tokens: number;
  estimatedChunks: number;
}
