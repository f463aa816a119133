export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
export { DocumentChunker, detectSection } from "./document-chunker.js";
export type { DocumentChunkerOptions } from "./document-chunker.js";
export { TiktokenCounter, HeuristicTokenCounter, estimateTokens } from "./token-counter.js";
export type { ITokenCounter } from "./token-counter.js";
export { chunkId, CHUNK_ID_LENGTH } from "./chunk-id.js";
