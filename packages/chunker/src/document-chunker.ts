import type {
  Chunk,
  ChunkMetadata,
  ChunkingConfig,
  ChunkingEstimate,
  DocumentMetadata,
  NormalizedDocument,
} from "@docindex/types";
import type { IChunker } from "./chunker.interface.js";
import type { ITokenCounter } from "./token-counter.js";
import { RecursiveChunker } from "./recursive-chunker.js";
import { chunkId } from "./chunk-id.js";

// Accounts for the text repeated by overlap
const OVERLAP_FACTOR = 1.2;

const SECTION_HEADING = /##\s+(\d+)\.\s+([^\n]+)/;

export interface DocumentChunkerOptions extends ChunkingConfig {
  counter: ITokenCounter;
  splitter?: IChunker;
}

/**
 * Single chunking entry point for every document kind. Splits the text,
 * assigns content-addressed ids and attaches per-chunk provenance.
 */
export class DocumentChunker {
  private readonly counter: ITokenCounter;
  private readonly splitter: IChunker;
  private readonly config: ChunkingConfig;

  constructor(options: DocumentChunkerOptions) {
    const { counter, splitter, ...config } = options;
    if (config.overlap >= config.chunkSize) {
      throw new RangeError(
        `overlap (${String(config.overlap)}) must be smaller than chunkSize (${String(config.chunkSize)})`,
      );
    }
    this.counter = counter;
    this.splitter = splitter ?? new RecursiveChunker(counter);
    this.config = config;
  }

  get chunkSize(): number {
    return this.config.chunkSize;
  }

  chunk(document: NormalizedDocument): Chunk[] {
    const pieces = this.splitter.split(document.text, this.config);

    return pieces.map((text, index) => ({
      id: chunkId(document.sourceId, index, text),
      text,
      tokenCount: this.counter.count(text),
      metadata: withPosition(document.metadata, text, index, pieces.length),
    }));
  }

  estimate(documents: readonly NormalizedDocument[]): ChunkingEstimate {
    let characters = 0;
    let tokens = 0;
    for (const document of documents) {
      characters += document.text.length;
      tokens += this.counter.count(document.text);
    }

    return {
      documents: documents.length,
      characters,
      tokens,
      estimatedChunks: Math.floor((tokens / this.config.chunkSize) * OVERLAP_FACTOR),
    };
  }
}

/** `## 3. Authentication` inside a research chunk becomes its section label. */
export function detectSection(text: string): string | undefined {
  const match = SECTION_HEADING.exec(text);
  if (!match) {
    return undefined;
  }
  const [, number, title] = match;
  return `${String(number)}. ${String(title).trim()}`;
}

function withPosition(
  metadata: DocumentMetadata,
  text: string,
  chunkIndex: number,
  totalChunks: number,
): ChunkMetadata {
  if (metadata.sourceType === "research") {
    const section = detectSection(text) ?? metadata.section;
    return { ...metadata, ...(section ? { section } : {}), chunkIndex, totalChunks };
  }
  return { ...metadata, chunkIndex, totalChunks };
}
