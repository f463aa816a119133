import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";

export interface ITokenCounter {
  /** True once the counter has fallen back to the character heuristic. */
  readonly degraded: boolean;
  count(text: string): number;
}

const SUPPORTED_ENCODINGS: ReadonlySet<string> = new Set([
  "gpt2",
  "r50k_base",
  "p50k_base",
  "p50k_edit",
  "cl100k_base",
  "o200k_base",
]);

function isSupportedEncoding(name: string): name is TiktokenEncoding {
  return SUPPORTED_ENCODINGS.has(name);
}

export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/**
 * BPE token counter backed by js-tiktoken. The encoder is loaded on first use;
 * an unknown encoding or an encoder failure switches to `floor(length / 4)`.
 */
export class TiktokenCounter implements ITokenCounter {
  private encoder: Tiktoken | null = null;
  private failed = false;

  constructor(readonly encoding = "cl100k_base") {}

  get degraded(): boolean {
    return this.failed;
  }

  count(text: string): number {
    if (text.length === 0) {
      return 0;
    }

    const encoder = this.load();
    if (!encoder) {
      return estimateTokens(text);
    }

    try {
      // Special-token markers in documents are counted as ordinary text
      return encoder.encode(text, [], []).length;
    } catch {
      return estimateTokens(text);
    }
  }

  private load(): Tiktoken | null {
    if (this.encoder || this.failed) {
      return this.encoder;
    }
    if (!isSupportedEncoding(this.encoding)) {
      this.failed = true;
      return null;
    }
    try {
      this.encoder = getEncoding(this.encoding);
    } catch {
      this.failed = true;
    }
    return this.encoder;
  }
}

/** Character heuristic only; used when no tokenizer is wanted. */
export class HeuristicTokenCounter implements ITokenCounter {
  readonly degraded = true;

  count(text: string): number {
    return estimateTokens(text);
  }
}
