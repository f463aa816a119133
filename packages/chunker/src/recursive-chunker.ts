import type { ChunkingConfig } from "@docindex/types";
import type { IChunker } from "./chunker.interface.js";
import type { ITokenCounter } from "./token-counter.js";

// Section break, paragraph, line, sentence, clause, word, character
export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n\n", "\n\n", "\n", ". ", ", ", " ", ""];

/**
 * Recursive splitting with separator hierarchy.
 *
 * The text is cut on the highest-priority separator it contains. Pieces under
 * the budget are greedily merged back into chunks, carrying up to `overlap`
 * tokens from the end of one chunk into the start of the next. Pieces at or
 * over the budget are split again with the remaining separators. Separators
 * stay attached to the start of the piece that follows them.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private readonly separators: readonly string[];

  constructor(
    private readonly counter: ITokenCounter,
    separators?: readonly string[],
  ) {
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  split(text: string, config: ChunkingConfig): string[] {
    if (text.trim().length === 0) {
      return [];
    }
    // Within budget: one chunk, unmodified
    if (this.counter.count(text) <= config.chunkSize) {
      return [text];
    }
    return this.splitRecursive(text, config.separators ?? this.separators, config);
  }

  private splitRecursive(
    text: string,
    separators: readonly string[],
    config: ChunkingConfig,
  ): string[] {
    let separator = separators[separators.length - 1] ?? "";
    let remaining: readonly string[] = [];

    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i] ?? "";
      if (candidate === "") {
        separator = candidate;
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const results: string[] = [];
    let pending: string[] = [];

    for (const piece of splitKeepingSeparator(text, separator)) {
      if (this.counter.count(piece) < config.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        results.push(...this.merge(pending, config));
        pending = [];
      }

      if (remaining.length === 0) {
        // Nothing finer to split on
        results.push(piece);
      } else {
        results.push(...this.splitRecursive(piece, remaining, config));
      }
    }

    if (pending.length > 0) {
      results.push(...this.merge(pending, config));
    }

    return results;
  }

  /**
   * Greedy merge of small pieces into chunks of at most `chunkSize` tokens.
   * When a chunk is emitted, pieces are dropped from its head until at most
   * `overlap` tokens remain; those become the head of the next chunk.
   */
  private merge(pieces: string[], config: ChunkingConfig): string[] {
    const { chunkSize, overlap } = config;
    const chunks: string[] = [];
    let window: { text: string; tokens: number }[] = [];
    let total = 0;

    for (const text of pieces) {
      const tokens = this.counter.count(text);

      if (total + tokens > chunkSize && window.length > 0) {
        const chunk = joinPieces(window);
        if (chunk !== null) {
          chunks.push(chunk);
        }

        while (total > overlap || (total + tokens > chunkSize && total > 0)) {
          const head = window[0];
          if (!head) {
            break;
          }
          total -= head.tokens;
          window = window.slice(1);
        }
      }

      window.push({ text, tokens });
      total += tokens;
    }

    const last = joinPieces(window);
    if (last !== null) {
      chunks.push(last);
    }

    return chunks;
  }
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") {
    return Array.from(text);
  }

  const parts = text.split(separator);
  const pieces = [parts[0] ?? ""];
  for (let i = 1; i < parts.length; i++) {
    pieces.push(separator + (parts[i] ?? ""));
  }
  return pieces.filter((piece) => piece.length > 0);
}

function joinPieces(window: { text: string }[]): string | null {
  const joined = window
    .map((piece) => piece.text)
    .join("")
    .trim();
  return joined.length > 0 ? joined : null;
}
