import type { EmbeddingResult } from "@docindex/types";
import type { IEmbeddingProvider } from "@docindex/embeddings";
import type { CompletionOptions, CompletionResult, ICompletionProvider } from "@docindex/llm";
import { createLogger } from "@docindex/logger";
import type { Logger } from "@docindex/logger";

export function silentLogger(): Logger {
  return createLogger({ level: "silent", service: "test" });
}

/**
 * Deterministic embeddings for tests: one dimension per vocabulary word, set
 * to 1 when the text mentions it.
 */
export class KeywordEmbeddings implements IEmbeddingProvider {
  readonly name = "keyword";
  readonly dimensions: number;
  readonly calls: string[][] = [];

  constructor(
    private readonly vocabulary: readonly string[],
    private readonly failOn?: string,
  ) {
    this.dimensions = vocabulary.length;
  }

  vectorFor(text: string): number[] {
    const lower = text.toLowerCase();
    return this.vocabulary.map((word) => (lower.includes(word) ? 1 : 0));
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push(texts);
    const failOn = this.failOn;
    if (failOn !== undefined && texts.some((text) => text.includes(failOn))) {
      throw new Error(`embedding failed for "${failOn}"`);
    }
    return {
      embeddings: texts.map((text) => this.vectorFor(text)),
      model: "keyword",
      tokensUsed: texts.length,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

/** Completion stub that echoes a transform of the user prompt. */
export class EchoCompletion implements ICompletionProvider {
  readonly name = "echo";
  readonly model = "echo-1";
  readonly prompts: { system: string; user: string }[] = [];

  constructor(private readonly reply: (user: string) => string | Promise<string>) {}

  async complete(system: string, user: string, _options?: CompletionOptions): Promise<CompletionResult> {
    this.prompts.push({ system, user });
    return { text: await this.reply(user), model: this.model, tokensUsed: 1 };
  }
}
