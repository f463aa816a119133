import type { EmbeddingResult } from "@docindex/types";
import type { IEmbeddingProvider } from "@docindex/embeddings";
import type { CompletionOptions, CompletionResult, ICompletionProvider } from "@docindex/llm";
import type { IWebSearchProvider, LiveSearchHit, LiveSearchOptions } from "@docindex/web-search";
import { createLogger } from "@docindex/logger";
import type { Logger } from "@docindex/logger";

export function silentLogger(): Logger {
  return createLogger({ level: "silent", service: "test" });
}

/** Replies with the result of `reply`; a thrown error fails that call. */
export class ScriptedCompletion implements ICompletionProvider {
  readonly name = "scripted";
  readonly model = "scripted-1";
  readonly calls: { system: string; user: string; options?: CompletionOptions }[] = [];

  constructor(
    private readonly reply: (user: string, options?: CompletionOptions) => string | Promise<string>,
  ) {}

  async complete(system: string, user: string, options?: CompletionOptions): Promise<CompletionResult> {
    this.calls.push({ system, user, options });
    return { text: await this.reply(user, options), model: this.model, tokensUsed: 1 };
  }
}

export class StubWebSearch implements IWebSearchProvider {
  readonly name = "stub";
  readonly queries: { query: string; options: LiveSearchOptions }[] = [];

  constructor(private readonly hits: LiveSearchHit[] | Error) {}

  async search(query: string, options: LiveSearchOptions): Promise<LiveSearchHit[]> {
    this.queries.push({ query, options });
    if (this.hits instanceof Error) {
      throw this.hits;
    }
    return this.hits;
  }
}

/** Two-dimensional embeddings that count chunks and never fail. */
export class ConstantEmbeddings implements IEmbeddingProvider {
  readonly name = "constant";
  readonly dimensions = 2;

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return {
      embeddings: texts.map(() => [1, 0]),
      model: "constant",
      tokensUsed: texts.length,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
