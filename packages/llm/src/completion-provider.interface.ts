export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  model: string;
  tokensUsed: number;
}

export interface ICompletionProvider {
  readonly name: string;
  readonly model: string;
  complete(systemPrompt: string, userPrompt: string, options?: CompletionOptions): Promise<CompletionResult>;
}
