import OpenAI from "openai";
import { ExternalServiceError, classifyUpstreamError, withRetry } from "@docindex/errors";
import type { RetryOptions } from "@docindex/errors";
import type {
  CompletionOptions,
  CompletionResult,
  ICompletionProvider,
} from "./completion-provider.interface.js";

const DEFAULT_MODEL = "gpt-4o";
const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_MAX_TOKENS = 2000;

/** The slice of the OpenAI client this provider calls. */
export interface OpenAIChatApi {
  create(
    body: OpenAI.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal },
  ): PromiseLike<OpenAI.ChatCompletion>;
}

export interface OpenAICompletionConfig {
  apiKey: string;
  model?: string;
  retry?: RetryOptions;
  client?: OpenAIChatApi;
}

export class OpenAICompletionProvider implements ICompletionProvider {
  readonly name = "openai";
  readonly model: string;
  private readonly api: OpenAIChatApi;
  private readonly retry?: RetryOptions;

  constructor(config: OpenAICompletionConfig) {
    this.api = config.client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }).chat.completions;
    this.model = config.model ?? DEFAULT_MODEL;
    this.retry = config.retry;
  }

  async complete(
    systemPrompt: string,
    userPrompt: string,
    options: CompletionOptions = {},
  ): Promise<CompletionResult> {
    const response = await withRetry(async () => {
      try {
        return await this.api.create(
          {
            model: this.model,
            messages: [
              { role: "system", content: systemPrompt },
              { role: "user", content: userPrompt },
            ],
            temperature: options.temperature ?? DEFAULT_TEMPERATURE,
            max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
          },
          options.signal ? { signal: options.signal } : undefined,
        );
      } catch (error: unknown) {
        throw classifyUpstreamError(this.name, error);
      }
    }, this.retry);

    const text = response.choices[0]?.message.content;
    if (text === null || text === undefined) {
      throw new ExternalServiceError("Completion returned no content", this.name, {
        retryable: false,
      });
    }

    return {
      text,
      model: response.model,
      tokensUsed: response.usage?.total_tokens ?? 0,
    };
  }
}
