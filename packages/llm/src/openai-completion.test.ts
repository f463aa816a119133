import { describe, it, expect, vi } from "vitest";
import { ExternalServiceError } from "@docindex/errors";
import { OpenAICompletionProvider } from "./index.js";
import type { OpenAIChatApi } from "./index.js";

function completion(content: string | null) {
  return {
    id: "cmpl-1",
    object: "chat.completion" as const,
    created: 0,
    model: "gpt-4o",
    choices: [
      {
        index: 0,
        finish_reason: "stop" as const,
        logprobs: null,
        message: { role: "assistant" as const, content, refusal: null },
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  };
}

describe("OpenAICompletionProvider", () => {
  it("sends system and user prompts and returns the text", async () => {
    const create = vi.fn().mockResolvedValue(completion("An answer."));
    const api: OpenAIChatApi = { create };
    const provider = new OpenAICompletionProvider({ apiKey: "test-secret", client: api });

    const result = await provider.complete("You are helpful.", "Question?");

    expect(result).toEqual({ text: "An answer.", model: "gpt-4o", tokensUsed: 15 });
    expect(create).toHaveBeenCalledWith(
      {
        model: "gpt-4o",
        messages: [
          { role: "system", content: "You are helpful." },
          { role: "user", content: "Question?" },
        ],
        temperature: 0.3,
        max_tokens: 2000,
      },
      undefined,
    );
  });

  it("rejects an empty completion", async () => {
    const api: OpenAIChatApi = { create: vi.fn().mockResolvedValue(completion(null)) };
    const provider = new OpenAICompletionProvider({ apiKey: "test-secret", client: api });

    await expect(provider.complete("s", "u")).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it("retries rate limits", async () => {
    const rateLimited = Object.assign(new Error("slow down"), { status: 429 });
    const create = vi
      .fn()
      .mockRejectedValueOnce(rateLimited)
      .mockResolvedValueOnce(completion("ok"));
    const provider = new OpenAICompletionProvider({
      apiKey: "test-secret",
      client: { create },
      retry: { baseDelayMs: 1, maxDelayMs: 1, onRetry: () => undefined },
    });

    await expect(provider.complete("s", "u")).resolves.toMatchObject({ text: "ok" });
    expect(create).toHaveBeenCalledTimes(2);
  });
});
