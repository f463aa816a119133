import { describe, it, expect, vi, beforeEach } from "vitest";
import { withRetry } from "./retry.js";
import { AppError } from "./app-error.js";
import { ExternalServiceError, RateLimitedError } from "./errors.js";

describe("withRetry", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    // Suppress console.warn from retry logic
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after maxRetries exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3); // 1 initial + 2 retries
  });

  it("does NOT retry 4xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Bad request", statusCode: 400, code: "BAD_REQUEST" }),
      );

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow("Bad request");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries rate-limit errors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitedError("slow down", 0))
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("caps a retry-after hint at maxDelayMs", async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitedError("slow down", 30))
      .mockResolvedValue("ok");

    await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 5, onRetry });

    expect(onRetry).toHaveBeenCalledWith(1, 5, expect.any(RateLimitedError));
  });

  it("does NOT retry non-retryable upstream errors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(new ExternalServiceError("bad input", "openai", { retryable: false }));

    await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toThrow("bad input");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries 5xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(
        new AppError({ message: "Server error", statusCode: 500, code: "INTERNAL" }),
      )
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("respects retryableErrors filter", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Server error", statusCode: 502, code: "BAD_GATEWAY" }),
      );

    await expect(
      withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 1,
        retryableErrors: ["TIMEOUT"],
      }),
    ).rejects.toThrow("Server error");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("warns on the console when no onRetry hook is given", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("blip")).mockResolvedValue("ok");

    await withRetry(fn, { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 });

    expect(console.warn).toHaveBeenCalledWith("[retry] Attempt 1/1 failed, retrying in 0ms...");
  });
});
