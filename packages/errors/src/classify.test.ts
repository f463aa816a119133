import { describe, it, expect } from "vitest";
import { classifyUpstreamError, getHttpStatus } from "./classify.js";
import { ExternalServiceError, NotFoundError, RateLimitedError } from "./errors.js";

function httpError(status: number, message: string, headers?: Record<string, string>): Error {
  return Object.assign(new Error(message), { status, headers });
}

describe("getHttpStatus", () => {
  it("reads status or statusCode", () => {
    expect(getHttpStatus(httpError(503, "down"))).toBe(503);
    expect(getHttpStatus(Object.assign(new Error("x"), { statusCode: 404 }))).toBe(404);
    expect(getHttpStatus(new Error("plain"))).toBeUndefined();
    expect(getHttpStatus("text")).toBeUndefined();
  });
});

describe("classifyUpstreamError", () => {
  it("maps 429 to RateLimitedError with the retry-after header", () => {
    const err = classifyUpstreamError("openai", httpError(429, "slow down", { "retry-after": "2" }));
    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err instanceof RateLimitedError ? err.retryAfter : -1).toBe(2);
    expect(err.message).toBe("openai rate limit exceeded: slow down");
  });

  it("marks other client errors as not retryable", () => {
    const err = classifyUpstreamError("cohere", httpError(400, "bad"));
    expect(err).toBeInstanceOf(ExternalServiceError);
    expect(err instanceof ExternalServiceError && err.retryable).toBe(false);
    expect(err.details).toEqual({ status: 400 });
  });

  it("keeps the original error as the cause", () => {
    const upstream = httpError(503, "unavailable");
    expect(classifyUpstreamError("qdrant", upstream).cause).toBe(upstream);
  });

  it("marks server and network errors as retryable", () => {
    const server = classifyUpstreamError("qdrant", httpError(500, "boom"));
    const network = classifyUpstreamError("qdrant", new Error("ECONNRESET"));
    expect(server instanceof ExternalServiceError && server.retryable).toBe(true);
    expect(network instanceof ExternalServiceError && network.retryable).toBe(true);
    expect(network.message).toBe("qdrant request failed: ECONNRESET");
  });

  it("passes AppErrors through untouched", () => {
    const original = new NotFoundError("missing");
    expect(classifyUpstreamError("qdrant", original)).toBe(original);
  });
});
