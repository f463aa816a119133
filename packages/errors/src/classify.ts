import { AppError } from "./app-error.js";
import { ExternalServiceError, RateLimitedError } from "./errors.js";

function readNumber(source: unknown, key: string): number | undefined {
  if (typeof source !== "object" || source === null || !(key in source)) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Extract an HTTP status from the error shapes thrown by the SDKs we use
 * (`status` on openai/qdrant errors, `statusCode` on cohere-ai errors).
 */
export function getHttpStatus(error: unknown): number | undefined {
  return readNumber(error, "status") ?? readNumber(error, "statusCode");
}

function getRetryAfterSeconds(error: unknown): number {
  if (typeof error !== "object" || error === null || !("headers" in error)) {
    return 0;
  }
  const headers: unknown = error.headers;
  let raw: unknown;
  if (headers instanceof Headers) {
    raw = headers.get("retry-after");
  } else if (typeof headers === "object" && headers !== null) {
    raw = Reflect.get(headers, "retry-after");
  }
  const seconds = typeof raw === "string" ? Number.parseFloat(raw) : Number.NaN;
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

/**
 * Map an upstream failure onto the error hierarchy so `withRetry` can decide
 * whether another attempt is worthwhile.
 */
export function classifyUpstreamError(service: string, error: unknown): AppError {
  if (AppError.isAppError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = getHttpStatus(error);

  if (status === 429) {
    return new RateLimitedError(`${service} rate limit exceeded: ${message}`, getRetryAfterSeconds(error), {
      details: { service },
      cause: error,
    });
  }

  const retryable = status === undefined || status >= 500 || status === 408;
  return new ExternalServiceError(`${service} request failed: ${message}`, service, {
    retryable,
    details: status === undefined ? undefined : { status },
    cause: error,
  });
}
