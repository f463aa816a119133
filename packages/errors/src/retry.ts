import { AppError } from "./app-error.js";
import { ExternalServiceError, RateLimitedError } from "./errors.js";

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before each backoff sleep. Defaults to a console warning. */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

function readCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Determines whether an error is retryable.
 * Rate limits (429) are retried; other client errors (4xx) are not.
 * Server errors (5xx) and network errors are retried.
 */
function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    if (error instanceof RateLimitedError) {
      return true;
    }

    if (error instanceof ExternalServiceError) {
      return error.retryable;
    }

    // Never retry client errors (4xx)
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    return error.statusCode >= 500;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = readCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 * A rate-limit `retryAfter` hint raises the delay to at least that value.
 */
function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  error: unknown,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  const delay = Math.floor(cappedDelay * jitter);

  if (error instanceof RateLimitedError && error.retryAfter > 0) {
    return Math.min(maxDelayMs, Math.max(delay, error.retryAfter * 1_000));
  }
  return delay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function warnRetry(attempt: number, maxRetries: number, delayMs: number): void {
  console.warn(
    `[retry] Attempt ${String(attempt)}/${String(maxRetries)} failed, retrying in ${String(delayMs)}ms...`,
  );
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const retryableErrors = options?.retryableErrors;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries) {
        break;
      }

      if (!isRetryable(error, retryableErrors)) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs, error);
      if (options?.onRetry) {
        options.onRetry(attempt + 1, delay, error);
      } else {
        warnRetry(attempt + 1, maxRetries, delay);
      }
      await sleep(delay);
    }
  }

  throw lastError;
}
