import type { RetryOptions } from "@docindex/errors";
import type { Logger } from "@docindex/logger";

/** Retry settings that report each backoff on `logger` at warn. */
export function loggedRetry(logger: Logger, base: RetryOptions = {}): RetryOptions {
  return {
    ...base,
    onRetry: (attempt, delayMs, error) => {
      logger.warn({ err: error, attempt, delayMs }, "Upstream call failed, retrying");
    },
  };
}
