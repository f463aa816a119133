export { AppError } from "./app-error.js";
export type { AppErrorOptions, SerializedAppError } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  RateLimitedError,
  ValidationError,
  ExternalServiceError,
  ServiceUnavailableError,
  ConfigurationError,
  CancelledError,
} from "./errors.js";

export { classifyUpstreamError, getHttpStatus } from "./classify.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitState } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
