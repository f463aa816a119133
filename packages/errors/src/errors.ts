import { AppError } from "./app-error.js";

interface ErrorOptions {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorOptions) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorOptions) {
    super({
      message,
      statusCode: 409,
      code: "CONFLICT",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the upstream asked us to wait, 0 when unknown. */
  public readonly retryAfter: number;

  constructor(message = "Rate limited", retryAfter: number, options?: ErrorOptions) {
    super({
      message,
      statusCode: 429,
      code: "RATE_LIMITED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.retryAfter = retryAfter;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly retryable: boolean;

  constructor(
    message = "External service error",
    service: string,
    options?: ErrorOptions & { retryable?: boolean },
  ) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
    this.retryable = options?.retryable ?? true;
  }
}

/**
 * A component that could not be constructed (usually a missing credential).
 * Callers treat this as "service not initialized", distinct from an empty result.
 */
export class ServiceUnavailableError extends AppError {
  public readonly component: string;

  constructor(component: string, message = `${component} is not initialized`, options?: ErrorOptions) {
    super({
      message,
      statusCode: 503,
      code: "SERVICE_UNAVAILABLE",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.component = component;
  }
}

export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options?: ErrorOptions) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class CancelledError extends AppError {
  constructor(message = "Operation cancelled", options?: ErrorOptions) {
    super({
      message,
      statusCode: 499,
      code: "CANCELLED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}
