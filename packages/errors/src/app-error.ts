export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  /** False for programmer or configuration faults that no retry will fix. */
  isOperational?: boolean;
  requestId?: string;
  details?: Record<string, unknown>;
  /** The upstream error this one was classified from. */
  cause?: unknown;
}

export interface SerializedAppError {
  name: string;
  code: string;
  statusCode: number;
  message: string;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly requestId?: string;
  public readonly details?: Record<string, unknown>;

  constructor(options: AppErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.isOperational = options.isOperational ?? true;
    this.requestId = options.requestId;
    this.details = options.details;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }

  /** Log and report shape; omits the stack and the cause. */
  toJSON(): SerializedAppError {
    return {
      name: this.name,
      code: this.code,
      statusCode: this.statusCode,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}
