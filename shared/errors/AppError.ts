/**
 * Base error for querylog packages: a stable machine-readable code plus
 * optional context that ends up in structured log entries.
 */

export interface AppErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError<TCode extends string = string> extends Error {
  public readonly code: TCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(message: string, code: TCode, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.code = code;
    this.context = options.context;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.context,
      timestamp: this.timestamp,
    };
  }
}
