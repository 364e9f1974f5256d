export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = false;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

/**
 * The catalog could not answer this request. Not worth retrying for the same message;
 * the user sees "no match".
 */
export class RemoteUnavailableError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Remote Unavailable: ${message}`, context);
  }
}

/**
 * The catalog throttled us. The caller decides whether and when to retry.
 */
export class RateLimitedError extends AppError {
  readonly statusCode = 429;
  readonly isOperational = true;
  override readonly retryable = true;

  constructor(
    message: string,
    public readonly retryAfterSeconds?: number,
    context?: Record<string, unknown>
  ) {
    super(`Rate Limited: ${message}`, { ...context, retryAfterSeconds });
  }
}

export class TelegramAPIError extends AppError {
  readonly statusCode = 502;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Telegram API Error: ${message}`, context);
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Validation Error: ${message}`, context);
  }
}
