export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;

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
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

/**
 * A history file that is not valid JSON or breaks the record schema.
 * Fails the whole person; other persons still run.
 */
export class MalformedInputError extends AppError {
  readonly statusCode = 400;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Malformed Input: ${message}`, context);
  }
}

/**
 * Non-retryable catalog failure (bad request, forbidden, not found).
 */
export class SpotifyAPIError extends AppError {
  readonly statusCode: number;
  readonly isOperational = true;

  constructor(message: string, statusCode = 502, context?: Record<string, unknown>) {
    super(`Spotify API Error: ${message}`, context);
    this.statusCode = statusCode;
  }
}

/** Network failure, 5xx or timeout. Retried with backoff. */
export class TransientApiError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Transient API Error: ${message}`, context);
  }
}

export class RateLimitedError extends AppError {
  readonly statusCode = 429;
  readonly isOperational = true;

  constructor(
    public readonly retryAfterMs: number,
    context?: Record<string, unknown>
  ) {
    super(`Rate limited, retry after ${retryAfterMs}ms`, context);
  }
}

/** Invalid or revoked credentials. Aborts the whole run. */
export class AuthenticationError extends AppError {
  readonly statusCode = 401;
  readonly isOperational = false;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Authentication Error: ${message}`, context);
  }
}
