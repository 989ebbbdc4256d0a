import {
  AppError,
  AuthenticationError,
  RateLimitedError,
  SpotifyAPIError,
  TransientApiError,
} from '../types/errors.js';

export const DEFAULT_RETRY_AFTER_MS = 5000;

function readStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function readRetryAfterMs(error: unknown): number {
  if (typeof error !== 'object' || error === null || !('headers' in error)) {
    return DEFAULT_RETRY_AFTER_MS;
  }

  const headers = error.headers;
  if (typeof headers !== 'object' || headers === null || !('retry-after' in headers)) {
    return DEFAULT_RETRY_AFTER_MS;
  }

  const seconds = Number(headers['retry-after']);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : DEFAULT_RETRY_AFTER_MS;
}

/**
 * Maps a spotify-web-api-node failure onto the error classes the retry
 * policy understands. A WebapiError carries `statusCode` and `headers`;
 * anything without an HTTP status never got a response (socket errors,
 * client timeouts) and is treated as transient.
 */
export function classifySpotifyError(error: unknown, operation: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const statusCode = readStatusCode(error);
  const context = { operation, statusCode };

  if (statusCode === 401) {
    return new AuthenticationError(message, context);
  }

  if (statusCode === 429) {
    return new RateLimitedError(readRetryAfterMs(error), context);
  }

  if (statusCode !== undefined && (statusCode >= 500 || statusCode === 408)) {
    return new TransientApiError(message, context);
  }

  if (statusCode !== undefined) {
    return new SpotifyAPIError(message, statusCode, context);
  }

  const code = readErrorCode(error);
  return new TransientApiError(message, code ? { ...context, code } : context);
}
