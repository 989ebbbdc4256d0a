import { describe, it, expect } from 'vitest';
import { classifySpotifyError, DEFAULT_RETRY_AFTER_MS } from '../../utils/spotifyErrors.js';
import {
  AuthenticationError,
  MalformedInputError,
  RateLimitedError,
  SpotifyAPIError,
  TransientApiError,
} from '../../types/errors.js';

function webapiError(statusCode: number, headers: Record<string, string> = {}) {
  return Object.assign(new Error(`An error occurred (${statusCode})`), { statusCode, headers, body: {} });
}

describe('classifySpotifyError', () => {
  it('maps 401 to an authentication error', () => {
    expect(classifySpotifyError(webapiError(401), 'searchTracks')).toBeInstanceOf(AuthenticationError);
  });

  it('maps 429 to a rate limit using Retry-After seconds', () => {
    const error = classifySpotifyError(webapiError(429, { 'retry-after': '3' }), 'searchTracks');

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(3000);
  });

  it('falls back to the default wait without Retry-After', () => {
    const error = classifySpotifyError(webapiError(429), 'getArtists');

    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(DEFAULT_RETRY_AFTER_MS);
  });

  it.each([500, 502, 503, 504, 408])('maps %i to a transient error', (statusCode) => {
    expect(classifySpotifyError(webapiError(statusCode), 'getTracks')).toBeInstanceOf(TransientApiError);
  });

  it('maps other statuses to a non-retryable API error', () => {
    const error = classifySpotifyError(webapiError(404), 'getTracks');

    expect(error).toBeInstanceOf(SpotifyAPIError);
    expect(error.statusCode).toBe(404);
  });

  it.each(['ECONNRESET', 'ENETUNREACH', 'EHOSTUNREACH', 'ECONNABORTED'])(
    'maps the %s network error to a transient error',
    (code) => {
      const error = classifySpotifyError(Object.assign(new Error('socket hang up'), { code }), 'searchTracks');

      expect(error).toBeInstanceOf(TransientApiError);
      expect(error.context).toEqual({ operation: 'searchTracks', statusCode: undefined, code });
    }
  );

  it('maps a client timeout without a code to a transient error', () => {
    const timeout = Object.assign(new Error('Response timeout'), { name: 'TimeoutError' });

    expect(classifySpotifyError(timeout, 'getTracks')).toBeInstanceOf(TransientApiError);
  });

  it('returns app errors unchanged', () => {
    const original = new MalformedInputError('bad');

    expect(classifySpotifyError(original, 'searchTracks')).toBe(original);
  });

  it('treats failures without an HTTP status as transient', () => {
    const error = classifySpotifyError('boom', 'searchTracks');

    expect(error).toBeInstanceOf(TransientApiError);
    expect(error.message).toBe('Transient API Error: boom');
  });
});
