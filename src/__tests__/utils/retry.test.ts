import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy } from '../../utils/retry.js';
import {
  AuthenticationError,
  RateLimitedError,
  SpotifyAPIError,
  TransientApiError,
} from '../../types/errors.js';

function createPolicy(maxAttempts = 3, baseDelayMs = 100, maxDelayMs = 1000) {
  const sleep = vi.fn(async (_ms: number) => {});
  return { policy: new RetryPolicy({ maxAttempts, baseDelayMs, maxDelayMs }, sleep), sleep };
}

describe('RetryPolicy', () => {
  it('returns the first successful result without sleeping', async () => {
    const { policy, sleep } = createPolicy();
    const operation = vi.fn(async () => 'ok');

    await expect(policy.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transient errors with exponential backoff', async () => {
    const { policy, sleep } = createPolicy();
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientApiError('502'))
      .mockRejectedValueOnce(new TransientApiError('503'))
      .mockResolvedValueOnce('ok');

    await expect(policy.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('gives up after the maximum number of attempts', async () => {
    const { policy, sleep } = createPolicy(3);
    const operation = vi.fn(async () => {
      throw new TransientApiError('timeout');
    });

    await expect(policy.execute(operation)).rejects.toBeInstanceOf(TransientApiError);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('waits out rate limits without spending attempts', async () => {
    const { policy, sleep } = createPolicy(1);
    const operation = vi.fn<() => Promise<string>>();
    for (let i = 0; i < 5; i++) {
      operation.mockRejectedValueOnce(new RateLimitedError(2000));
    }
    operation.mockResolvedValueOnce('ok');

    await expect(policy.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(6);
    expect(sleep).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('rethrows authentication errors immediately', async () => {
    const { policy, sleep } = createPolicy();
    const operation = vi.fn(async () => {
      throw new AuthenticationError('invalid client');
    });

    await expect(policy.execute(operation)).rejects.toBeInstanceOf(AuthenticationError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not retry non-retryable API errors', async () => {
    const { policy } = createPolicy();
    const operation = vi.fn(async () => {
      throw new SpotifyAPIError('Bad request', 400);
    });

    await expect(policy.execute(operation)).rejects.toBeInstanceOf(SpotifyAPIError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('caps the backoff delay', () => {
    const { policy } = createPolicy(10, 1000, 3000);

    expect([1, 2, 3, 5].map((attempt) => policy.backoff(attempt))).toEqual([1000, 2000, 3000, 3000]);
  });
});
