import { AuthenticationError, RateLimitedError, TransientApiError } from '../types/errors.js';
import type { RetryConfig } from '../types/config.js';
import { Logger } from './logger.js';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Bounded retry for catalog calls.
 *
 * - `TransientApiError` consumes one attempt and backs off exponentially.
 * - `RateLimitedError` waits for the server-provided delay and does not
 *   consume an attempt.
 * - Anything else, `AuthenticationError` included, is rethrown at once.
 */
export class RetryPolicy {
  private readonly sleep: Sleep;

  constructor(
    private readonly options: RetryConfig,
    sleep: Sleep = defaultSleep
  ) {
    this.sleep = sleep;
  }

  async execute<T>(operation: () => Promise<T>, label = 'operation'): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await operation();
      } catch (error) {
        if (error instanceof AuthenticationError) {
          throw error;
        }

        if (error instanceof RateLimitedError) {
          Logger.warn(`Rate limited during ${label}, waiting ${error.retryAfterMs}ms`);
          await this.sleep(error.retryAfterMs);
          continue;
        }

        if (!(error instanceof TransientApiError)) {
          throw error;
        }

        attempt++;
        if (attempt >= this.options.maxAttempts) {
          throw error;
        }

        const delay = this.backoff(attempt);
        Logger.debug(`Retrying ${label} in ${delay}ms`, {
          attempt,
          maxAttempts: this.options.maxAttempts,
          error: error.message,
        });
        await this.sleep(delay);
      }
    }
  }

  backoff(attempt: number): number {
    return Math.min(this.options.baseDelayMs * Math.pow(2, attempt - 1), this.options.maxDelayMs);
  }
}
