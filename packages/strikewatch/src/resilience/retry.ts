/**
 * Retry with Exponential Backoff
 *
 * delay(n) = initialDelayMs * backoffMultiplier ^ (n - 1), no jitter.
 *
 * Used twice with different shapes: per-variant payload fetches
 * (base 1 s, multiplier 2) and the coordinator's hourly update retries
 * (multiplier 1).
 */

import type { RetryAttempt, RetryConfig } from './types.js';

/**
 * Thrown after the last attempt, or at the first failure the predicate
 * refuses to retry
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * @example
 * ```typescript
 * const retry = new RetryExecutor({ maxAttempts: 3, initialDelayMs: 1000, backoffMultiplier: 2 });
 * const body = await retry.execute(() => client.fetchBuffer(url, { retries: 0 }));
 * ```
 */
export class RetryExecutor {
  private readonly config: RetryConfig;

  constructor(config: RetryConfig) {
    this.config = config;
  }

  /**
   * @throws {RetryExhaustedError} When attempts run out or the error is not retryable
   */
  async execute<T>(fn: (attemptNumber: number) => Promise<T>): Promise<T> {
    const attempts: RetryAttempt[] = [];
    let lastError = new Error('No attempts were made');

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        const willRetry =
          attempt < this.config.maxAttempts &&
          !this.config.signal?.aborted &&
          (this.config.isRetryable?.(lastError) ?? true);
        const record: RetryAttempt = {
          attemptNumber: attempt,
          delayMs: willRetry ? this.calculateDelay(attempt) : 0,
          error: lastError,
        };
        attempts.push(record);

        if (!willRetry) {
          break;
        }

        await this.config.onRetry?.(record);
        await this.sleep(record.delayMs);
      }
    }

    throw new RetryExhaustedError(attempts, lastError);
  }

  calculateDelay(attempt: number): number {
    return this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => {
      const signal = this.config.signal;
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
