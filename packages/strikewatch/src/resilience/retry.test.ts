/**
 * Retry Executor Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { RetryExecutor, RetryExhaustedError } from './retry.js';
import type { RetryConfig } from './types.js';

const immediate = (overrides: Partial<RetryConfig> = {}): RetryExecutor =>
  new RetryExecutor({
    maxAttempts: 3,
    initialDelayMs: 0,
    backoffMultiplier: 2,
    ...overrides,
  });

describe('RetryExecutor', () => {
  it('should return the first successful result', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValueOnce('ok');

    await expect(immediate().execute(fn)).resolves.toBe('ok');
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it('should throw RetryExhaustedError after maxAttempts', async () => {
    const onRetry = vi.fn();
    const executor = immediate({ onRetry });

    const error: unknown = await executor
      .execute(() => Promise.reject(new Error('boom')))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.message).toBe('Retry exhausted after 3 attempts: boom');
      expect(error.attempts.map((a) => a.attemptNumber)).toEqual([1, 2, 3]);
      expect(error.lastError.message).toBe('boom');
    }
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should stop at the first error the predicate refuses', async () => {
    const fn = vi.fn(() => Promise.reject(new Error('fatal')));
    const executor = immediate({ isRetryable: (error) => error.message !== 'fatal' });

    await expect(executor.execute(fn)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not retry once the signal has fired', async () => {
    const cancel = new AbortController();
    const fn = vi.fn(() => {
      cancel.abort();
      return Promise.reject(new Error('cancelled'));
    });

    await expect(immediate({ signal: cancel.signal }).execute(fn)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should grow delays exponentially', () => {
    const executor = immediate({ initialDelayMs: 1000 });

    expect(executor.calculateDelay(1)).toBe(1000);
    expect(executor.calculateDelay(3)).toBe(4000);
  });

  it('should keep a fixed delay with a multiplier of 1', () => {
    const executor = immediate({ initialDelayMs: 3_600_000, backoffMultiplier: 1 });

    expect(executor.calculateDelay(1)).toBe(3_600_000);
    expect(executor.calculateDelay(4)).toBe(3_600_000);
  });

  it('should report the scheduled delay to onRetry', async () => {
    const delays: number[] = [];
    const executor = immediate({
      initialDelayMs: 1,
      onRetry: (attempt) => {
        delays.push(attempt.delayMs);
      },
    });

    await executor.execute(() => Promise.reject(new Error('x'))).catch(() => undefined);
    expect(delays).toEqual([1, 2]);
  });
});
