/**
 * Strike provider client
 *
 * Fetches one 10-minute slot from the protected archive:
 *
 *   {baseUrl}/Strikes_{region}/YYYY/MM/DD/HH/mm.json     (first)
 *   {baseUrl}/Strikes_{region}/YYYY/MM/DD/HH/mm.json.gz  (fallback)
 *
 * Each variant gets `maxRetries` attempts with exponential backoff
 * (base * 2^(n-1)). Every failure is retried alike: the provider answers
 * 404 for slots it has not published yet, which later succeed.
 */

import { NetworkFailure } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import type { ProviderConfig } from '../core/config.js';
import { slotPath } from '../core/time-slots.js';
import type { Credentials } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { RetryExecutor, RetryExhaustedError } from '../resilience/retry.js';

const logger = createLogger({ module: 'provider-client' });

export interface PayloadVariant {
  readonly suffix: '.json' | '.json.gz';
  readonly compressed: boolean;
}

export const PAYLOAD_VARIANTS: readonly PayloadVariant[] = [
  { suffix: '.json', compressed: false },
  { suffix: '.json.gz', compressed: true },
];

export interface FetchedPayload {
  readonly url: string;
  readonly variant: PayloadVariant;
  readonly body: Buffer;
  /** Attempts spent across all variants */
  readonly attempts: number;
}

export interface FetchSlotOptions {
  readonly maxRetries: number;
  readonly signal?: AbortSignal;
}

/**
 * Anything that can produce the raw payload for a slot
 */
export interface PayloadFetcher {
  fetchSlot(slot: Date, credentials: Credentials, options: FetchSlotOptions): Promise<FetchedPayload>;
}

export interface ProviderClientOptions {
  readonly http?: HTTPClient;
  /** First backoff delay (default 1000 ms) */
  readonly retryBaseDelayMs?: number;
}

export class ProviderClient implements PayloadFetcher {
  private readonly config: ProviderConfig;
  private readonly http: HTTPClient;
  private readonly retryBaseDelayMs: number;

  constructor(config: ProviderConfig, options: ProviderClientOptions = {}) {
    this.config = config;
    this.http =
      options.http ??
      new HTTPClient({
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
        maxRetries: 0,
      });
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  slotUrl(slot: Date, variant: PayloadVariant): string {
    const base = this.config.baseUrl.replace(/\/+$/, '');
    return `${base}/Strikes_${this.config.region}/${slotPath(slot)}${variant.suffix}`;
  }

  /**
   * @throws {NetworkFailure} For the last variant, once every variant is exhausted
   */
  async fetchSlot(
    slot: Date,
    credentials: Credentials,
    options: FetchSlotOptions
  ): Promise<FetchedPayload> {
    const authorization = basicAuth(credentials);
    let totalAttempts = 0;
    let lastFailure: NetworkFailure | null = null;

    for (const variant of PAYLOAD_VARIANTS) {
      const url = this.slotUrl(slot, variant);
      const executor = new RetryExecutor({
        maxAttempts: Math.max(1, options.maxRetries),
        initialDelayMs: this.retryBaseDelayMs,
        backoffMultiplier: 2,
        signal: options.signal,
        onRetry: (attempt) => {
          logger.debug('Payload fetch failed, retrying', {
            url,
            attempt: attempt.attemptNumber,
            delayMs: attempt.delayMs,
            error: attempt.error.message,
          });
        },
      });

      try {
        let attemptsUsed = 0;
        const body = await executor.execute((attemptNumber) => {
          attemptsUsed = attemptNumber;
          return this.http.fetchBuffer(url, {
            headers: { Authorization: authorization },
            retries: 0,
            signal: options.signal,
          });
        });
        totalAttempts += attemptsUsed;
        return { url, variant, body, attempts: totalAttempts };
      } catch (error) {
        const attempts = error instanceof RetryExhaustedError ? error.attempts.length : 1;
        const cause =
          error instanceof RetryExhaustedError
            ? error.lastError
            : error instanceof Error
              ? error
              : new Error(String(error));
        totalAttempts += attempts;
        lastFailure = new NetworkFailure(
          `Failed to fetch ${url} after ${attempts} attempt(s): ${cause.message}`,
          url,
          attempts,
          cause
        );
        logger.debug('Payload variant exhausted', { url, attempts, error: cause.message });

        if (options.signal?.aborted) break;
      }
    }

    throw lastFailure ?? new NetworkFailure('No payload variants configured', '', 0, new Error('no variants'));
  }
}

export function basicAuth(credentials: Credentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf-8').toString('base64');
  return `Basic ${token}`;
}
