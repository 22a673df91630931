/**
 * HTTP Client for Strikewatch
 *
 * fetch with a hard per-attempt deadline and status-based retries. The
 * deadline covers the whole exchange: connecting, waiting for headers and
 * reading the body. A server that sends headers and then stalls fails the
 * attempt with HTTPTimeoutError.
 *
 * The provider client turns the built-in retry off (`retries: 0`) and drives
 * attempts through RetryExecutor, so that every failure, 4xx included, gets
 * the same backoff.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 30000, userAgent: 'strikewatch/0.1' });
 * const body = await client.fetchBuffer(url, { headers: { Authorization: auth }, retries: 0 });
 * const hits = await client.fetchJSON<unknown>('https://nominatim.openstreetmap.org/search?q=Lyon');
 * ```
 */

import { describeError, logger } from './utils/logger.js';

export interface HTTPClientConfig {
  /** Retries after the first attempt (default: 3) */
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
  /** Deadline for one attempt, body included (default: 30000) */
  readonly timeoutMs: number;
  readonly userAgent: string;
  /** 0-1, spread applied to each backoff delay */
  readonly jitterFactor: number;
}

export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
  /** Cancels the request; the abort error is rethrown as is */
  readonly signal?: AbortSignal;
}

export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection, DNS or stream failure
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
  }
}

export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;
  readonly cause: Error;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
    this.cause = cause;
  }
}

export const DEFAULT_USER_AGENT = 'strikewatch/0.1';

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

type BodyReader<T> = (response: Response) => Promise<T>;

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 3,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 30000,
      userAgent: DEFAULT_USER_AGENT,
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * @throws {HTTPJSONParseError} If the body is not valid JSON
   */
  async fetchJSON<T = unknown>(url: string, options?: FetchOptions): Promise<T> {
    const text = await this.fetchWithRetry(url, options, (response) => response.text());

    try {
      const parsed: T = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch a response body as bytes (payloads may be gzip)
   */
  async fetchBuffer(url: string, options?: FetchOptions): Promise<Buffer> {
    return this.fetchWithRetry(url, options, async (response) =>
      Buffer.from(await response.arrayBuffer())
    );
  }

  /**
   * @throws {HTTPError} For error statuses, once retries are spent or the status is final
   * @throws {HTTPTimeoutError} When an attempt misses its deadline
   * @throws {HTTPNetworkError} For transport failures
   */
  private async fetchWithRetry<T>(
    url: string,
    options: FetchOptions | undefined,
    read: BodyReader<T>
  ): Promise<T> {
    const attempts = (options?.retries ?? this.config.maxRetries) + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.attempt(url, options, read);
      } catch (error) {
        if (attempt >= attempts || !this.isRetryable(error)) {
          throw error;
        }
        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: attempts,
          error: describeError(error),
          url: redactUrl(url),
        });
        await this.sleep(this.backoffDelay(attempt));
      }
    }
  }

  /**
   * One request under one deadline. The timer stays armed until `read`
   * has consumed the body.
   */
  private async attempt<T>(
    url: string,
    options: FetchOptions | undefined,
    read: BodyReader<T>
  ): Promise<T> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const external = options?.signal;
    const forwardAbort = (): void => controller.abort(external?.reason);
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
      }

      return await untilAborted(read(response), controller.signal);
    } catch (error) {
      if (error instanceof HTTPError) {
        throw error;
      }
      if (timedOut) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      if (external?.aborted) {
        throw error;
      }
      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', forwardAbort);
      // Releases the connection of an error response whose body was never read
      controller.abort();
    }
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    return error instanceof HTTPError && RETRYABLE_STATUSES.has(error.statusCode);
  }

  private backoffDelay(attempt: number): number {
    const base = Math.min(
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1),
      this.config.maxDelayMs
    );
    const spread = base * this.config.jitterFactor;
    return Math.max(0, Math.floor(base + (Math.random() * 2 - 1) * spread));
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Settle with `work`, or reject with the abort reason as soon as `signal`
 * fires, whichever comes first.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

const SECRET_QUERY_PARAMS = ['key', 'token', 'password'];

/**
 * Strip credentials (userinfo, API key params) from a URL before it
 * reaches a log line or an error message
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.username || parsed.password) {
      parsed.username = '';
      parsed.password = '';
    }
    for (const name of SECRET_QUERY_PARAMS) {
      if (parsed.searchParams.has(name)) {
        parsed.searchParams.set(name, 'REDACTED');
      }
    }
    return parsed.toString();
  } catch {
    return url;
  }
}
