/**
 * Resilience pattern types shared by retry and bulkhead
 */

export interface RetryAttempt {
  readonly attemptNumber: number;
  /** Wait before the next attempt (0 when none follows) */
  readonly delayMs: number;
  readonly error: Error;
}

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  /** 1 keeps every wait at `initialDelayMs` */
  readonly backoffMultiplier: number;
  /** Every failure is retried when absent */
  readonly isRetryable?: (error: Error) => boolean;
  /** Called after a failed attempt that will be retried, before the wait */
  readonly onRetry?: (attempt: RetryAttempt) => void | Promise<void>;
  /** Stops further attempts and cuts the current wait short */
  readonly signal?: AbortSignal;
}

export interface BulkheadConfig {
  readonly name: string;
  readonly maxConcurrent: number;
}

export interface BulkheadStats {
  readonly name: string;
  readonly activeCount: number;
  readonly queuedCount: number;
  readonly completedCount: number;
  readonly avgExecutionMs: number;
}
