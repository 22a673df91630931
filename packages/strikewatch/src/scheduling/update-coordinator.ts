/**
 * Update Coordinator
 *
 * One unattended maintenance run, meant for cron/launchd:
 *
 *   EVALUATE → INGEST? → PURGE? → DONE
 *
 * - Ingest when there is no download_success in the last 8 h
 * - Purge when there is no purge in the last 24 h
 * - Ingest window: [latest strike + 1 slot, floor(now) - 30 min); a fresh
 *   store starts at the lookback horizon
 * - A failed ingest is retried (default 3 times, 1 h apart) with an
 *   operator notification after each failure
 *
 * All decisions come from the store's event history; nothing is kept
 * between runs, so a second run right after a successful one does nothing.
 */

import type { IngestConfig, ScheduleConfig } from '../core/config.js';
import { CredentialsMissing } from '../core/errors.js';
import {
  addDays,
  addMinutes,
  floorToSlot,
  formatClockTime,
  formatTimestamp,
  HOUR_MS,
} from '../core/time-slots.js';
import { systemClock, type Clock, type Credentials, type TimeRange } from '../core/types.js';
import { createLogger, describeError } from '../core/utils/logger.js';
import type { Ingestor, IngestResult } from '../acquisition/ingest-pipeline.js';
import type { SpatialStore } from '../persistence/spatial-store.js';
import type { PurgeReport, Purger } from '../retention/retention-manager.js';
import { RetryExecutor, RetryExhaustedError } from '../resilience/retry.js';
import { NOTIFICATION_TITLE, type Notifier } from './notifier.js';

const logger = createLogger({ module: 'coordinator' });

export type StepStatus = 'skipped' | 'succeeded' | 'failed';

export interface CoordinatorReport {
  readonly ingest: StepStatus;
  readonly purge: StepStatus;
  readonly exitCode: 0 | 1;
  /** Ingest attempts made (0 when skipped) */
  readonly attempts: number;
  readonly lastIngest: IngestResult | null;
  readonly purgeReport: PurgeReport | null;
}

export interface UpdateCoordinatorDeps {
  readonly store: SpatialStore;
  readonly pipeline: Ingestor;
  readonly retention: Purger;
  readonly notifier: Notifier;
  readonly schedule: ScheduleConfig;
  readonly ingest: Pick<IngestConfig, 'maxLookbackDays' | 'slotMinutes' | 'concurrency' | 'retry'>;
  /** Throws CredentialsMissing when none are configured */
  readonly credentials: () => Credentials;
  readonly clock?: Clock;
}

/**
 * An ingest attempt that ran but fetched nothing
 */
export class IngestAttemptFailed extends Error {
  constructor(public readonly result: IngestResult) {
    super(`All ${result.unitsAttempted} attempted slots failed`);
    this.name = 'IngestAttemptFailed';
  }
}

export class UpdateCoordinator {
  private readonly deps: UpdateCoordinatorDeps;
  private readonly clock: Clock;

  constructor(deps: UpdateCoordinatorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
  }

  shouldIngest(): boolean {
    const last = this.deps.store.lastEventTime('download_success');
    return isStale(last, this.clock(), this.deps.schedule.ingestStalenessHours);
  }

  shouldPurge(): boolean {
    const last = this.deps.store.lastEventTime('purge');
    return isStale(last, this.clock(), this.deps.schedule.purgeStalenessHours);
  }

  /**
   * Window for the next incremental ingest, or null when up to date
   */
  computeWindow(): TimeRange | null {
    const { slotMinutes, maxLookbackDays } = this.deps.ingest;
    const end = addMinutes(
      floorToSlot(this.clock(), slotMinutes),
      -this.deps.schedule.safetyMarginMinutes
    );
    const latest = this.deps.store.latestStrikeTimestamp();
    const start = latest ? addMinutes(latest, slotMinutes) : addDays(end, -maxLookbackDays);

    return start.getTime() >= end.getTime() ? null : { start, end };
  }

  async run(): Promise<CoordinatorReport> {
    let ingest: StepStatus = 'skipped';
    let purge: StepStatus = 'skipped';
    let attempts = 0;
    let lastIngest: IngestResult | null = null;
    let purgeReport: PurgeReport | null = null;

    // A failing read here (e.g. store locked) must not prevent the other step
    const ingestDue = this.evaluate('ingest', () => this.shouldIngest());
    const purgeDue = this.evaluate('purge', () => this.shouldPurge());

    if (ingestDue) {
      const outcome = await this.runIngestWithRetry();
      ingest = outcome.status;
      attempts = outcome.attempts;
      lastIngest = outcome.result;
    } else {
      logger.info('Ingest not due');
    }

    if (purgeDue) {
      try {
        purgeReport = this.deps.retention.purge();
        purge = 'succeeded';
      } catch (error) {
        purge = 'failed';
        logger.error('Purge failed', { error: describeError(error) });
        await this.deps.notifier.notify(
          NOTIFICATION_TITLE,
          `Strike database purge failed: ${describeError(error)}`
        );
      }
    } else {
      logger.info('Purge not due');
    }

    const exitCode = ingest === 'failed' || purge === 'failed' ? 1 : 0;
    logger.info('Update run finished', { ingest, purge, attempts, exitCode });

    return { ingest, purge, exitCode, attempts, lastIngest, purgeReport };
  }

  private evaluate(step: string, check: () => boolean): boolean {
    try {
      return check();
    } catch (error) {
      logger.warn('Cannot read event history; treating step as due', {
        step,
        error: describeError(error),
      });
      return true;
    }
  }

  private async runIngestWithRetry(): Promise<{
    status: StepStatus;
    attempts: number;
    result: IngestResult | null;
  }> {
    const { updateRetries, updateRetryDelayMs } = this.deps.schedule;
    const maxAttempts = 1 + updateRetries;
    let attempts = 0;
    let result: IngestResult | null = null;

    const executor = new RetryExecutor({
      maxAttempts,
      initialDelayMs: updateRetryDelayMs,
      backoffMultiplier: 1,
      isRetryable: (error) => !(error instanceof CredentialsMissing),
      onRetry: async (attempt) => {
        const failedAt = this.clock();
        const nextAt = new Date(failedAt.getTime() + attempt.delayMs);
        await this.deps.notifier.notify(
          NOTIFICATION_TITLE,
          `Strike sync failed at ${formatClockTime(failedAt)}. Next attempt scheduled at ${formatClockTime(nextAt)}.`
        );
      },
    });

    try {
      await executor.execute(async (attemptNumber) => {
        attempts = attemptNumber;
        result = await this.attemptIngest(attemptNumber);
      });
      return { status: 'succeeded', attempts, result };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;

      if (cause instanceof CredentialsMissing) {
        logger.error('Provider credentials missing; not retrying', { error: cause.message });
        await this.deps.notifier.notify(NOTIFICATION_TITLE, `Strike sync cannot start: ${cause.message}`);
      } else {
        logger.error('Ingest failed after all attempts', {
          attempts,
          error: describeError(cause),
        });
        await this.deps.notifier.notify(
          NOTIFICATION_TITLE,
          `Strike sync failed after ${attempts} consecutive attempt${attempts === 1 ? '' : 's'}.`
        );
      }
      return { status: 'failed', attempts, result };
    }
  }

  /**
   * One attempt: recompute the window, ingest it, record the outcome.
   *
   * @throws when the attempt failed; the retry loop decides what next
   */
  private async attemptIngest(attemptNumber: number): Promise<IngestResult | null> {
    const credentials = this.deps.credentials();
    const window = this.computeWindow();
    const { store } = this.deps;

    if (window === null) {
      logger.info('Store already up to date');
      store.recordEvent('download_success', { up_to_date: true, attempt: attemptNumber });
      return null;
    }

    const details = {
      start: formatTimestamp(window.start),
      end: formatTimestamp(window.end),
      attempt: attemptNumber,
    };
    store.recordEvent('download_attempt', details, window.end);
    logger.info('Ingest attempt', details);

    let result: IngestResult;
    try {
      result = await this.deps.pipeline.ingest({
        start: window.start,
        end: window.end,
        credentials,
        concurrency: this.deps.ingest.concurrency,
        maxRetries: this.deps.ingest.retry,
      });
    } catch (error) {
      this.recordError(details, window.end, describeError(error));
      throw error;
    }

    if (result.unitsAttempted > 0 && result.unitsSucceeded === 0) {
      const failure = new IngestAttemptFailed(result);
      this.recordError(details, window.end, failure.message);
      throw failure;
    }

    store.recordEvent(
      'download_success',
      {
        ...details,
        units_attempted: result.unitsAttempted,
        units_succeeded: result.unitsSucceeded,
        units_failed: result.unitsFailed,
        strikes_inserted: result.strikesInserted,
      },
      window.end
    );
    return result;
  }

  private recordError(details: Record<string, unknown>, period: Date, reason: string): void {
    try {
      this.deps.store.recordEvent('download_error', { ...details, reason }, period);
    } catch (error) {
      logger.warn('Could not record download_error event', { error: describeError(error) });
    }
  }
}

function isStale(last: Date | null, now: Date, maxAgeHours: number): boolean {
  if (last === null) return true;
  return now.getTime() - last.getTime() > maxAgeHours * HOUR_MS;
}
