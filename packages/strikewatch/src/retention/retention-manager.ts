/**
 * Retention Manager
 *
 * Rolling retention for strikes (default 15 days) and the shorter-lived
 * audit trail. Audit events are kept for a grace period (default 2 days)
 * and beyond that for as long as the data period they describe is still
 * retained.
 *
 * ORDER:
 * 1. Delete strikes (automatic: older than the cutoff; manual: a window)
 * 2. Delete expired audit events (unless disabled)
 * 3. Record the purge event
 * 4. Reclaim disk space (best effort)
 *
 * StorageUnavailable from steps 1-3 propagates; the next scheduled purge
 * retries.
 */

import type { RetentionConfig } from '../core/config.js';
import { addDays, formatTimestamp } from '../core/time-slots.js';
import { systemClock, type Clock, type TimeRange } from '../core/types.js';
import { createLogger, describeError } from '../core/utils/logger.js';
import type { SpatialStore } from '../persistence/spatial-store.js';

const logger = createLogger({ module: 'retention' });

export type PurgeMode = 'automatic' | 'manual';

export interface PurgeOptions {
  /** Overrides the configured strike retention */
  readonly impactsMaxAgeDays?: number;
  readonly disableEventPurge?: boolean;
  /** Deletes strikes with start <= timestamp < end instead of the age cutoff */
  readonly manualWindow?: TimeRange;
}

export interface PurgeReport {
  readonly mode: PurgeMode;
  readonly cutoff: string;
  readonly window: { readonly start: string; readonly end: string } | null;
  readonly impactsDeleted: number;
  readonly eventsDeleted: number;
  readonly spaceReclaimed: boolean;
}

/**
 * What the coordinator needs from retention
 */
export interface Purger {
  purge(options?: PurgeOptions): PurgeReport;
}

export class RetentionManager implements Purger {
  private readonly store: SpatialStore;
  private readonly config: RetentionConfig;
  private readonly clock: Clock;

  constructor(store: SpatialStore, config: RetentionConfig, clock: Clock = systemClock) {
    this.store = store;
    this.config = config;
    this.clock = clock;
  }

  /**
   * @throws {RangeError} For an empty or inverted manual window
   * @throws {StorageUnavailable}
   */
  purge(options: PurgeOptions = {}): PurgeReport {
    const now = this.clock();
    const maxAgeDays = options.impactsMaxAgeDays ?? this.config.impactsMaxAgeDays;
    const cutoff = addDays(now, -maxAgeDays);
    const window = options.manualWindow ?? null;
    const mode: PurgeMode = window ? 'manual' : 'automatic';

    if (window && window.start.getTime() >= window.end.getTime()) {
      throw new RangeError(
        `Manual purge window is empty: ${formatTimestamp(window.start)} >= ${formatTimestamp(window.end)}`
      );
    }

    const impactsDeleted = window
      ? this.store.purgeWindow(window.start, window.end)
      : this.store.purgeBefore(cutoff);

    const disableEventPurge = options.disableEventPurge ?? this.config.disableEventPurge;
    const eventsDeleted = disableEventPurge
      ? 0
      : this.store.purgeEvents(addDays(now, -this.config.eventGraceDays), cutoff);

    const report: PurgeReport = {
      mode,
      cutoff: formatTimestamp(cutoff),
      window: window
        ? { start: formatTimestamp(window.start), end: formatTimestamp(window.end) }
        : null,
      impactsDeleted,
      eventsDeleted,
      spaceReclaimed: false,
    };

    this.store.recordEvent(
      'purge',
      {
        impacts_deleted: impactsDeleted,
        events_deleted: eventsDeleted,
        mode,
        cutoff: report.cutoff,
        window_start: report.window?.start ?? null,
        window_end: report.window?.end ?? null,
      },
      window ? window.end : cutoff
    );

    let spaceReclaimed = false;
    try {
      this.store.reclaimSpace();
      spaceReclaimed = true;
    } catch (error) {
      logger.warn('Space reclaim failed; will retry on the next purge', {
        error: describeError(error),
      });
    }

    logger.info('Purge complete', {
      mode,
      cutoff: report.cutoff,
      impactsDeleted,
      eventsDeleted,
    });

    return { ...report, spaceReclaimed };
  }
}
