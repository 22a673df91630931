/**
 * Ingest Pipeline
 *
 * Turns a time range into FetchUnits (one per 10-minute slot), skips the
 * slots already stored, and fetches, parses and inserts the rest through a
 * bounded worker pool.
 *
 * FLOW:
 * 1. Clamp: end ≤ now, start ≥ now - maxLookbackDays
 * 2. Enumerate slots floor(start) ≤ t < end
 * 3. Subtract existing timestamps (resume after interruption)
 * 4. Per unit: fetch (variant fallback + backoff) → decode → parse → insert
 *
 * FAILURE MODEL:
 * - A unit that cannot be fetched, is empty, or has no valid record is
 *   failed; the other units carry on
 * - StorageUnavailable stops dispatch of queued units and is rethrown
 *   once the in-flight units settle
 * - Observers (progress, archive) are a side channel; their errors are
 *   logged and ignored
 */

import { NetworkFailure, StorageUnavailable } from '../core/errors.js';
import type { IngestConfig } from '../core/config.js';
import {
  addDays,
  enumerateSlots,
  formatTimestamp,
} from '../core/time-slots.js';
import { systemClock, type Clock, type Credentials } from '../core/types.js';
import { createLogger, describeError } from '../core/utils/logger.js';
import { Bulkhead } from '../resilience/bulkhead.js';
import type { SpatialStore } from '../persistence/spatial-store.js';
import { decodePayload, parsePayload } from './payload-parser.js';
import type { FetchedPayload, PayloadFetcher } from './provider-client.js';

const logger = createLogger({ module: 'ingest' });

// ============================================================================
// Types
// ============================================================================

export type UnitStatus = 'succeeded' | 'empty' | 'failed' | 'cancelled';

export interface UnitOutcome {
  /** Slot start, canonical ISO */
  readonly slot: string;
  readonly status: UnitStatus;
  readonly inserted: number;
  readonly records: number;
  readonly parseFailures: number;
  readonly url: string | null;
  readonly error: string | null;
}

export interface IngestRequest {
  readonly start: Date;
  readonly end: Date;
  readonly credentials: Credentials;
  /** Worker pool size (default: config) */
  readonly concurrency?: number;
  /** Attempts per payload variant (default: config) */
  readonly maxRetries?: number;
  readonly signal?: AbortSignal;
}

export interface IngestResult {
  /** Effective window after clamping */
  readonly start: string;
  readonly end: string;
  readonly unitsPlanned: number;
  readonly unitsSkipped: number;
  readonly unitsAttempted: number;
  readonly unitsSucceeded: number;
  readonly unitsFailed: number;
  readonly strikesInserted: number;
  readonly outcomes: readonly UnitOutcome[];
}

/**
 * Side-channel hooks. Both are optional and awaited; a throwing observer
 * never changes a unit's outcome.
 */
export interface IngestObserver {
  /** Raw decoded payload, before parsing */
  onPayload?(slot: Date, text: string, payload: FetchedPayload): void | Promise<void>;
  onUnitComplete?(outcome: UnitOutcome, progress: { done: number; total: number }): void | Promise<void>;
}

/**
 * What the coordinator needs from a pipeline
 */
export interface Ingestor {
  ingest(request: IngestRequest): Promise<IngestResult>;
}

export interface IngestPipelineDeps {
  readonly store: SpatialStore;
  readonly fetcher: PayloadFetcher;
  readonly config: IngestConfig;
  readonly observers?: readonly IngestObserver[];
  readonly clock?: Clock;
}

// ============================================================================
// Pipeline
// ============================================================================

export class IngestPipeline implements Ingestor {
  private readonly store: SpatialStore;
  private readonly fetcher: PayloadFetcher;
  private readonly config: IngestConfig;
  private readonly observers: IngestObserver[];
  private readonly clock: Clock;

  constructor(deps: IngestPipelineDeps) {
    this.store = deps.store;
    this.fetcher = deps.fetcher;
    this.config = deps.config;
    this.observers = [...(deps.observers ?? [])];
    this.clock = deps.clock ?? systemClock;
  }

  addObserver(observer: IngestObserver): void {
    this.observers.push(observer);
  }

  /**
   * Slots a request would fetch, after clamping and before the resume check
   */
  plan(start: Date, end: Date): { start: Date; end: Date; slots: Date[] } {
    const now = this.clock();
    const horizon = addDays(now, -this.config.maxLookbackDays);
    const clampedEnd = end.getTime() > now.getTime() ? now : end;
    const clampedStart = start.getTime() < horizon.getTime() ? horizon : start;

    if (clampedStart.getTime() >= clampedEnd.getTime()) {
      return { start: clampedStart, end: clampedEnd, slots: [] };
    }
    return {
      start: clampedStart,
      end: clampedEnd,
      slots: enumerateSlots(clampedStart, clampedEnd, this.config.slotMinutes),
    };
  }

  /**
   * @throws {StorageUnavailable} When the store stops accepting writes
   */
  async ingest(request: IngestRequest): Promise<IngestResult> {
    const { start, end, slots } = this.plan(request.start, request.end);

    if (start.getTime() > request.start.getTime() || end.getTime() < request.end.getTime()) {
      logger.info('Requested range clamped', {
        requested: { start: formatTimestamp(request.start), end: formatTimestamp(request.end) },
        effective: { start: formatTimestamp(start), end: formatTimestamp(end) },
      });
    }

    const existing =
      slots.length > 0 ? this.store.existingTimestamps({ start: slots[0] ?? start, end }) : new Set<string>();
    const pending = slots.filter((slot) => !existing.has(formatTimestamp(slot)));

    logger.info('Ingest planned', {
      start: formatTimestamp(start),
      end: formatTimestamp(end),
      planned: slots.length,
      alreadyStored: slots.length - pending.length,
      toFetch: pending.length,
    });

    const concurrency = Math.max(1, request.concurrency ?? this.config.concurrency);
    const maxRetries = Math.max(1, request.maxRetries ?? this.config.retry);

    const pool = new Bulkhead({ name: 'ingest-units', maxConcurrent: concurrency });

    // Set by the first unit that finds the store unavailable
    const halt: { error: StorageUnavailable | null } = { error: null };
    let done = 0;
    const outcomes: UnitOutcome[] = [];

    const runUnit = async (slot: Date): Promise<void> => {
      let outcome: UnitOutcome;
      if (halt.error !== null || request.signal?.aborted) {
        outcome = unitOutcome(slot, 'cancelled', { error: halt.error ? halt.error.message : 'aborted' });
      } else {
        try {
          outcome = await this.processUnit(slot, request.credentials, maxRetries, request.signal);
        } catch (error) {
          if (error instanceof StorageUnavailable) {
            halt.error ??= error;
          }
          outcome = unitOutcome(slot, 'failed', { error: describeError(error) });
        }
      }

      outcomes.push(outcome);
      done++;
      await this.notify('onUnitComplete', (observer) =>
        observer.onUnitComplete?.(outcome, { done, total: pending.length })
      );
    };

    await Promise.allSettled(pending.map((slot) => pool.execute(() => runUnit(slot))));

    outcomes.sort((a, b) => (a.slot < b.slot ? -1 : a.slot > b.slot ? 1 : 0));

    if (halt.error !== null) {
      logger.error('Ingest halted: store unavailable', { error: halt.error.message });
      throw halt.error;
    }

    const attempted = outcomes.filter((o) => o.status !== 'cancelled');
    const succeeded = attempted.filter((o) => o.status === 'succeeded');
    const result: IngestResult = {
      start: formatTimestamp(start),
      end: formatTimestamp(end),
      unitsPlanned: slots.length,
      unitsSkipped: slots.length - pending.length,
      unitsAttempted: attempted.length,
      unitsSucceeded: succeeded.length,
      unitsFailed: attempted.length - succeeded.length,
      strikesInserted: succeeded.reduce((sum, o) => sum + o.inserted, 0),
      outcomes,
    };

    logger.info('Ingest finished', {
      attempted: result.unitsAttempted,
      succeeded: result.unitsSucceeded,
      failed: result.unitsFailed,
      inserted: result.strikesInserted,
      avgUnitMs: Math.round(pool.getStats().avgExecutionMs),
    });

    return result;
  }

  private async processUnit(
    slot: Date,
    credentials: Credentials,
    maxRetries: number,
    signal: AbortSignal | undefined
  ): Promise<UnitOutcome> {
    let payload: FetchedPayload;
    try {
      payload = await this.fetcher.fetchSlot(slot, credentials, { maxRetries, signal });
    } catch (error) {
      const url = error instanceof NetworkFailure ? error.url : null;
      logger.warn('Slot download failed', { slot: formatTimestamp(slot), error: describeError(error) });
      return unitOutcome(slot, 'failed', { url, error: describeError(error) });
    }

    let text: string;
    try {
      text = decodePayload(payload.body, payload.variant.compressed);
    } catch (error) {
      return unitOutcome(slot, 'failed', {
        url: payload.url,
        error: `Cannot decode payload: ${describeError(error)}`,
      });
    }

    await this.notify('onPayload', (observer) => observer.onPayload?.(slot, text, payload));

    const parsed = parsePayload(text);
    if (parsed.empty) {
      logger.warn('Empty payload', { slot: formatTimestamp(slot), url: payload.url });
      return unitOutcome(slot, 'empty', { url: payload.url, error: 'empty payload' });
    }

    if (parsed.failures.length > 0) {
      logger.debug('Dropped unparseable lines', {
        slot: formatTimestamp(slot),
        dropped: parsed.failures.length,
        first: parsed.failures[0]?.message,
      });
    }

    if (parsed.records.length === 0) {
      return unitOutcome(slot, 'failed', {
        url: payload.url,
        parseFailures: parsed.failures.length,
        error: 'no valid records in payload',
      });
    }

    // StorageUnavailable propagates to runUnit
    const inserted = this.store.insertStrikes(slot, parsed.records);

    return unitOutcome(slot, 'succeeded', {
      url: payload.url,
      inserted,
      records: parsed.records.length,
      parseFailures: parsed.failures.length,
    });
  }

  private async notify(
    hook: keyof IngestObserver,
    call: (observer: IngestObserver) => void | Promise<void> | undefined
  ): Promise<void> {
    for (const observer of this.observers) {
      try {
        await call(observer);
      } catch (error) {
        logger.warn('Ingest observer failed', { hook, error: describeError(error) });
      }
    }
  }
}

function unitOutcome(
  slot: Date,
  status: UnitStatus,
  fields: Partial<Omit<UnitOutcome, 'slot' | 'status'>> = {}
): UnitOutcome {
  return {
    slot: formatTimestamp(slot),
    status,
    inserted: fields.inserted ?? 0,
    records: fields.records ?? 0,
    parseFailures: fields.parseFailures ?? 0,
    url: fields.url ?? null,
    error: fields.error ?? null,
  };
}
