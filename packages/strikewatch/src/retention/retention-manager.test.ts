import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { RetentionConfig } from '../core/config.js';
import { SpatialStore } from '../persistence/spatial-store.js';
import { RetentionManager } from './retention-manager.js';

const config: RetentionConfig = {
  impactsMaxAgeDays: 15,
  eventGraceDays: 2,
  disableEventPurge: false,
};

const NOW = new Date('2024-06-20T00:00:00Z');

describe('RetentionManager', () => {
  let store: SpatialStore;
  let now: Date;

  beforeEach(() => {
    now = new Date('2024-06-10T00:00:00Z');
    store = SpatialStore.open(':memory:', { clock: () => now });
    store.ensureSchema();

    store.insertStrikes(new Date('2024-06-04T23:50:00Z'), [{ lat: 45, lon: 5, quality: 100 }]);
    store.insertStrikes(new Date('2024-06-05T00:00:00Z'), [{ lat: 45, lon: 5, quality: 100 }]);
    store.insertStrikes(new Date('2024-06-10T00:00:00Z'), [{ lat: 45, lon: 5, quality: 100 }]);

    // old, period already purged
    store.recordEvent('download_success', { id: 'a' }, new Date('2024-06-04T00:00:00Z'));
    // old, period still retained
    store.recordEvent('download_success', { id: 'b' }, new Date('2024-06-10T00:00:00Z'));
    // old, no period
    store.recordEvent('download_attempt', { id: 'd' });
    now = new Date('2024-06-19T00:00:00Z');
    // inside the grace window
    store.recordEvent('download_attempt', { id: 'c' });
    now = NOW;
  });

  afterEach(() => {
    store.close();
  });

  const manager = (overrides: Partial<RetentionConfig> = {}): RetentionManager =>
    new RetentionManager(store, { ...config, ...overrides }, () => now);

  it('should delete strikes past the cutoff and expired events', () => {
    const report = manager().purge();

    expect(report).toEqual({
      mode: 'automatic',
      cutoff: '2024-06-05T00:00:00.000Z',
      window: null,
      impactsDeleted: 1,
      eventsDeleted: 2,
      spaceReclaimed: true,
    });
    expect(store.listEvents().map((event) => event.details)).toEqual([
      {
        impacts_deleted: 1,
        events_deleted: 2,
        mode: 'automatic',
        cutoff: '2024-06-05T00:00:00.000Z',
        window_start: null,
        window_end: null,
      },
      { id: 'c' },
      { id: 'b' },
    ]);
  });

  it('should keep a fresh event even when its period is long gone', () => {
    store.recordEvent('download_success', { id: 'fresh' }, new Date('2000-01-01T00:00:00Z'));

    const report = manager().purge();

    expect(report.eventsDeleted).toBe(2);
    expect(store.listEvents({ kind: 'download_success' })).toContainEqual(
      expect.objectContaining({
        timestamp: '2024-06-20T00:00:00.000Z',
        details: { id: 'fresh' },
        period: '2000-01-01T00:00:00.000Z',
      })
    );
  });

  it('should record the purge with the cutoff as its period', () => {
    manager().purge();

    const [purge] = store.listEvents({ kind: 'purge' });
    expect(purge?.timestamp).toBe('2024-06-20T00:00:00.000Z');
    expect(purge?.period).toBe('2024-06-05T00:00:00.000Z');
  });

  it('should leave events alone when event purging is disabled', () => {
    expect(manager({ disableEventPurge: true }).purge().eventsDeleted).toBe(0);
    expect(manager().purge({ disableEventPurge: true }).eventsDeleted).toBe(0);
  });

  it('should honour a per-call retention override', () => {
    expect(manager().purge({ impactsMaxAgeDays: 1 }).impactsDeleted).toBe(3);
  });

  it('should delete a half-open manual window', () => {
    const report = manager().purge({
      manualWindow: { start: new Date('2024-06-05T00:00:00Z'), end: new Date('2024-06-10T00:00:00Z') },
    });

    expect(report.mode).toBe('manual');
    expect(report.impactsDeleted).toBe(1);
    expect(report.window).toEqual({ start: '2024-06-05T00:00:00.000Z', end: '2024-06-10T00:00:00.000Z' });
    expect(store.stats().impacts).toBe(2);
    expect(store.listEvents({ kind: 'purge' })[0]?.period).toBe('2024-06-10T00:00:00.000Z');
  });

  it('should reject an empty manual window', () => {
    const at = new Date('2024-06-05T00:00:00Z');

    expect(() => manager().purge({ manualWindow: { start: at, end: at } })).toThrow(RangeError);
    expect(store.stats().impacts).toBe(3);
  });
});
