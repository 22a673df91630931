import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageUnavailable } from '../core/errors.js';
import type { StrikeRecord } from '../core/types.js';
import { SpatialStore } from './spatial-store.js';

const T0 = new Date('2024-06-01T00:00:00Z');
const T1 = new Date('2024-06-01T00:10:00Z');
const T2 = new Date('2024-06-01T00:20:00Z');

const strike = (lat: number | null, lon: number | null, quality: number | null = 100): StrikeRecord => ({
  lat,
  lon,
  quality,
});

describe('SpatialStore', () => {
  let store: SpatialStore;
  let now: Date;

  beforeEach(() => {
    now = new Date('2024-06-01T10:00:00Z');
    store = SpatialStore.open(':memory:', { clock: () => now });
    store.ensureSchema();
  });

  afterEach(() => {
    store.close();
  });

  describe('insertStrikes', () => {
    it('should ignore records that are already stored', () => {
      const records = [strike(45, 5), strike(46, 6, 250), strike(null, null, null)];

      expect(store.insertStrikes(T0, records)).toBe(3);
      expect(store.insertStrikes(T0, records)).toBe(0);

      const stats = store.stats();
      expect(stats.impacts).toBe(3);
      expect(stats.indexEntries).toBe(2);
      expect(stats.unindexedWithCoordinates).toBe(0);
    });

    it('should keep the same point in different slots', () => {
      store.insertStrikes(T0, [strike(45, 5)]);
      store.insertStrikes(T1, [strike(45, 5)]);

      expect(store.stats().impacts).toBe(2);
      expect([...store.existingTimestamps()].sort()).toEqual([
        '2024-06-01T00:00:00.000Z',
        '2024-06-01T00:10:00.000Z',
      ]);
    });

    it('should store a record with one missing coordinate without an index entry', () => {
      expect(store.insertStrikes(T0, [strike(45, null)])).toBe(1);
      expect(store.insertStrikes(T0, [strike(45, null)])).toBe(0);

      const stats = store.stats();
      expect(stats.impacts).toBe(1);
      expect(stats.indexEntries).toBe(0);
    });
  });

  describe('existingTimestamps', () => {
    it('should restrict to an inclusive range', () => {
      store.insertStrikes(T0, [strike(45, 5)]);
      store.insertStrikes(T1, [strike(45, 5)]);
      store.insertStrikes(T2, [strike(45, 5)]);

      const found = store.existingTimestamps({ start: T1, end: T2 });
      expect([...found].sort()).toEqual(['2024-06-01T00:10:00.000Z', '2024-06-01T00:20:00.000Z']);
    });
  });

  describe('latestStrikeTimestamp', () => {
    it('should return null for an empty store', () => {
      expect(store.latestStrikeTimestamp()).toBeNull();
    });

    it('should return the newest slot', () => {
      store.insertStrikes(T2, [strike(45, 5)]);
      store.insertStrikes(T0, [strike(45, 5)]);

      expect(store.latestStrikeTimestamp()?.toISOString()).toBe('2024-06-01T00:20:00.000Z');
    });
  });

  describe('queryRange', () => {
    beforeEach(() => {
      store.insertStrikes(T0, [
        strike(45, 5, 120),
        strike(45.3, 5, 140),
        strike(45.6, 5, 160),
        strike(47, 5, 180),
        strike(null, null, null),
      ]);
      store.insertStrikes(T2, [strike(45, 5, 90)]);
    });

    it('should return every strike in the range without a centre', () => {
      const rows = store.queryRange(T0, T0);

      expect(rows).toHaveLength(5);
      expect(rows[0]).toEqual({ timestamp: '2024-06-01T00:00:00.000Z', lat: 45, lon: 5, quality: 120 });
      expect(rows[4]).toEqual({ timestamp: '2024-06-01T00:00:00.000Z', lat: null, lon: null, quality: null });
    });

    it('should include both ends of the range', () => {
      expect(store.queryRange(T0, T2)).toHaveLength(6);
      expect(store.queryRange(T1, T2)).toHaveLength(1);
    });

    it('should keep only strikes inside the radius', () => {
      const rows = store.queryRange(T0, T0, { lat: 45, lon: 5 }, 50);

      expect(rows.map((row) => row.lat)).toEqual([45, 45.3]);
    });

    it('should return box candidates when exact filtering is off', () => {
      // box corner: about 65 km from the centre
      store.insertStrikes(T1, [strike(45.4, 5.6)]);

      expect(store.queryRange(T1, T1, { lat: 45, lon: 5 }, 50)).toEqual([]);
      expect(store.queryRange(T1, T1, { lat: 45, lon: 5 }, 50, { exact: false })).toEqual([
        { timestamp: '2024-06-01T00:10:00.000Z', lat: 45.4, lon: 5.6, quality: 100 },
      ]);
    });

    it('should find strikes across the antimeridian', () => {
      store.insertStrikes(T1, [strike(0, -179.95), strike(0, 179.9), strike(0, 170)]);

      expect(store.queryRange(T1, T1, { lat: 0, lon: 179.95 }, 50)).toEqual([
        { timestamp: '2024-06-01T00:10:00.000Z', lat: 0, lon: -179.95, quality: 100 },
        { timestamp: '2024-06-01T00:10:00.000Z', lat: 0, lon: 179.9, quality: 100 },
      ]);
    });

    it('should apply the limit', () => {
      expect(store.queryRange(T0, T2, undefined, undefined, { limit: 2 })).toHaveLength(2);
      expect(store.queryRange(T0, T0, { lat: 45, lon: 5 }, 50, { limit: 1 })).toHaveLength(1);
    });
  });

  describe('purge', () => {
    beforeEach(() => {
      store.insertStrikes(T0, [strike(45, 5), strike(null, null)]);
      store.insertStrikes(T1, [strike(45, 5)]);
      store.insertStrikes(T2, [strike(45, 5)]);
    });

    it('should delete strictly older strikes and their index entries', () => {
      expect(store.purgeBefore(T1)).toBe(2);

      const stats = store.stats();
      expect(stats.impacts).toBe(2);
      expect(stats.indexEntries).toBe(2);
      expect(stats.orphanIndexEntries).toBe(0);
      expect(stats.oldestStrike).toBe('2024-06-01T00:10:00.000Z');
    });

    it('should delete a half-open window', () => {
      expect(store.purgeWindow(T0, T2)).toBe(3);

      const stats = store.stats();
      expect(stats.impacts).toBe(1);
      expect(stats.indexEntries).toBe(1);
      expect(stats.newestStrike).toBe('2024-06-01T00:20:00.000Z');
    });
  });

  describe('events', () => {
    beforeEach(() => {
      const period = new Date('2024-06-01T06:00:00Z');
      store.recordEvent('download_attempt', { source: 'manual' }, period);
      now = new Date('2024-06-01T10:05:00Z');
      store.recordEvent('download_success', { units_succeeded: 3 }, period);
      now = new Date('2024-06-01T10:10:00Z');
      store.recordEvent('purge', { kind: 'automatic' });
    });

    it('should list the most recent events first', () => {
      const events = store.listEvents();

      expect(events.map((event) => event.kind)).toEqual(['purge', 'download_success', 'download_attempt']);
      expect(events[0]?.period).toBeNull();
      expect(events[1]).toMatchObject({
        timestamp: '2024-06-01T10:05:00.000Z',
        details: { units_succeeded: 3 },
        period: '2024-06-01T06:00:00.000Z',
      });
    });

    it('should filter by kind and limit', () => {
      expect(store.listEvents({ kind: 'download_attempt' }).map((event) => event.kind)).toEqual([
        'download_attempt',
      ]);
      expect(store.listEvents({ limit: 1 })).toHaveLength(1);
    });

    it('should return the latest event time of a kind', () => {
      expect(store.lastEventTime('download_success')?.toISOString()).toBe('2024-06-01T10:05:00.000Z');
      expect(store.lastEventTime('download_error')).toBeNull();
    });

    it('should keep old events whose period is still retained', () => {
      const keepAfter = new Date('2024-06-01T10:06:00Z');

      expect(store.purgeEvents(keepAfter, new Date('2024-06-01T00:00:00Z'))).toBe(0);
      expect(store.purgeEvents(keepAfter, new Date('2024-06-02T00:00:00Z'))).toBe(2);
      expect(store.listEvents().map((event) => event.kind)).toEqual(['purge']);
    });

    it('should count events in stats', () => {
      expect(store.stats().events).toBe(3);
    });
  });

  describe('without a schema', () => {
    it('should report no events', () => {
      const bare = SpatialStore.open(':memory:');
      try {
        expect(bare.lastEventTime('download_success')).toBeNull();
        expect(bare.listEvents()).toEqual([]);
        expect(bare.purgeEvents(T0, T0)).toBe(0);
      } finally {
        bare.close();
      }
    });
  });
});

describe('SpatialStore on disk', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'strikewatch-store-'));
    path = join(dir, 'impacts.db');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should migrate a legacy store and index its rows', () => {
    const legacy = new Database(path);
    legacy.exec(`
      CREATE TABLE impacts (timestamp TEXT NOT NULL, lat REAL, lon REAL, mcg INTEGER, UNIQUE (timestamp, lat, lon));
      INSERT INTO impacts VALUES ('2024-06-01T00:00:00+00:00', 45.0, 5.0, 120);
      INSERT INTO impacts VALUES ('2024-06-01T00:00:00+00:00', 46.0, 6.0, 200);
      INSERT INTO impacts VALUES ('2024-06-01T00:10:00+00:00', NULL, NULL, NULL);
    `);
    legacy.close();

    const store = SpatialStore.open(path);
    try {
      store.ensureSchema();

      const stats = store.stats();
      expect(stats.impacts).toBe(3);
      expect(stats.indexEntries).toBe(2);
      expect(stats.unindexedWithCoordinates).toBe(0);

      const rows = store.queryRange(T0, T1, { lat: 45, lon: 5 }, 10);
      expect(rows).toEqual([{ timestamp: '2024-06-01T00:00:00.000Z', lat: 45, lon: 5, quality: 120 }]);
      expect([...store.existingTimestamps()].sort()).toEqual([
        '2024-06-01T00:00:00.000Z',
        '2024-06-01T00:10:00.000Z',
      ]);
    } finally {
      store.close();
    }
  });

  it('should read the last event times of an older log_events table', () => {
    const legacy = new Database(path);
    legacy.exec(`
      CREATE TABLE log_events (id INTEGER PRIMARY KEY AUTOINCREMENT, event_type TEXT, timestamp TEXT, details TEXT);
      INSERT INTO log_events (event_type, timestamp, details)
        VALUES ('download_success', '2024-06-01T08:00:00.123456+00:00', '{}');
      INSERT INTO log_events (event_type, timestamp, details)
        VALUES ('download_attempt', '2024-06-01T07:59:00.000000+00:00', '{}');
    `);
    legacy.close();

    const store = SpatialStore.open(path, { clock: () => new Date('2024-06-01T09:00:00Z') });
    try {
      store.ensureSchema();

      expect(store.lastEventTime('download_success')?.toISOString()).toBe('2024-06-01T08:00:00.123Z');
      expect(store.lastEventTime('purge')).toBeNull();

      store.recordEvent('download_success', {});
      expect(store.lastEventTime('download_success')?.toISOString()).toBe('2024-06-01T09:00:00.000Z');
    } finally {
      store.close();
    }
  });

  it('should be safe to run the migration twice', () => {
    const first = SpatialStore.open(path);
    first.ensureSchema();
    first.insertStrikes(T0, [strike(45, 5)]);
    first.close();

    const second = SpatialStore.open(path);
    try {
      second.ensureSchema();
      expect(second.stats().indexEntries).toBe(1);
    } finally {
      second.close();
    }
  });

  it('should restore a missing index entry when the strike is re-inserted', () => {
    const store = SpatialStore.open(path);
    try {
      store.ensureSchema();
      store.insertStrikes(T0, [strike(45, 5)]);

      const other = new Database(path);
      other.exec('DELETE FROM impacts_rtree');
      other.close();
      expect(store.stats().unindexedWithCoordinates).toBe(1);

      expect(store.insertStrikes(T0, [strike(45, 5)])).toBe(0);
      expect(store.stats().unindexedWithCoordinates).toBe(0);
    } finally {
      store.close();
    }
  });

  it('should report a locked database as StorageUnavailable', () => {
    const store = SpatialStore.open(path, { busyTimeoutMs: 0 });
    store.ensureSchema();

    const holder = new Database(path);
    holder.exec('BEGIN EXCLUSIVE');
    try {
      let caught: unknown;
      try {
        store.insertStrikes(T0, [strike(45, 5)]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(StorageUnavailable);
      expect(caught).toMatchObject({ operation: 'insertStrikes', code: 'SQLITE_BUSY' });
    } finally {
      holder.exec('ROLLBACK');
      holder.close();
      store.close();
    }
  });
});
