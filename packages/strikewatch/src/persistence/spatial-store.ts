/**
 * SQLite Spatial Store
 *
 * Single owner of the strike database: the `impacts` table, its R*Tree
 * index and the `events` audit trail.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3; every write is one short transaction
 * - WAL journaling plus a busy timeout so readers never block the ingest
 * - Query pattern: R*Tree box filter → exact box → haversine on candidates
 *
 * INVARIANTS:
 * - Every strike with both coordinates has exactly one index entry keyed
 *   by its rowid; strikes missing a coordinate have none
 * - Index entries never outlive their strike (pruned in the same
 *   transaction as the delete)
 * - `(timestamp, lat, lon)` is unique; re-inserting is a no-op
 *
 * Rows are addressed by `rowid` rather than a named key so stores created
 * before the `id` column existed keep working.
 */

import Database from 'better-sqlite3';
import {
  SchemaMigrationRace,
  StorageUnavailable,
  toStorageError,
} from '../core/errors.js';
import { boundingBoxAround, distanceKm, longitudeRanges } from '../core/geo-utils.js';
import { formatTimestamp, normalizeTimestamp, parseInstant } from '../core/time-slots.js';
import {
  systemClock,
  type AuditEvent,
  type Clock,
  type EventKind,
  type GeoPoint,
  type StrikeRecord,
  type StrikeRow,
  type TimeRange,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'spatial-store' });

// ============================================================================
// Public Types
// ============================================================================

export interface SpatialStoreOptions {
  /** How long a write waits on a lock before SQLITE_BUSY (default 5000) */
  readonly busyTimeoutMs?: number;
  readonly readonly?: boolean;
  readonly clock?: Clock;
}

export interface QueryOptions {
  /** Apply great-circle filtering after the box (default true) */
  readonly exact?: boolean;
  readonly limit?: number;
}

export interface StoreStats {
  readonly impacts: number;
  readonly indexEntries: number;
  readonly unindexedWithCoordinates: number;
  readonly orphanIndexEntries: number;
  readonly events: number;
  readonly oldestStrike: string | null;
  readonly newestStrike: string | null;
}

export interface ListEventsOptions {
  readonly kind?: EventKind;
  readonly limit?: number;
}

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface StrikeDbRow {
  readonly id: number;
  readonly timestamp: string;
  readonly lat: number | null;
  readonly lon: number | null;
  readonly quality: number | null;
}

interface EventDbRow {
  readonly id: number;
  readonly timestamp: string;
  readonly event_type: string;
  readonly details: string | null;
  readonly event_period: string | null;
}

interface ColumnRow {
  readonly name: string;
}

interface ValueRow<T> {
  readonly value: T;
}

interface RangeParams {
  readonly start: string;
  readonly end: string;
}

// Two longitude ranges; both are the same range unless the box crosses the antimeridian
interface BoxParams extends RangeParams {
  readonly minLat: number;
  readonly maxLat: number;
  readonly minLon: number;
  readonly maxLon: number;
  readonly minLon2: number;
  readonly maxLon2: number;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS impacts (
    id        INTEGER PRIMARY KEY,
    timestamp TEXT NOT NULL,
    lat       REAL,
    lon       REAL,
    quality   INTEGER,
    UNIQUE (timestamp, lat, lon)
  );

  CREATE INDEX IF NOT EXISTS idx_impacts_timestamp ON impacts(timestamp);

  CREATE TABLE IF NOT EXISTS events (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp    TEXT NOT NULL,
    event_type   TEXT NOT NULL,
    details      TEXT,
    event_period TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_events_type_timestamp ON events(event_type, timestamp);
`;

const RTREE_SQL = `
  CREATE VIRTUAL TABLE IF NOT EXISTS impacts_rtree USING rtree(
    id,
    min_lat, max_lat,
    min_lon, max_lon
  );
`;

const PRUNE_ORPHANS_SQL = `
  DELETE FROM impacts_rtree WHERE id NOT IN (SELECT rowid FROM impacts)
`;

const SELECT_STRIKE_COLUMNS = 'rowid AS id, timestamp, lat, lon, quality';

/** Audit table written by older installs; only read, never written */
const LEGACY_EVENTS_TABLE = 'log_events';

// ============================================================================
// Store
// ============================================================================

export class SpatialStore {
  private readonly db: Database.Database;
  private readonly clock: Clock;
  readonly path: string;

  private constructor(db: Database.Database, path: string, clock: Clock) {
    this.db = db;
    this.path = path;
    this.clock = clock;
  }

  /**
   * Open (or create) a store. Does not touch the schema; call
   * {@link ensureSchema} before writing.
   *
   * @throws {StorageUnavailable} When the file cannot be opened
   */
  static open(path: string, options: SpatialStoreOptions = {}): SpatialStore {
    let db: Database.Database;
    try {
      db = new Database(path, {
        timeout: options.busyTimeoutMs ?? 5000,
        readonly: options.readonly ?? false,
        fileMustExist: options.readonly ?? false,
      });
    } catch (error) {
      throw toStorageError('open', error);
    }

    if (!options.readonly && path !== ':memory:') {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
    }

    return new SpatialStore(db, path, options.clock ?? systemClock);
  }

  // ==========================================================================
  // Schema management
  // ==========================================================================

  /**
   * Create missing tables and indexes, add columns missing from older
   * stores, and index legacy rows when the R*Tree is created late.
   */
  ensureSchema(): void {
    this.guard('ensureSchema', () => {
      const hadImpacts = this.tableExists('impacts');
      const hadRtree = this.tableExists('impacts_rtree');

      if (hadImpacts) {
        // Legacy stores called the quality column `mcg`
        const added = this.ensureColumn('impacts', 'quality', 'INTEGER');
        if (added && this.columnNames('impacts').includes('mcg')) {
          this.db.exec('UPDATE impacts SET quality = mcg WHERE quality IS NULL');
          logger.info('Copied legacy mcg values into impacts.quality');
        }
        if (added || !hadRtree) {
          const normalized = this.normalizeLegacyTimestamps();
          if (normalized > 0) {
            logger.info('Normalized legacy timestamps', { normalized });
          }
        }
      }
      if (this.tableExists('events')) {
        this.ensureColumn('events', 'event_period', 'TEXT');
      }

      this.db.exec(SCHEMA_SQL);
      this.db.exec(RTREE_SQL);

      if (hadImpacts && !hadRtree) {
        const indexed = this.repairIndex();
        logger.info('Spatial index created for existing strikes', { indexed });
      }
    });
  }

  /**
   * Add index entries for strikes that have coordinates but no entry.
   *
   * @returns number of entries added
   */
  repairIndex(): number {
    return this.guard('repairIndex', () => {
      const result = this.db
        .prepare(
          `INSERT OR IGNORE INTO impacts_rtree (id, min_lat, max_lat, min_lon, max_lon)
           SELECT rowid, lat, lat, lon, lon FROM impacts
           WHERE lat IS NOT NULL AND lon IS NOT NULL
             AND rowid NOT IN (SELECT id FROM impacts_rtree)`
        )
        .run();
      return result.changes;
    });
  }

  /**
   * Rewrite offset-suffixed timestamps (`+00:00`) in canonical UTC form so
   * range comparisons on the text column hold. Rows that would collide with
   * an existing canonical row are left as they are.
   */
  private normalizeLegacyTimestamps(): number {
    return this.db
      .prepare(
        `UPDATE OR IGNORE impacts
         SET timestamp = strftime('%Y-%m-%dT%H:%M:%fZ', timestamp)
         WHERE timestamp NOT LIKE '%Z' AND strftime('%Y-%m-%dT%H:%M:%fZ', timestamp) IS NOT NULL`
      )
      .run().changes;
  }

  private tableExists(name: string): boolean {
    const row = this.db
      .prepare<[string], ValueRow<number>>(
        "SELECT count(*) AS value FROM sqlite_master WHERE type = 'table' AND name = ?"
      )
      .get(name);
    return (row?.value ?? 0) > 0;
  }

  private columnNames(table: string): string[] {
    return this.db
      .prepare<[string], ColumnRow>('SELECT name FROM pragma_table_info(?)')
      .all(table)
      .map((row) => row.name);
  }

  /**
   * @returns true when this call added the column
   */
  private ensureColumn(table: string, column: string, type: string): boolean {
    if (this.columnNames(table).includes(column)) {
      return false;
    }
    try {
      this.db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${type}`);
      logger.info('Schema migrated', { table, column });
      return true;
    } catch (error) {
      if (error instanceof Error && /duplicate column/i.test(error.message)) {
        const race = new SchemaMigrationRace(table, column);
        logger.warn(race.message);
        return false;
      }
      throw error;
    }
  }

  // ==========================================================================
  // Strikes
  // ==========================================================================

  /**
   * Insert every record of one slot in a single transaction.
   *
   * Duplicates are ignored; a duplicate whose index entry went missing
   * gets it back.
   *
   * @returns number of new strikes
   * @throws {StorageUnavailable}
   */
  insertStrikes(timestamp: Date, records: readonly StrikeRecord[]): number {
    const ts = formatTimestamp(timestamp);

    return this.guard('insertStrikes', () => {
      const insertImpact = this.db.prepare<[string, number | null, number | null, number | null]>(
        'INSERT OR IGNORE INTO impacts (timestamp, lat, lon, quality) VALUES (?, ?, ?, ?)'
      );
      const insertIndex = this.db.prepare<[number, number, number, number, number]>(
        `INSERT OR IGNORE INTO impacts_rtree (id, min_lat, max_lat, min_lon, max_lon)
         VALUES (?, ?, ?, ?, ?)`
      );
      const findImpact = this.db.prepare<[string, number | null, number | null], ValueRow<number>>(
        'SELECT rowid AS value FROM impacts WHERE timestamp = ? AND lat IS ? AND lon IS ? LIMIT 1'
      );

      const insertAll = this.db.transaction((rows: readonly StrikeRecord[]): number => {
        let inserted = 0;

        for (const row of rows) {
          // UNIQUE treats NULLs as distinct, so coordinate-less rows are checked by hand
          const hasCoordinates = row.lat !== null && row.lon !== null;
          if (!hasCoordinates && findImpact.get(ts, row.lat, row.lon)) {
            continue;
          }

          const result = insertImpact.run(ts, row.lat, row.lon, row.quality);
          if (row.lat === null || row.lon === null) {
            inserted += result.changes;
            continue;
          }

          let id: number | null = null;
          if (result.changes === 1) {
            inserted++;
            id = Number(result.lastInsertRowid);
          } else {
            id = findImpact.get(ts, row.lat, row.lon)?.value ?? null;
          }

          if (id !== null) {
            insertIndex.run(id, row.lat, row.lat, row.lon, row.lon);
          }
        }

        return inserted;
      });

      return insertAll(records);
    });
  }

  /**
   * Distinct stored slot timestamps (canonical form), optionally within
   * an inclusive range.
   */
  existingTimestamps(range?: TimeRange): Set<string> {
    return this.guard('existingTimestamps', () => {
      const rows = range
        ? this.db
            .prepare<[string, string], ValueRow<string>>(
              'SELECT DISTINCT timestamp AS value FROM impacts WHERE timestamp BETWEEN ? AND ?'
            )
            .all(formatTimestamp(range.start), formatTimestamp(range.end))
        : this.db
            .prepare<[], ValueRow<string>>('SELECT DISTINCT timestamp AS value FROM impacts')
            .all();

      const timestamps = new Set<string>();
      for (const row of rows) {
        const normalized = normalizeTimestamp(row.value);
        if (normalized) timestamps.add(normalized);
      }
      return timestamps;
    });
  }

  latestStrikeTimestamp(): Date | null {
    return this.guard('latestStrikeTimestamp', () => {
      const row = this.db
        .prepare<[], ValueRow<string | null>>('SELECT MAX(timestamp) AS value FROM impacts')
        .get();
      return row?.value ? parseInstant(row.value) : null;
    });
  }

  /**
   * Strikes with `start <= timestamp <= end`, optionally within
   * `radiusKm` of `center`. Ordered by timestamp then insertion.
   *
   * Spatial filtering applies only when both center and radius are given.
   */
  queryRange(
    start: Date,
    end: Date,
    center?: GeoPoint,
    radiusKm?: number,
    options: QueryOptions = {}
  ): StrikeRow[] {
    const range: RangeParams = { start: formatTimestamp(start), end: formatTimestamp(end) };
    const limitClause = options.limit !== undefined ? ` LIMIT ${Math.max(0, Math.floor(options.limit))}` : '';

    return this.guard('queryRange', () => {
      if (center === undefined || radiusKm === undefined) {
        return this.db
          .prepare<RangeParams, StrikeDbRow>(
            `SELECT ${SELECT_STRIKE_COLUMNS} FROM impacts
             WHERE timestamp BETWEEN @start AND @end
             ORDER BY timestamp ASC, rowid ASC${limitClause}`
          )
          .all(range)
          .map(toStrikeRow);
      }

      const box = boundingBoxAround(center, radiusKm);
      const [first, second = first] = longitudeRanges(box);
      const params: BoxParams = {
        ...range,
        minLat: box.minLat,
        maxLat: box.maxLat,
        minLon: first.minLon,
        maxLon: first.maxLon,
        minLon2: second.minLon,
        maxLon2: second.maxLon,
      };
      // Exact lat/lon bounds on top of the R*Tree: its 32-bit floats round outward
      const candidates = this.db
        .prepare<BoxParams, StrikeDbRow>(
          `SELECT ${SELECT_STRIKE_COLUMNS} FROM impacts
           WHERE timestamp BETWEEN @start AND @end
             AND rowid IN (
               SELECT id FROM impacts_rtree
               WHERE min_lat <= @maxLat AND max_lat >= @minLat
                 AND ((min_lon <= @maxLon AND max_lon >= @minLon)
                   OR (min_lon <= @maxLon2 AND max_lon >= @minLon2))
             )
             AND lat BETWEEN @minLat AND @maxLat
             AND (lon BETWEEN @minLon AND @maxLon OR lon BETWEEN @minLon2 AND @maxLon2)
           ORDER BY timestamp ASC, rowid ASC`
        )
        .all(params);

      const exact = options.exact ?? true;
      const filtered = exact
        ? candidates.filter(
            (row) =>
              row.lat !== null &&
              row.lon !== null &&
              distanceKm(center, { lat: row.lat, lon: row.lon }) <= radiusKm
          )
        : candidates;

      const limited =
        options.limit !== undefined ? filtered.slice(0, Math.max(0, options.limit)) : filtered;
      return limited.map(toStrikeRow);
    });
  }

  /**
   * Delete strikes strictly older than `cutoff` and their index entries.
   *
   * @returns number of strikes deleted
   * @throws {StorageUnavailable}
   */
  purgeBefore(cutoff: Date): number {
    return this.guard('purgeBefore', () => {
      const purge = this.db.transaction((bound: string): number => {
        const deleted = this.db.prepare<[string]>('DELETE FROM impacts WHERE timestamp < ?').run(bound);
        const pruned = this.db.prepare(PRUNE_ORPHANS_SQL).run();
        logger.debug('Pruned index entries', { pruned: pruned.changes });
        return deleted.changes;
      });
      return purge(formatTimestamp(cutoff));
    });
  }

  /**
   * Delete strikes with `start <= timestamp < end` and their index entries.
   *
   * @throws {StorageUnavailable}
   */
  purgeWindow(start: Date, end: Date): number {
    return this.guard('purgeWindow', () => {
      const purge = this.db.transaction((params: RangeParams): number => {
        const deleted = this.db
          .prepare<RangeParams>('DELETE FROM impacts WHERE timestamp >= @start AND timestamp < @end')
          .run(params);
        const pruned = this.db.prepare(PRUNE_ORPHANS_SQL).run();
        logger.debug('Pruned index entries', { pruned: pruned.changes });
        return deleted.changes;
      });
      return purge({ start: formatTimestamp(start), end: formatTimestamp(end) });
    });
  }

  // ==========================================================================
  // Audit events
  // ==========================================================================

  recordEvent(kind: EventKind, details: Readonly<Record<string, unknown>>, period?: Date | null): void {
    this.guard('recordEvent', () => {
      this.db
        .prepare<[string, string, string, string | null]>(
          'INSERT INTO events (timestamp, event_type, details, event_period) VALUES (?, ?, ?, ?)'
        )
        .run(
          formatTimestamp(this.clock()),
          kind,
          JSON.stringify(details),
          period ? formatTimestamp(period) : null
        );
    });
  }

  /**
   * Latest event of `kind`, or null when there is none or the events
   * table does not exist yet. Stores that still carry the older
   * `log_events` table are read too, and the later time wins.
   */
  lastEventTime(kind: EventKind): Date | null {
    return this.guard('lastEventTime', () => {
      let latest: Date | null = null;
      for (const table of ['events', LEGACY_EVENTS_TABLE]) {
        if (!this.tableExists(table)) {
          continue;
        }
        const row = this.db
          .prepare<[string], ValueRow<string | null>>(
            `SELECT MAX(timestamp) AS value FROM ${table} WHERE event_type = ?`
          )
          .get(kind);
        const found = row?.value ? parseInstant(row.value) : null;
        if (found !== null && (latest === null || found > latest)) {
          latest = found;
        }
      }
      return latest;
    });
  }

  /**
   * Delete events older than `keepAfter` whose period is unknown or ends
   * before `periodCutoff`.
   *
   * @returns number of events deleted
   */
  purgeEvents(keepAfter: Date, periodCutoff: Date): number {
    return this.guard('purgeEvents', () => {
      if (!this.tableExists('events')) {
        return 0;
      }
      return this.db
        .prepare<[string, string]>(
          `DELETE FROM events
           WHERE timestamp < ?
             AND (event_period IS NULL OR event_period < ?)`
        )
        .run(formatTimestamp(keepAfter), formatTimestamp(periodCutoff)).changes;
    });
  }

  /**
   * Most recent events first
   */
  listEvents(options: ListEventsOptions = {}): AuditEvent[] {
    const limit = Math.max(1, Math.floor(options.limit ?? 50));
    return this.guard('listEvents', () => {
      if (!this.tableExists('events')) {
        return [];
      }
      const rows = options.kind
        ? this.db
            .prepare<[string, number], EventDbRow>(
              `SELECT rowid AS id, timestamp, event_type, details, event_period FROM events
               WHERE event_type = ? ORDER BY timestamp DESC, rowid DESC LIMIT ?`
            )
            .all(options.kind, limit)
        : this.db
            .prepare<[number], EventDbRow>(
              `SELECT rowid AS id, timestamp, event_type, details, event_period FROM events
               ORDER BY timestamp DESC, rowid DESC LIMIT ?`
            )
            .all(limit);
      return rows.map(toAuditEvent);
    });
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  stats(): StoreStats {
    return this.guard('stats', () => {
      const count = (sql: string): number =>
        this.db.prepare<[], ValueRow<number>>(sql).get()?.value ?? 0;

      const bounds = this.db
        .prepare<[], { readonly oldest: string | null; readonly newest: string | null }>(
          'SELECT MIN(timestamp) AS oldest, MAX(timestamp) AS newest FROM impacts'
        )
        .get();

      return {
        impacts: count('SELECT count(*) AS value FROM impacts'),
        indexEntries: count('SELECT count(*) AS value FROM impacts_rtree'),
        unindexedWithCoordinates: count(
          `SELECT count(*) AS value FROM impacts
           WHERE lat IS NOT NULL AND lon IS NOT NULL
             AND rowid NOT IN (SELECT id FROM impacts_rtree)`
        ),
        orphanIndexEntries: count(
          'SELECT count(*) AS value FROM impacts_rtree WHERE id NOT IN (SELECT rowid FROM impacts)'
        ),
        events: this.tableExists('events') ? count('SELECT count(*) AS value FROM events') : 0,
        oldestStrike: bounds?.oldest ?? null,
        newestStrike: bounds?.newest ?? null,
      };
    });
  }

  /**
   * Rebuild the file to return freed pages to the filesystem
   */
  reclaimSpace(): void {
    this.guard('reclaimSpace', () => {
      this.db.exec('VACUUM');
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  /**
   * Run `fn`, mapping SQLite availability errors to StorageUnavailable
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageUnavailable) throw error;
      throw toStorageError(operation, error);
    }
  }
}

function toStrikeRow(row: StrikeDbRow): StrikeRow {
  return {
    timestamp: row.timestamp,
    lat: row.lat,
    lon: row.lon,
    quality: row.quality,
  };
}

function toAuditEvent(row: EventDbRow): AuditEvent {
  let details: unknown = row.details;
  if (row.details !== null) {
    try {
      details = JSON.parse(row.details);
    } catch {
      details = row.details;
    }
  }
  return {
    id: row.id,
    timestamp: row.timestamp,
    kind: row.event_type,
    details,
    period: row.event_period,
  };
}
