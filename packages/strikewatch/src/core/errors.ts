/**
 * Strikewatch Error Types
 *
 * Structured failures raised by the ingest pipeline, the spatial store and
 * the update coordinator. Callers branch on `instanceof`; the readonly
 * fields carry what the logs and the audit trail need.
 */

/**
 * A payload could not be fetched after every attempt on every variant.
 *
 * The unit is marked failed; the run continues with the other units.
 */
export class NetworkFailure extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly attempts: number,
    public readonly cause: Error
  ) {
    super(message);
    this.name = 'NetworkFailure';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NetworkFailure);
    }
  }
}

/**
 * One payload line could not be decoded into a strike record.
 *
 * Collected per unit; never thrown out of the pipeline.
 */
export class ParseFailure extends Error {
  constructor(
    public readonly lineNumber: number,
    public readonly reason: string
  ) {
    super(`Line ${lineNumber}: ${reason}`);
    this.name = 'ParseFailure';
  }
}

/**
 * The SQLite store is busy, locked, full, read-only or unreachable.
 *
 * RECOVERY:
 * - Ingest stops dispatching new units and rethrows
 * - Purge aborts; the next scheduled purge retries
 * - The coordinator treats it as a failed attempt and retries later
 */
export class StorageUnavailable extends Error {
  constructor(
    public readonly operation: string,
    public readonly code: string | null,
    public readonly cause: Error
  ) {
    super(`Storage unavailable during ${operation}${code ? ` (${code})` : ''}: ${cause.message}`);
    this.name = 'StorageUnavailable';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StorageUnavailable);
    }
  }
}

/**
 * Provider username/password are not configured.
 */
export class CredentialsMissing extends Error {
  constructor(message = 'Provider credentials are not configured (set STRIKEWATCH_PROVIDER_USERNAME and STRIKEWATCH_PROVIDER_PASSWORD)') {
    super(message);
    this.name = 'CredentialsMissing';
  }
}

/**
 * Another process added the same column between our check and our ALTER.
 *
 * Logged only: the schema ends up in the desired state either way.
 */
export class SchemaMigrationRace extends Error {
  constructor(
    public readonly table: string,
    public readonly column: string
  ) {
    super(`Column ${table}.${column} was added concurrently`);
    this.name = 'SchemaMigrationRace';
  }
}

/**
 * Invalid configuration file or values.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// SQLite error classification
// ============================================================================

const UNAVAILABLE_CODE_PREFIXES = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_FULL',
  'SQLITE_IOERR',
  'SQLITE_CANTOPEN',
  'SQLITE_READONLY',
] as const;

/**
 * Extract the SQLite result code from a thrown value, if it has one
 */
export function sqliteErrorCode(error: unknown): string | null {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_')
  ) {
    return error.code;
  }
  return null;
}

export function isStorageUnavailableCode(code: string | null): boolean {
  return code !== null && UNAVAILABLE_CODE_PREFIXES.some((prefix) => code.startsWith(prefix));
}

/**
 * Map a thrown value from better-sqlite3 to the error callers should see.
 *
 * Availability failures become {@link StorageUnavailable}; anything else
 * is returned unchanged (wrapped in Error if it was not one).
 */
export function toStorageError(operation: string, error: unknown): Error {
  const cause = error instanceof Error ? error : new Error(String(error));
  const code = sqliteErrorCode(error);
  if (isStorageUnavailableCode(code)) {
    return new StorageUnavailable(operation, code, cause);
  }
  return cause;
}
