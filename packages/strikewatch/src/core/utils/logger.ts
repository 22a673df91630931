/**
 * Structured logging utility for Strikewatch
 *
 * Levelled console logger with timestamps and contextual metadata.
 * Pretty single-line output for terminals, JSON lines when
 * NODE_ENV=production or when the CLI runs with --json.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerSettings {
  level: LogLevel;
  pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
};

// Shared by every logger; read from the environment on first use
let settings: LoggerSettings | null = null;

function currentSettings(): LoggerSettings {
  const resolved: LoggerSettings = settings ?? {
    level: getLogLevel(),
    pretty: process.env.NODE_ENV !== 'production',
  };
  settings = resolved;
  return resolved;
}

/**
 * Override level and/or output format for all loggers.
 */
export function configureLogging(overrides: Partial<LoggerSettings>): void {
  const current = currentSettings();
  if (overrides.level !== undefined) current.level = overrides.level;
  if (overrides.pretty !== undefined) current.pretty = overrides.pretty;
}

export class Logger {
  private readonly service: string;

  constructor(service: string) {
    this.service = service;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[currentSettings().level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (currentSettings().pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

export const logger = new Logger('strikewatch');

/**
 * Create a child logger with additional context
 */
export function createLogger(context: LogMetadata): Logger {
  const module = typeof context.module === 'string' ? context.module : 'unknown';
  return new Logger(`strikewatch:${module}`);
}

/**
 * Render an unknown thrown value for log metadata
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
