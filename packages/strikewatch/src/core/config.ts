/**
 * Strikewatch Configuration Management
 *
 * Loads configuration from .strikewatchrc (YAML) with environment variable
 * overrides and defaults. The result is an explicit, frozen object handed
 * to each component's constructor; nothing reads the environment at
 * import time.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (STRIKEWATCH_*)
 * 3. Config file (.strikewatchrc or --config path)
 * 4. Default values
 *
 * @module core/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, CredentialsMissing } from './errors.js';
import { DEFAULT_USER_AGENT } from './http-client.js';
import type { Credentials } from './types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type NotifierKind = 'desktop' | 'log';

export interface ProviderConfig {
  /** Base URL up to (not including) `Strikes_{region}` */
  readonly baseUrl: string;
  readonly region: number;
  readonly username: string | null;
  readonly password: string | null;
  /** Hard timeout per HTTP attempt */
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export interface PathsConfig {
  readonly database: string;
  /** Raw payload archive directory */
  readonly archive: string;
}

export interface IngestConfig {
  /** Worker pool size */
  readonly concurrency: number;
  /** Attempts per payload variant */
  readonly retry: number;
  /** First backoff delay; doubles per attempt */
  readonly retryBaseDelayMs: number;
  /** Oldest data the provider serves */
  readonly maxLookbackDays: number;
  readonly slotMinutes: number;
  readonly archivePayloads: boolean;
}

export interface RetentionConfig {
  readonly impactsMaxAgeDays: number;
  /** Audit events younger than this are never purged */
  readonly eventGraceDays: number;
  readonly disableEventPurge: boolean;
}

export interface ScheduleConfig {
  readonly ingestStalenessHours: number;
  readonly purgeStalenessHours: number;
  /** Retries after the first attempt */
  readonly updateRetries: number;
  readonly updateRetryDelayMs: number;
  /** Distance kept from "now" so the provider has published the slot */
  readonly safetyMarginMinutes: number;
  readonly notifier: NotifierKind;
}

/**
 * KMZ colour bands on the quality (maximal circular gap) value
 */
export interface QualityBands {
  readonly goodBelow: number;
  readonly mediumBelow: number;
}

export interface GeocodingConfig {
  readonly nominatimUrl: string;
  readonly cooldownMs: number;
  readonly language: string;
  readonly userAgent: string;
  /** Enables the Google fallback when set */
  readonly googleApiKey: string | null;
}

export interface StrikewatchConfig {
  readonly version: number;
  readonly provider: ProviderConfig;
  readonly paths: PathsConfig;
  readonly ingest: IngestConfig;
  readonly retention: RetentionConfig;
  readonly schedule: ScheduleConfig;
  readonly quality: QualityBands;
  readonly geocoding: GeocodingConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config file schema (YAML)
// ============================================================================

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const ConfigFileSchema = z
  .object({
    version: positiveInt.optional(),
    provider: z
      .object({
        baseUrl: z.string().url(),
        region: positiveInt,
        username: z.string(),
        password: z.string(),
        timeoutMs: positiveInt,
        userAgent: z.string().min(1),
      })
      .partial()
      .strict()
      .optional(),
    paths: z
      .object({ database: z.string().min(1), archive: z.string().min(1) })
      .partial()
      .strict()
      .optional(),
    ingest: z
      .object({
        concurrency: positiveInt,
        retry: positiveInt,
        retryBaseDelayMs: nonNegativeInt,
        maxLookbackDays: z.number().positive(),
        slotMinutes: positiveInt,
        archivePayloads: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
    retention: z
      .object({
        impactsMaxAgeDays: z.number().positive(),
        eventGraceDays: z.number().nonnegative(),
        disableEventPurge: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
    schedule: z
      .object({
        ingestStalenessHours: z.number().nonnegative(),
        purgeStalenessHours: z.number().nonnegative(),
        updateRetries: nonNegativeInt,
        updateRetryDelayMs: nonNegativeInt,
        safetyMarginMinutes: nonNegativeInt,
        notifier: z.enum(['desktop', 'log']),
      })
      .partial()
      .strict()
      .optional(),
    quality: z
      .object({ goodBelow: z.number(), mediumBelow: z.number() })
      .partial()
      .strict()
      .optional(),
    geocoding: z
      .object({
        nominatimUrl: z.string().url(),
        cooldownMs: nonNegativeInt,
        language: z.string().min(2),
        userAgent: z.string().min(1),
        googleApiKey: z.string(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<StrikewatchConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  provider: {
    baseUrl: 'https://data.blitzortung.org/Data/Protected',
    region: 1,
    username: null,
    password: null,
    timeoutMs: 30_000,
    userAgent: DEFAULT_USER_AGENT,
  },

  paths: {
    database: './data/strikes.db',
    archive: './data/archives',
  },

  ingest: {
    concurrency: 4,
    retry: 3,
    retryBaseDelayMs: 1_000,
    maxLookbackDays: 15,
    slotMinutes: 10,
    archivePayloads: true,
  },

  retention: {
    impactsMaxAgeDays: 15,
    eventGraceDays: 2,
    disableEventPurge: false,
  },

  schedule: {
    ingestStalenessHours: 8,
    purgeStalenessHours: 24,
    updateRetries: 3,
    updateRetryDelayMs: 3_600_000,
    safetyMarginMinutes: 30,
    notifier: 'log',
  },

  quality: {
    goodBelow: 150,
    mediumBelow: 300,
  },

  geocoding: {
    nominatimUrl: 'https://nominatim.openstreetmap.org',
    cooldownMs: 1_100,
    language: 'en',
    userAgent: DEFAULT_USER_AGENT,
    googleApiKey: null,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = ['.strikewatchrc', '.strikewatchrc.yaml', '.strikewatchrc.yml'];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate a config file (YAML, which also covers JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

class EnvReader {
  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[`STRIKEWATCH_${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    return Number.isFinite(num) ? num : undefined;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }
}

/**
 * CLI flag overrides
 */
export interface ConfigOverrides {
  readonly databasePath?: string;
  readonly archiveDir?: string;
  readonly username?: string;
  readonly password?: string;
  readonly concurrency?: number;
  readonly retry?: number;
  readonly archivePayloads?: boolean;
  readonly notifier?: NotifierKind;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  readonly cwd?: string;
  /** Environment to read (default: process.env) */
  readonly env?: Env;
  readonly overrides?: ConfigOverrides;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} When the file is missing, malformed or values are out of range
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<StrikewatchConfig> {
  const env = new EnvReader(options.env ?? process.env);
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let file: ConfigFile = {};

  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    file = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      file = parseConfigFile(configPath);
    }
  }

  const d = DEFAULT_CONFIG;

  const config: StrikewatchConfig = {
    version: file.version ?? d.version,

    provider: {
      baseUrl: env.string('PROVIDER_URL') ?? file.provider?.baseUrl ?? d.provider.baseUrl,
      region: env.number('PROVIDER_REGION') ?? file.provider?.region ?? d.provider.region,
      username:
        overrides.username ??
        env.string('PROVIDER_USERNAME') ??
        file.provider?.username ??
        d.provider.username,
      password:
        overrides.password ??
        env.string('PROVIDER_PASSWORD') ??
        file.provider?.password ??
        d.provider.password,
      timeoutMs: env.number('TIMEOUT') ?? file.provider?.timeoutMs ?? d.provider.timeoutMs,
      userAgent: file.provider?.userAgent ?? d.provider.userAgent,
    },

    paths: {
      database:
        overrides.databasePath ?? env.string('DB_PATH') ?? file.paths?.database ?? d.paths.database,
      archive:
        overrides.archiveDir ?? env.string('ARCHIVE_DIR') ?? file.paths?.archive ?? d.paths.archive,
    },

    ingest: {
      concurrency:
        overrides.concurrency ??
        env.number('CONCURRENCY') ??
        file.ingest?.concurrency ??
        d.ingest.concurrency,
      retry: overrides.retry ?? env.number('RETRY') ?? file.ingest?.retry ?? d.ingest.retry,
      retryBaseDelayMs: file.ingest?.retryBaseDelayMs ?? d.ingest.retryBaseDelayMs,
      maxLookbackDays: file.ingest?.maxLookbackDays ?? d.ingest.maxLookbackDays,
      slotMinutes: file.ingest?.slotMinutes ?? d.ingest.slotMinutes,
      archivePayloads:
        overrides.archivePayloads ??
        env.bool('ARCHIVE') ??
        file.ingest?.archivePayloads ??
        d.ingest.archivePayloads,
    },

    retention: {
      impactsMaxAgeDays:
        env.number('RETENTION_DAYS') ??
        file.retention?.impactsMaxAgeDays ??
        d.retention.impactsMaxAgeDays,
      eventGraceDays: file.retention?.eventGraceDays ?? d.retention.eventGraceDays,
      disableEventPurge: file.retention?.disableEventPurge ?? d.retention.disableEventPurge,
    },

    schedule: {
      ingestStalenessHours:
        file.schedule?.ingestStalenessHours ?? d.schedule.ingestStalenessHours,
      purgeStalenessHours: file.schedule?.purgeStalenessHours ?? d.schedule.purgeStalenessHours,
      updateRetries: file.schedule?.updateRetries ?? d.schedule.updateRetries,
      updateRetryDelayMs: file.schedule?.updateRetryDelayMs ?? d.schedule.updateRetryDelayMs,
      safetyMarginMinutes: file.schedule?.safetyMarginMinutes ?? d.schedule.safetyMarginMinutes,
      notifier: overrides.notifier ?? file.schedule?.notifier ?? d.schedule.notifier,
    },

    quality: {
      goodBelow: file.quality?.goodBelow ?? d.quality.goodBelow,
      mediumBelow: file.quality?.mediumBelow ?? d.quality.mediumBelow,
    },

    geocoding: {
      nominatimUrl: file.geocoding?.nominatimUrl ?? d.geocoding.nominatimUrl,
      cooldownMs: file.geocoding?.cooldownMs ?? d.geocoding.cooldownMs,
      language: file.geocoding?.language ?? d.geocoding.language,
      userAgent: file.geocoding?.userAgent ?? d.geocoding.userAgent,
      googleApiKey:
        env.string('GOOGLE_API_KEY') ?? file.geocoding?.googleApiKey ?? d.geocoding.googleApiKey,
    },

    verbose: overrides.verbose ?? env.bool('VERBOSE') ?? false,
    json: overrides.json ?? false,
    configPath,
  };

  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', issues);
  }

  return Object.freeze(config);
}

/**
 * Range checks that span sources (env and flags bypass the file schema)
 */
export function validateConfig(config: StrikewatchConfig): string[] {
  const issues: string[] = [];
  const { ingest, retention, schedule, quality, provider } = config;

  if (!Number.isInteger(ingest.concurrency) || ingest.concurrency < 1 || ingest.concurrency > 64) {
    issues.push(`ingest.concurrency must be an integer between 1 and 64 (got ${ingest.concurrency})`);
  }
  if (!Number.isInteger(ingest.retry) || ingest.retry < 1) {
    issues.push(`ingest.retry must be a positive integer (got ${ingest.retry})`);
  }
  if (60 % ingest.slotMinutes !== 0) {
    issues.push(`ingest.slotMinutes must divide 60 (got ${ingest.slotMinutes})`);
  }
  if (!(ingest.maxLookbackDays > 0)) {
    issues.push(`ingest.maxLookbackDays must be positive (got ${ingest.maxLookbackDays})`);
  }
  if (!(retention.impactsMaxAgeDays > 0)) {
    issues.push(`retention.impactsMaxAgeDays must be positive (got ${retention.impactsMaxAgeDays})`);
  }
  if (retention.eventGraceDays < 0) {
    issues.push(`retention.eventGraceDays must not be negative (got ${retention.eventGraceDays})`);
  }
  if (schedule.updateRetries < 0 || !Number.isInteger(schedule.updateRetries)) {
    issues.push(`schedule.updateRetries must be a non-negative integer (got ${schedule.updateRetries})`);
  }
  if (quality.goodBelow >= quality.mediumBelow) {
    issues.push(
      `quality.goodBelow (${quality.goodBelow}) must be lower than quality.mediumBelow (${quality.mediumBelow})`
    );
  }
  if (!Number.isInteger(provider.region) || provider.region < 1) {
    issues.push(`provider.region must be a positive integer (got ${provider.region})`);
  }
  if (!(provider.timeoutMs > 0)) {
    issues.push(`provider.timeoutMs must be positive (got ${provider.timeoutMs})`);
  }

  return issues;
}

/**
 * Provider credentials, or CredentialsMissing when either half is absent
 */
export function resolveCredentials(provider: ProviderConfig): Credentials {
  if (!provider.username || !provider.password) {
    throw new CredentialsMissing();
  }
  return { username: provider.username, password: provider.password };
}
