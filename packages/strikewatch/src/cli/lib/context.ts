/**
 * Shared CLI state: exit codes, the loaded config, error mapping.
 *
 * The program's `preAction` hook loads the config once; commands read it
 * with {@link getContext}.
 */

import type { StrikewatchConfig } from '../../core/config.js';
import {
  ConfigError,
  CredentialsMissing,
  NetworkFailure,
  StorageUnavailable,
} from '../../core/errors.js';
import { describeError } from '../../core/utils/logger.js';
import { GeocodeError, GeocodeErrorCode } from '../../geocoding/types.js';
import { formatJson, printError } from './output.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError || error instanceof CredentialsMissing) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof NetworkFailure) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  if (error instanceof GeocodeError) {
    return error.code === GeocodeErrorCode.NETWORK_ERROR
      ? EXIT_CODES.NETWORK_ERROR
      : EXIT_CODES.ERRORS;
  }
  if (error instanceof StorageUnavailable) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

// ============================================================================
// Global State
// ============================================================================

export interface CliContext {
  readonly config: StrikewatchConfig;
  readonly startTime: number;
}

let globalContext: CliContext | null = null;

export function setContext(context: CliContext): void {
  globalContext = context;
}

export function getContext(): CliContext {
  if (!globalContext) {
    throw new Error('CLI context not initialized; run commands through the program');
  }
  return globalContext;
}

// ============================================================================
// Action helpers
// ============================================================================

/**
 * Run a command body and set the process exit code from its result or
 * from the error it throws
 */
export async function runAction(action: () => Promise<number>): Promise<void> {
  let code: number;
  try {
    code = await action();
  } catch (error) {
    if (globalContext?.config.json) {
      console.log(
        formatJson({
          success: false,
          error: describeError(error),
          type: error instanceof Error ? error.name : 'Error',
        })
      );
    } else {
      printError(describeError(error));
    }
    code = exitCodeFor(error);
  }
  process.exitCode = code;
}

/**
 * @throws {RangeError} When the value is not an integer >= min
 */
export function parseIntOption(name: string, value: string, min = 1): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new RangeError(`--${name} must be an integer >= ${min} (got "${value}")`);
  }
  return parsed;
}

/**
 * @throws {RangeError} When the value is not a finite number in range
 */
export function parseNumberOption(
  name: string,
  value: string,
  range: { min?: number; max?: number } = {}
): number {
  const parsed = Number(value);
  const { min = -Infinity, max = Infinity } = range;
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw new RangeError(`--${name} must be a number between ${min} and ${max} (got "${value}")`);
  }
  return parsed;
}
