#!/usr/bin/env tsx
/**
 * Strikewatch CLI Entry Point
 *
 * Archive lightning strikes from the provider into a local SQLite store,
 * query them by time and radius, export KMZ/GeoJSON, and run the
 * unattended update cycle.
 *
 * @module strikewatch-cli
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES, setContext } from '../src/cli/lib/context.js';
import { loadConfig } from '../src/core/config.js';
import { configureLogging, describeError } from '../src/core/utils/logger.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/context.js';

// ============================================================================
// CLI Setup
// ============================================================================

interface GlobalOptions {
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly db?: string;
}

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  try {
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'))
    );
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('strikewatch')
    .description('Lightning strike archive: download, query, export and retention')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: .strikewatchrc)')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--db <path>', 'SQLite database path')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        const config = await loadConfig({
          configPath: options.config,
          overrides: {
            databasePath: options.db,
            verbose: options.verbose,
            json: options.json,
          },
        });
        configureLogging({
          level: config.verbose ? 'debug' : undefined,
          pretty: config.json ? false : undefined,
        });
        setContext({ config, startTime: Date.now() });
      } catch (error) {
        console.error(`Configuration error: ${describeError(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);
  return program;
}

// ============================================================================
// Main
// ============================================================================

loadDotenv();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  });
