/**
 * Init Command
 *
 * Create (or migrate) the strike store and print its statistics.
 *
 * Usage:
 *   strikewatch init [--db <path>]
 */

import type { Command } from 'commander';
import type { StrikewatchConfig } from '../../core/config.js';
import { StrikewatchService, type ServiceOverrides } from '../../core/strikewatch-service.js';
import { EXIT_CODES, getContext, runAction } from '../lib/context.js';
import { formatJson, printOutput } from '../lib/output.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create or migrate the strike database')
    .action(async () => {
      await runAction(() => executeInit(getContext().config));
    });
}

export async function executeInit(
  config: StrikewatchConfig,
  overrides: ServiceOverrides = {}
): Promise<number> {
  const service = StrikewatchService.open(config, overrides);
  try {
    const stats = service.store.stats();

    if (config.json) {
      printOutput(formatJson({ success: true, database: config.paths.database, stats }));
    } else {
      printOutput(`Database ready: ${config.paths.database}`);
      printOutput(`  Strikes:       ${stats.impacts}`);
      printOutput(`  Index entries: ${stats.indexEntries}`);
      printOutput(`  Events:        ${stats.events}`);
      printOutput(`  Oldest strike: ${stats.oldestStrike ?? '-'}`);
      printOutput(`  Newest strike: ${stats.newestStrike ?? '-'}`);
      if (stats.unindexedWithCoordinates > 0 || stats.orphanIndexEntries > 0) {
        printOutput(
          `  Index drift:   ${stats.unindexedWithCoordinates} unindexed, ${stats.orphanIndexEntries} orphaned`
        );
      }
    }
    return EXIT_CODES.SUCCESS;
  } finally {
    service.close();
  }
}
