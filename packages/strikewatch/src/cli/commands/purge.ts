/**
 * Purge Command
 *
 * Apply the retention policy now. Without a manual window, strikes older
 * than --days are removed; with one, exactly the strikes in
 * [manual-start, manual-end) are removed.
 *
 * Usage:
 *   strikewatch purge [--days 15] [--disable-events-purge]
 *   strikewatch purge --manual-start 2024-06-01 --manual-end 2024-06-02
 */

import type { Command } from 'commander';
import type { StrikewatchConfig } from '../../core/config.js';
import { StrikewatchService, type ServiceOverrides } from '../../core/strikewatch-service.js';
import { parseInstant } from '../../core/time-slots.js';
import type { PurgeOptions as RetentionPurgeOptions } from '../../retention/retention-manager.js';
import { EXIT_CODES, getContext, parseNumberOption, runAction } from '../lib/context.js';
import { formatJson, printOutput } from '../lib/output.js';

export interface PurgeCommandOptions {
  readonly days?: string;
  readonly disableEventsPurge?: boolean;
  readonly manualStart?: string;
  readonly manualEnd?: string;
}

export function registerPurgeCommand(program: Command): void {
  program
    .command('purge')
    .description('Delete expired strikes and audit events')
    .option('--days <n>', 'Maximum strike age in days (default: config)')
    .option('--disable-events-purge', 'Keep every audit event')
    .option('--manual-start <iso>', 'Delete strikes from this instant (inclusive)')
    .option('--manual-end <iso>', 'Delete strikes up to this instant (exclusive)')
    .action(async (options: PurgeCommandOptions) => {
      await runAction(() => executePurge(getContext().config, options));
    });
}

export async function executePurge(
  config: StrikewatchConfig,
  options: PurgeCommandOptions,
  overrides: ServiceOverrides = {}
): Promise<number> {
  if ((options.manualStart === undefined) !== (options.manualEnd === undefined)) {
    throw new RangeError('--manual-start and --manual-end must be given together');
  }

  const request: RetentionPurgeOptions = {
    impactsMaxAgeDays:
      options.days === undefined
        ? undefined
        : parseNumberOption('days', options.days, { min: Number.MIN_VALUE }),
    disableEventPurge: options.disableEventsPurge ? true : undefined,
    manualWindow:
      options.manualStart !== undefined && options.manualEnd !== undefined
        ? { start: parseInstant(options.manualStart), end: parseInstant(options.manualEnd) }
        : undefined,
  };

  const service = StrikewatchService.open(config, overrides);
  try {
    const report = service.retention.purge(request);

    if (config.json) {
      printOutput(formatJson({ success: true, ...report }));
    } else {
      const scope = report.window
        ? `window ${report.window.start} -> ${report.window.end}`
        : `older than ${report.cutoff}`;
      printOutput(`Purged ${report.impactsDeleted} strike(s) ${scope}`);
      printOutput(`Purged ${report.eventsDeleted} audit event(s)`);
    }
    return EXIT_CODES.SUCCESS;
  } finally {
    service.close();
  }
}
