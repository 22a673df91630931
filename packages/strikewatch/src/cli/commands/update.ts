/**
 * Update Command
 *
 * One unattended maintenance run for cron or launchd: ingest what is
 * missing when the last successful sync is stale, purge when the last
 * purge is stale. Exits 0 when every step that ran succeeded, 1 otherwise.
 *
 * Usage:
 *   strikewatch update [--notify desktop|log]
 *
 * Example crontab entry:
 *   0 * * * * cd /srv/strikewatch && strikewatch update --notify log
 */

import type { Command } from 'commander';
import type { NotifierKind, StrikewatchConfig } from '../../core/config.js';
import { StrikewatchService, type ServiceOverrides } from '../../core/strikewatch-service.js';
import { getContext, runAction } from '../lib/context.js';
import { formatJson, printOutput } from '../lib/output.js';

export interface UpdateOptions {
  readonly notify?: string;
}

export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Run the scheduled ingest/purge cycle once')
    .option('--notify <kind>', 'Failure notifications: desktop|log (default: config)')
    .action(async (options: UpdateOptions) => {
      await runAction(() => executeUpdate(getContext().config, options));
    });
}

export async function executeUpdate(
  config: StrikewatchConfig,
  options: UpdateOptions,
  overrides: ServiceOverrides = {}
): Promise<number> {
  const notifier = options.notify === undefined ? undefined : parseNotifier(options.notify);
  const effective: StrikewatchConfig = notifier
    ? { ...config, schedule: { ...config.schedule, notifier } }
    : config;

  const service = StrikewatchService.open(effective, overrides);
  try {
    const report = await service.coordinator.run();

    if (config.json) {
      printOutput(formatJson(report));
    } else {
      printOutput(`Ingest: ${report.ingest}${report.attempts > 0 ? ` (${report.attempts} attempt(s))` : ''}`);
      if (report.lastIngest) {
        printOutput(`  ${report.lastIngest.strikesInserted} new strikes, ${report.lastIngest.start} -> ${report.lastIngest.end}`);
      }
      printOutput(`Purge:  ${report.purge}`);
      if (report.purgeReport) {
        printOutput(`  ${report.purgeReport.impactsDeleted} strikes, ${report.purgeReport.eventsDeleted} events removed`);
      }
    }
    return report.exitCode;
  } finally {
    service.close();
  }
}

function parseNotifier(value: string): NotifierKind {
  if (value !== 'desktop' && value !== 'log') {
    throw new RangeError(`--notify must be desktop or log (got "${value}")`);
  }
  return value;
}
