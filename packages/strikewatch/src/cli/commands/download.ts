/**
 * Download Command
 *
 * Ingest every 10-minute slot in [start, end) that the store does not
 * already hold, then run the automatic retention purge.
 *
 * Usage:
 *   strikewatch download <start> <end> [options]
 *
 * Options:
 *   --threads <n>        Concurrent downloads (default: config)
 *   --retry <n>          Attempts per payload variant (default: config)
 *   --login <user>       Provider username
 *   --password <pass>    Provider password
 *   --no-archive         Do not keep raw payloads
 *   --no-purge           Skip the retention purge afterwards
 *
 * Examples:
 *   strikewatch download 2024-06-01T00:00 2024-06-01T06:00
 *   strikewatch download "2024-06-01 00:00" "2024-06-02 00:00" --threads 8 --no-archive
 */

import type { Command } from 'commander';
import { resolveCredentials, type StrikewatchConfig } from '../../core/config.js';
import { StrikewatchService, type ServiceOverrides } from '../../core/strikewatch-service.js';
import { formatTimestamp, parseInstant } from '../../core/time-slots.js';
import { EXIT_CODES, getContext, parseIntOption, runAction } from '../lib/context.js';
import { formatDuration, formatJson, printOutput, printWarning } from '../lib/output.js';
import { ProgressReporter } from '../lib/progress.js';

export interface DownloadOptions {
  readonly threads?: string;
  readonly retry?: string;
  readonly login?: string;
  readonly password?: string;
  readonly archive: boolean;
  readonly purge: boolean;
}

export function registerDownloadCommand(program: Command): void {
  program
    .command('download <start> <end>')
    .description('Download strikes for [start, end) (UTC unless an offset is given)')
    .option('--threads <n>', 'Concurrent downloads')
    .option('--retry <n>', 'Attempts per payload variant')
    .option('--login <user>', 'Provider username')
    .option('--password <pass>', 'Provider password')
    .option('--no-archive', 'Do not archive raw payloads')
    .option('--no-purge', 'Skip the retention purge afterwards')
    .action(async (start: string, end: string, options: DownloadOptions) => {
      await runAction(() => executeDownload(getContext().config, start, end, options));
    });
}

export async function executeDownload(
  config: StrikewatchConfig,
  startArg: string,
  endArg: string,
  options: DownloadOptions,
  overrides: ServiceOverrides = {}
): Promise<number> {
  const start = parseInstant(startArg);
  const end = parseInstant(endArg);
  if (start.getTime() >= end.getTime()) {
    throw new RangeError(`start (${formatTimestamp(start)}) must be before end (${formatTimestamp(end)})`);
  }

  const concurrency = options.threads === undefined ? undefined : parseIntOption('threads', options.threads);
  const maxRetries = options.retry === undefined ? undefined : parseIntOption('retry', options.retry);
  const credentials = resolveCredentials({
    ...config.provider,
    username: options.login ?? config.provider.username,
    password: options.password ?? config.provider.password,
  });

  const effective: StrikewatchConfig = options.archive
    ? config
    : { ...config, ingest: { ...config.ingest, archivePayloads: false } };

  const observers = config.json ? [] : [new ProgressReporter()];
  const service = StrikewatchService.open(effective, {
    ...overrides,
    observers: [...(overrides.observers ?? []), ...observers],
  });

  try {
    const startedAt = Date.now();
    const window = { start: formatTimestamp(start), end: formatTimestamp(end), source: 'manual' };
    service.store.recordEvent('download_attempt', window, end);

    const result = await service.pipeline.ingest({ start, end, credentials, concurrency, maxRetries });
    const allFailed = result.unitsAttempted > 0 && result.unitsSucceeded === 0;

    service.store.recordEvent(
      allFailed ? 'download_error' : 'download_success',
      {
        ...window,
        units_attempted: result.unitsAttempted,
        units_succeeded: result.unitsSucceeded,
        units_failed: result.unitsFailed,
        strikes_inserted: result.strikesInserted,
      },
      end
    );

    const purgeReport = options.purge && !allFailed ? service.retention.purge() : null;
    const durationMs = Date.now() - startedAt;

    if (config.json) {
      printOutput(formatJson({ success: !allFailed, result, purge: purgeReport, durationMs }));
    } else {
      printOutput(`\nWindow:   ${result.start} -> ${result.end}`);
      printOutput(`Slots:    ${result.unitsPlanned} planned, ${result.unitsSkipped} already stored`);
      printOutput(
        `Fetched:  ${result.unitsSucceeded}/${result.unitsAttempted} succeeded, ${result.strikesInserted} new strikes`
      );
      if (purgeReport) {
        printOutput(`Purged:   ${purgeReport.impactsDeleted} strikes, ${purgeReport.eventsDeleted} events`);
      }
      printOutput(`Duration: ${formatDuration(durationMs)}`);
      if (result.unitsFailed > 0) {
        printWarning(`${result.unitsFailed} slot(s) failed; rerun the same range to retry them`);
      }
    }

    return allFailed ? EXIT_CODES.NETWORK_ERROR : EXIT_CODES.SUCCESS;
  } finally {
    service.close();
  }
}
