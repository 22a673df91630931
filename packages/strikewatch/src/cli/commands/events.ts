/**
 * Events Command
 *
 * List audit trail entries, most recent first.
 *
 * Usage:
 *   strikewatch events [--kind download_success] [--limit 20]
 */

import type { Command } from 'commander';
import type { StrikewatchConfig } from '../../core/config.js';
import { StrikewatchService, type ServiceOverrides } from '../../core/strikewatch-service.js';
import { EVENT_KINDS, isEventKind, type AuditEvent, type EventKind } from '../../core/types.js';
import { EXIT_CODES, getContext, parseIntOption, runAction } from '../lib/context.js';
import { formatJson, formatTable, formatters, printOutput, type TableColumn } from '../lib/output.js';

export interface EventsOptions {
  readonly kind?: string;
  readonly limit: string;
}

const COLUMNS: readonly TableColumn<AuditEvent>[] = [
  { key: 'id', header: 'ID', align: 'right' },
  { key: 'timestamp', header: 'Recorded' },
  { key: 'kind', header: 'Kind' },
  { key: 'period', header: 'Period', formatter: formatters.nullable },
  { key: 'details', header: 'Details', width: 60, formatter: (value) => JSON.stringify(value) },
];

export function registerEventsCommand(program: Command): void {
  program
    .command('events')
    .description('List audit events')
    .option('--kind <kind>', `Filter by kind: ${EVENT_KINDS.join('|')}`)
    .option('-l, --limit <n>', 'Maximum entries', '50')
    .action(async (options: EventsOptions) => {
      await runAction(() => executeEvents(getContext().config, options));
    });
}

export async function executeEvents(
  config: StrikewatchConfig,
  options: EventsOptions,
  overrides: ServiceOverrides = {}
): Promise<number> {
  const limit = parseIntOption('limit', options.limit);
  const kind = options.kind === undefined ? undefined : validateKind(options.kind);

  const service = StrikewatchService.open(config, overrides);
  try {
    const events = service.store.listEvents({ kind, limit });
    printOutput(
      config.json ? formatJson({ total: events.length, events }) : formatTable(events, COLUMNS)
    );
    return EXIT_CODES.SUCCESS;
  } finally {
    service.close();
  }
}

function validateKind(kind: string): EventKind {
  if (!isEventKind(kind)) {
    throw new RangeError(`Invalid event kind: ${kind}. Must be one of: ${EVENT_KINDS.join(', ')}`);
  }
  return kind;
}
