/**
 * Command registration
 */

import type { Command } from 'commander';
import { registerDownloadCommand } from './download.js';
import { registerEventsCommand } from './events.js';
import { registerInitCommand } from './init.js';
import { registerPurgeCommand } from './purge.js';
import { registerQueryCommand } from './query.js';
import { registerUpdateCommand } from './update.js';

export { executeDownload, type DownloadOptions } from './download.js';
export { executeEvents, type EventsOptions } from './events.js';
export { executeInit } from './init.js';
export { executePurge, type PurgeCommandOptions } from './purge.js';
export { executeQuery, DEFAULT_RADIUS_KM, type QueryOptions } from './query.js';
export { executeUpdate, type UpdateOptions } from './update.js';

export function registerCommands(program: Command): void {
  registerInitCommand(program);
  registerDownloadCommand(program);
  registerQueryCommand(program);
  registerPurgeCommand(program);
  registerUpdateCommand(program);
  registerEventsCommand(program);
}
