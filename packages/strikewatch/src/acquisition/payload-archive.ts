/**
 * Raw payload archive observer.
 *
 * Keeps a copy of every decoded slot payload as `YYYYMMDD_HHMM.json` under
 * the archive directory, so a store can be rebuilt without the provider.
 */

import { join } from 'node:path';
import { archiveFileName } from '../core/time-slots.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import type { IngestObserver } from './ingest-pipeline.js';

const logger = createLogger({ module: 'payload-archive' });

export class PayloadArchive implements IngestObserver {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  pathFor(slot: Date): string {
    return join(this.directory, archiveFileName(slot));
  }

  async onPayload(slot: Date, text: string): Promise<void> {
    const target = this.pathFor(slot);
    await atomicWriteFile(target, text);
    logger.debug('Payload archived', { path: target, bytes: Buffer.byteLength(text) });
  }
}
