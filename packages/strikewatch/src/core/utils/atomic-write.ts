/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so a crash mid-write leaves either the old file
 * or the new one, never a truncated payload archive or KMZ.
 *
 * **Pattern:**
 * 1. Write to a temporary sibling (PID + timestamp in the name)
 * 2. Rename over the target (atomic on POSIX)
 * 3. Remove the temporary file if anything fails
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from './logger.js';

/**
 * Atomically write string or binary data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('data/archives/20240601_0010.json', payloadText);
 * await atomicWriteFile('out/strikes.kmz', zipBuffer);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    if (typeof data === 'string') {
      await writeFile(tempPath, data, encoding);
    } else {
      await writeFile(tempPath, data);
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger.debug('Temporary file cleanup skipped', {
        tempPath,
        reason: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, space), 'utf-8');
}
