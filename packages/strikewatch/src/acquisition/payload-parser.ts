/**
 * Provider payload decoding.
 *
 * A slot payload is NDJSON, one strike per line, optionally gzipped.
 * Lines that fail to decode are dropped and reported; they never fail
 * the whole unit.
 */

import { gunzipSync } from 'node:zlib';
import { z } from 'zod';
import { ParseFailure } from '../core/errors.js';
import type { StrikeRecord } from '../core/types.js';

const GZIP_MAGIC_0 = 0x1f;
const GZIP_MAGIC_1 = 0x8b;

/**
 * Provider record. `mcg` (maximal circular gap) is the quality figure;
 * `quality` is accepted as an alias. Unknown fields are ignored.
 */
const ProviderRecordSchema = z.object({
  lat: z.number().min(-90).max(90).nullable().optional(),
  lon: z.number().min(-180).max(180).nullable().optional(),
  mcg: z.number().finite().nullable().optional(),
  quality: z.number().finite().nullable().optional(),
});

export interface ParsedPayload {
  readonly records: StrikeRecord[];
  readonly failures: ParseFailure[];
  /** No non-blank line at all */
  readonly empty: boolean;
}

export function isGzip(body: Uint8Array): boolean {
  return body.length >= 2 && body[0] === GZIP_MAGIC_0 && body[1] === GZIP_MAGIC_1;
}

/**
 * Bytes to text, inflating when the variant says so or the magic bytes do
 */
export function decodePayload(body: Buffer, compressed: boolean): string {
  const raw = compressed || isGzip(body) ? gunzipSync(body) : body;
  return raw.toString('utf-8');
}

export function parsePayload(text: string): ParsedPayload {
  const records: StrikeRecord[] = [];
  const failures: ParseFailure[] = [];
  let nonBlank = 0;

  const lines = text.split(/\r?\n/);
  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '') return;
    nonBlank++;

    const lineNumber = index + 1;
    let value: unknown;
    try {
      value = JSON.parse(trimmed);
    } catch (error) {
      failures.push(
        new ParseFailure(lineNumber, error instanceof Error ? error.message : 'invalid JSON')
      );
      return;
    }

    const result = ProviderRecordSchema.safeParse(value);
    if (!result.success) {
      const issue = result.error.issues[0];
      failures.push(
        new ParseFailure(
          lineNumber,
          issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record'
        )
      );
      return;
    }

    const quality = result.data.mcg ?? result.data.quality ?? null;
    records.push({
      lat: result.data.lat ?? null,
      lon: result.data.lon ?? null,
      quality: quality === null ? null : Math.round(quality),
    });
  });

  return { records, failures, empty: nonBlank === 0 };
}
