/**
 * Query Command
 *
 * Strikes in [start, end], optionally within a radius of a point or of a
 * geocoded address, printed as a table or JSON and optionally exported.
 *
 * Usage:
 *   strikewatch query --start <iso> --end <iso> [options]
 *
 * Options:
 *   --lat <deg> --lon <deg>  Query centre
 *   --address <text>         Geocode the centre instead
 *   --radius <km>            Radius around the centre (default: 100)
 *   --kmz <file>             Write a Google Earth overlay
 *   --geojson <file>         Write a GeoJSON FeatureCollection
 *   --limit <n>              Maximum rows
 *
 * Examples:
 *   strikewatch query --start 2024-06-01 --end 2024-06-02 --lat 45.76 --lon 4.84 --radius 30
 *   strikewatch query --start 2024-06-01 --end 2024-06-02 --address "Lyon, France" --kmz lyon.kmz
 */

import type { Command } from 'commander';
import type { StrikewatchConfig } from '../../core/config.js';
import { StrikewatchService, type ServiceOverrides } from '../../core/strikewatch-service.js';
import { formatTimestamp, parseInstant } from '../../core/time-slots.js';
import type { GeoPoint, StrikeRow } from '../../core/types.js';
import { writeGeoJSON } from '../../export/geojson.js';
import { writeKmz } from '../../export/kmz-writer.js';
import {
  EXIT_CODES,
  getContext,
  parseIntOption,
  parseNumberOption,
  runAction,
} from '../lib/context.js';
import { formatJson, formatTable, formatters, printOutput, type TableColumn } from '../lib/output.js';

export const DEFAULT_RADIUS_KM = 100;

export interface QueryOptions {
  readonly start: string;
  readonly end: string;
  readonly lat?: string;
  readonly lon?: string;
  readonly address?: string;
  readonly radius?: string;
  readonly kmz?: string;
  readonly geojson?: string;
  readonly limit?: string;
}

const COLUMNS: readonly TableColumn<StrikeRow>[] = [
  { key: 'timestamp', header: 'Timestamp' },
  { key: 'lat', header: 'Lat', align: 'right', formatter: formatters.fixed(4) },
  { key: 'lon', header: 'Lon', align: 'right', formatter: formatters.fixed(4) },
  { key: 'quality', header: 'Quality', align: 'right', formatter: formatters.nullable },
];

export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Query stored strikes by time range and optional radius')
    .requiredOption('--start <iso>', 'Range start (inclusive)')
    .requiredOption('--end <iso>', 'Range end (inclusive)')
    .option('--lat <deg>', 'Centre latitude')
    .option('--lon <deg>', 'Centre longitude')
    .option('--address <text>', 'Geocode the centre from an address')
    .option('--radius <km>', `Radius around the centre (default: ${DEFAULT_RADIUS_KM})`)
    .option('--kmz <file>', 'Write a KMZ overlay')
    .option('--geojson <file>', 'Write a GeoJSON file')
    .option('-l, --limit <n>', 'Maximum rows')
    .action(async (options: QueryOptions) => {
      await runAction(() => executeQuery(getContext().config, options));
    });
}

export async function executeQuery(
  config: StrikewatchConfig,
  options: QueryOptions,
  overrides: ServiceOverrides = {}
): Promise<number> {
  const start = parseInstant(options.start);
  const end = parseInstant(options.end);
  if (start.getTime() > end.getTime()) {
    throw new RangeError(`--start (${formatTimestamp(start)}) is after --end (${formatTimestamp(end)})`);
  }
  const limit = options.limit === undefined ? undefined : parseIntOption('limit', options.limit);
  const radiusKm =
    options.radius === undefined
      ? DEFAULT_RADIUS_KM
      : parseNumberOption('radius', options.radius, { min: 0 });

  if (options.address !== undefined && (options.lat !== undefined || options.lon !== undefined)) {
    throw new RangeError('Use either --lat/--lon or --address, not both');
  }
  if ((options.lat === undefined) !== (options.lon === undefined)) {
    throw new RangeError('--lat and --lon must be given together');
  }

  const service = StrikewatchService.open(config, overrides);
  try {
    let center: GeoPoint | undefined;
    let centerLabel: string | null = null;

    if (options.lat !== undefined && options.lon !== undefined) {
      center = {
        lat: parseNumberOption('lat', options.lat, { min: -90, max: 90 }),
        lon: parseNumberOption('lon', options.lon, { min: -180, max: 180 }),
      };
    } else if (options.address !== undefined) {
      const hit = await service.geocoder.geocode(options.address);
      center = { lat: hit.latitude, lon: hit.longitude };
      centerLabel = hit.label;
    }

    const rows = service.store.queryRange(
      start,
      end,
      center,
      center ? radiusKm : undefined,
      { limit }
    );

    const written: { kmz: string | null; geojson: string | null } = { kmz: null, geojson: null };
    if (options.kmz !== undefined) {
      written.kmz = await writeKmz(rows, options.kmz, {
        name: centerLabel ?? 'impacts',
        center,
        bands: config.quality,
      });
    }
    if (options.geojson !== undefined) {
      await writeGeoJSON(rows, options.geojson);
      written.geojson = options.geojson;
    }

    if (config.json) {
      printOutput(
        formatJson({
          start: formatTimestamp(start),
          end: formatTimestamp(end),
          center: center ? { ...center, label: centerLabel, radiusKm } : null,
          total: rows.length,
          strikes: rows,
          files: written,
        })
      );
    } else {
      if (center) {
        const where = centerLabel ?? `${center.lat}, ${center.lon}`;
        printOutput(`Strikes within ${radiusKm} km of ${where}`);
      }
      printOutput(formatTable(rows, COLUMNS));
      printOutput(`\n${rows.length} strike(s)`);
      if (written.kmz) printOutput(`KMZ written to ${written.kmz}`);
      if (written.geojson) printOutput(`GeoJSON written to ${written.geojson}`);
    }

    return EXIT_CODES.SUCCESS;
  } finally {
    service.close();
  }
}
