/**
 * GeoJSON export of query results
 */

import type { Feature, FeatureCollection, Point } from 'geojson';
import type { StrikeRow } from '../core/types.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';

export interface StrikeProperties {
  readonly timestamp: string;
  readonly quality: number | null;
}

/**
 * Point features in [lon, lat] order; rows missing a coordinate are skipped
 */
export function toFeatureCollection(
  rows: readonly StrikeRow[]
): FeatureCollection<Point, StrikeProperties> {
  const features: Feature<Point, StrikeProperties>[] = [];

  for (const row of rows) {
    if (row.lat === null || row.lon === null) continue;
    features.push({
      type: 'Feature',
      geometry: { type: 'Point', coordinates: [row.lon, row.lat] },
      properties: { timestamp: row.timestamp, quality: row.quality },
    });
  }

  return { type: 'FeatureCollection', features };
}

export async function writeGeoJSON(rows: readonly StrikeRow[], outputPath: string): Promise<void> {
  await atomicWriteJSON(outputPath, toFeatureCollection(rows));
}
