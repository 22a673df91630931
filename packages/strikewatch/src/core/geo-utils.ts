/**
 * Geographic helpers for radius queries.
 *
 * The degree box is a cheap pre-filter for the R*Tree; exact distances use
 * turf's haversine so the final filter agrees with what map tools show.
 */

import { distance, point } from '@turf/turf';
import type { GeoPoint } from './types.js';

/** Kilometres per degree of latitude used for the pre-filter box */
export const KM_PER_DEGREE = 111;

/** Lower bound on cos(lat) so the longitude span stays finite near the poles */
const MIN_COS_LAT = 0.01;

export interface BoundingBox {
  readonly minLat: number;
  readonly maxLat: number;
  readonly minLon: number;
  readonly maxLon: number;
}

/**
 * Degree box around `center` that contains every point within `radiusKm`.
 *
 * dLat = r / 111, dLon = r / (111 * max(0.01, cos(lat)))
 */
export function boundingBoxAround(center: GeoPoint, radiusKm: number): BoundingBox {
  const dLat = radiusKm / KM_PER_DEGREE;
  const cosLat = Math.cos((center.lat * Math.PI) / 180);
  const dLon = radiusKm / (KM_PER_DEGREE * Math.max(MIN_COS_LAT, cosLat));

  return {
    minLat: center.lat - dLat,
    maxLat: center.lat + dLat,
    minLon: center.lon - dLon,
    maxLon: center.lon + dLon,
  };
}

export interface LongitudeRange {
  readonly minLon: number;
  readonly maxLon: number;
}

/**
 * Longitude intervals a box covers once wrapped into [-180, 180]. A box
 * that crosses the antimeridian gives two.
 */
export function longitudeRanges(box: BoundingBox): LongitudeRange[] {
  if (box.maxLon - box.minLon >= 360) {
    return [{ minLon: -180, maxLon: 180 }];
  }
  if (box.minLon < -180) {
    return [
      { minLon: box.minLon + 360, maxLon: 180 },
      { minLon: -180, maxLon: box.maxLon },
    ];
  }
  if (box.maxLon > 180) {
    return [
      { minLon: box.minLon, maxLon: 180 },
      { minLon: -180, maxLon: box.maxLon - 360 },
    ];
  }
  return [{ minLon: box.minLon, maxLon: box.maxLon }];
}

/**
 * Great-circle distance in kilometres
 */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  return distance(point([a.lon, a.lat]), point([b.lon, b.lat]), { units: 'kilometers' });
}

export function isValidCoordinate(p: GeoPoint): boolean {
  return (
    Number.isFinite(p.lat) &&
    Number.isFinite(p.lon) &&
    p.lat >= -90 &&
    p.lat <= 90 &&
    p.lon >= -180 &&
    p.lon <= 180
  );
}
