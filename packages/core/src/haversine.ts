/**
 * Great-circle distance on a spherical Earth.
 */

import type { TrackPoint } from './types.js';

/** Mean Earth radius in meters */
export const EARTH_RADIUS_M = 6_371_000;

const DEG_TO_RAD = Math.PI / 180;

/**
 * Haversine distance in meters between two fixes.
 * Only lat/lon take part; elevation is ignored.
 */
export function haversineDistance(
  a: Pick<TrackPoint, 'lat' | 'lon'>,
  b: Pick<TrackPoint, 'lat' | 'lon'>,
): number {
  const dLat = (b.lat - a.lat) * DEG_TO_RAD;
  const dLon = (b.lon - a.lon) * DEG_TO_RAD;
  const lat1 = a.lat * DEG_TO_RAD;
  const lat2 = b.lat * DEG_TO_RAD;

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;

  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_M * c;
}

/**
 * Running distance from the first point, in meters.
 * Same length as the input; the first entry is 0.
 */
export function cumulativeDistances(points: readonly Pick<TrackPoint, 'lat' | 'lon'>[]): number[] {
  const distances = new Array<number>(points.length);
  let total = 0;
  for (let i = 0; i < points.length; i++) {
    if (i > 0) total += haversineDistance(points[i - 1], points[i]);
    distances[i] = total;
  }
  return distances;
}
