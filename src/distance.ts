import type { Coord, TravelMode } from './types';

const EARTH_RADIUS_KM = 6371.0;

/** Assumed average speed per mode when no routing service answers. */
export const MODE_SPEED_KMH: Record<TravelMode, number> = {
  walk: 5,
  drive: 40,
  transit: 5,
};

// Haversine formula to compute great-circle distance between two points in kilometers
export function haversineKm(a: Coord, b: Coord): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const lat1 = toRad(a[0]);
  const lat2 = toRad(b[0]);
  const dLat = lat2 - lat1;
  const dLon = toRad(b[1] - a[1]);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

export function secondsAtKmh(distanceKm: number, kmh: number): number {
  if (kmh <= 0) {
    throw new Error(`Speed must be greater than 0 km/h: ${kmh}`);
  }
  return (distanceKm / kmh) * 3600;
}

/**
 * Distance (km) and duration (s) matrices from great-circle distances at a
 * constant speed. Only the upper triangle is computed and mirrored.
 */
export function buildHaversineMatrices(
  coords: readonly Coord[],
  speedKmh: number,
): { distanceKm: number[][]; durationSec: number[][] } {
  const n = coords.length;
  const distanceKm: number[][] = Array.from({ length: n }, () => Array<number>(n).fill(0));
  const durationSec: number[][] = Array.from({ length: n }, () => Array<number>(n).fill(0));
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const dist = haversineKm(coords[i], coords[j]);
      const dur = secondsAtKmh(dist, speedKmh);
      distanceKm[i][j] = dist;
      distanceKm[j][i] = dist;
      durationSec[i][j] = dur;
      durationSec[j][i] = dur;
    }
  }
  return { distanceKm, durationSec };
}
