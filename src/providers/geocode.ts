import { LruCache } from '../cache';
import { fail, ok, type Result } from '../errors';
import type { Coord } from '../types';
import type { FetchFn } from './routing';

const NOMINATIM_URL = process.env.NOMINATIM_URL || 'https://nominatim.openstreetmap.org';

export const DEFAULT_GEOCODE_CACHE_SIZE = 128;

export type GeocodeCache = LruCache<string, Coord>;

export function createGeocodeCache(capacity = DEFAULT_GEOCODE_CACHE_SIZE): GeocodeCache {
  return new LruCache<string, Coord>(capacity);
}

export interface GeocodeOptions {
  fetch?: FetchFn;
  baseUrl?: string;
  /** owned by the caller; only successful lookups are stored */
  cache?: GeocodeCache;
  userAgent?: string;
  timeoutMs?: number;
}

function firstCoord(data: unknown): Coord | undefined {
  if (!Array.isArray(data) || data.length === 0) return undefined;
  const first: unknown = data[0];
  if (typeof first !== 'object' || first === null) return undefined;
  if (!('lat' in first) || !('lon' in first)) return undefined;
  const lat = parseFloat(String(first.lat));
  const lon = parseFloat(String(first.lon));
  if (Number.isNaN(lat) || Number.isNaN(lon)) return undefined;
  return [lat, lon];
}

/**
 * Resolve a free-form address to `[lat, lon]` with the Nominatim search API.
 */
export async function geocodeAddress(
  address: string,
  opts: GeocodeOptions = {},
): Promise<Result<Coord>> {
  const query = address.trim();
  if (!query) {
    return fail('GEOCODE_FAILED', 'Cannot geocode an empty address');
  }
  const cached = opts.cache?.get(query);
  if (cached) return ok(cached);

  const doFetch = opts.fetch ?? fetch;
  const url = `${opts.baseUrl ?? NOMINATIM_URL}/search?q=${encodeURIComponent(query)}&format=json&limit=1`;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), opts.timeoutMs ?? 10000);
  let data: unknown;
  try {
    const res = await doFetch(url, {
      signal: controller.signal,
      headers: { 'User-Agent': opts.userAgent ?? 'tourplan/0.1 (route planner)' },
    });
    if (!res.ok) {
      return fail('GEOCODE_FAILED', `Geocoding "${query}" failed: ${res.status} ${res.statusText}`, {
        address: query,
        status: res.status,
      });
    }
    data = await res.json();
  } catch (err) {
    const reason =
      err instanceof Error && err.name === 'AbortError'
        ? 'timed out'
        : err instanceof Error
          ? err.message
          : String(err);
    return fail('GEOCODE_FAILED', `Geocoding "${query}" failed: ${reason}`, { address: query });
  } finally {
    clearTimeout(timeoutId);
  }

  const coord = firstCoord(data);
  if (!coord) {
    return fail('GEOCODE_FAILED', `No match for address "${query}"`, { address: query });
  }
  opts.cache?.set(query, coord);
  return ok(coord);
}
