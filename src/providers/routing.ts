import { fail, ok, type Result } from '../errors';
import { buildHaversineMatrices, MODE_SPEED_KMH } from '../distance';
import type { Coord, PlanMatrices, TravelMode } from '../types';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

const OSRM_URL = process.env.OSRM_URL || 'https://router.project-osrm.org';

export interface RoutingOptions {
  fetch?: FetchFn;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface MatrixOptions extends RoutingOptions {
  /** skip the routing service and estimate straight away */
  offline?: boolean;
  /** estimate from great-circle distance when the service fails */
  fallback?: boolean;
}

export interface RoutedMatrices extends PlanMatrices {
  source: 'osrm' | 'estimate';
}

export function osrmProfile(mode: TravelMode): 'driving' | 'foot' {
  return mode === 'drive' ? 'driving' : 'foot';
}

function readGrid(value: unknown, n: number, divisor: number): number[][] | undefined {
  if (!Array.isArray(value) || value.length !== n) return undefined;
  const grid: number[][] = [];
  for (const row of value) {
    if (!Array.isArray(row) || row.length !== n) return undefined;
    const out: number[] = [];
    for (const cell of row) {
      if (cell === null) {
        out.push(Infinity);
      } else if (typeof cell === 'number') {
        out.push(cell / divisor);
      } else {
        return undefined;
      }
    }
    grid.push(out);
  }
  return grid;
}

/**
 * Query the OSRM table service for distance (km) and duration (s) matrices.
 * Cells OSRM cannot route come back as `Infinity`.
 */
export async function fetchOsrmTable(
  coords: readonly Coord[],
  mode: TravelMode,
  opts: RoutingOptions = {},
): Promise<Result<PlanMatrices>> {
  if (coords.length === 0) return ok({ distanceKm: [], durationSec: [] });
  const doFetch = opts.fetch ?? fetch;
  // OSRM expects lon,lat pairs separated by semicolons
  const locs = coords.map(([lat, lon]) => `${lon},${lat}`).join(';');
  const url = `${opts.baseUrl ?? OSRM_URL}/table/v1/${osrmProfile(mode)}/${locs}?annotations=distance,duration`;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), opts.timeoutMs ?? 30000);
  let data: unknown;
  try {
    const res = await doFetch(url, { signal: controller.signal });
    if (!res.ok) {
      return fail('ROUTING_FAILED', `OSRM table request failed: ${res.status} ${res.statusText}`, {
        status: res.status,
      });
    }
    data = await res.json();
  } catch (err) {
    return fail('ROUTING_FAILED', `OSRM table request failed: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    clearTimeout(timeoutId);
  }

  if (typeof data !== 'object' || data === null) {
    return fail('ROUTING_FAILED', 'OSRM returned a non-object body');
  }
  if ('code' in data && data.code !== 'Ok') {
    return fail('ROUTING_FAILED', `OSRM returned code ${String(data.code)}`);
  }
  const distanceKm = readGrid('distances' in data ? data.distances : undefined, coords.length, 1000);
  const durationSec = readGrid('durations' in data ? data.durations : undefined, coords.length, 1);
  if (!distanceKm || !durationSec) {
    return fail(
      'ROUTING_FAILED',
      `OSRM returned matrix size mismatch. Expected ${coords.length}x${coords.length}`,
    );
  }
  return ok({ distanceKm, durationSec });
}

/**
 * Routing service first; on failure fall back to a constant-speed estimate
 * only when the caller allows it.
 */
export async function computeMatrices(
  coords: readonly Coord[],
  mode: TravelMode,
  opts: MatrixOptions = {},
): Promise<Result<RoutedMatrices>> {
  const estimate = (): Result<RoutedMatrices> =>
    ok({ ...buildHaversineMatrices(coords, MODE_SPEED_KMH[mode]), source: 'estimate' });

  if (opts.offline) return estimate();
  const table = await fetchOsrmTable(coords, mode, opts);
  if (table.ok) return ok({ ...table.value, source: 'osrm' });
  if (!opts.fallback) return table;
  console.warn(
    `${table.error.message}; estimating ${mode} times at ${MODE_SPEED_KMH[mode]} km/h`,
  );
  return estimate();
}
