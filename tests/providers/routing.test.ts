import { describe, it, expect, vi } from 'vitest';
import { computeMatrices, fetchOsrmTable, osrmProfile } from '../../src/providers/routing';
import type { Coord } from '../../src/types';

const COORDS: Coord[] = [
  [35.1, 139.2],
  [35.3, 139.4],
];

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), init);
}

describe('fetchOsrmTable', () => {
  it('requests a table and converts metres to kilometres', async () => {
    const fetch = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({
        code: 'Ok',
        distances: [
          [0, 1500],
          [1500, 0],
        ],
        durations: [
          [0, 300],
          [null, 0],
        ],
      }),
    );
    const result = await fetchOsrmTable(COORDS, 'drive', { fetch, baseUrl: 'http://osrm.test' });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][0]).toBe(
      'http://osrm.test/table/v1/driving/139.2,35.1;139.4,35.3?annotations=distance,duration',
    );
    expect(result).toEqual({
      ok: true,
      value: {
        distanceKm: [
          [0, 1.5],
          [1.5, 0],
        ],
        durationSec: [
          [0, 300],
          [Infinity, 0],
        ],
      },
    });
  });

  it('routes walking through the foot profile', () => {
    expect(osrmProfile('walk')).toBe('foot');
    expect(osrmProfile('transit')).toBe('foot');
    expect(osrmProfile('drive')).toBe('driving');
  });

  it('reports HTTP errors', async () => {
    const fetch = vi.fn(async () => new Response('busy', { status: 503, statusText: 'Service Unavailable' }));
    const result = await fetchOsrmTable(COORDS, 'walk', { fetch });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('ROUTING_FAILED');
    expect(result.error.message).toBe('OSRM table request failed: 503 Service Unavailable');
  });

  it('rejects a table of the wrong size', async () => {
    const fetch = vi.fn(async () => jsonResponse({ code: 'Ok', distances: [[0]], durations: [[0]] }));
    const result = await fetchOsrmTable(COORDS, 'walk', { fetch });
    expect(result.ok ? undefined : result.error.message).toBe(
      'OSRM returned matrix size mismatch. Expected 2x2',
    );
  });

  it('reports a non-Ok code', async () => {
    const fetch = vi.fn(async () => jsonResponse({ code: 'NoTable' }));
    const result = await fetchOsrmTable(COORDS, 'walk', { fetch });
    expect(result.ok ? undefined : result.error.message).toBe('OSRM returned code NoTable');
  });
});

describe('computeMatrices', () => {
  it('estimates without calling the service when offline', async () => {
    const fetch = vi.fn(async () => jsonResponse({}));
    const result = await computeMatrices(
      [
        [0, 0],
        [0, 1],
      ],
      'walk',
      { offline: true, fetch },
    );
    expect(fetch).not.toHaveBeenCalled();
    expect(result.ok && result.value.source).toBe('estimate');
  });

  it('falls back to an estimate when allowed', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fetch = vi.fn(async () => {
      throw new Error('boom');
    });
    const result = await computeMatrices(
      [
        [0, 0],
        [0, 1],
      ],
      'drive',
      { fetch, fallback: true },
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.source).toBe('estimate');
    expect(result.value.distanceKm[0][1]).toBeCloseTo(111.19, 1);
    expect(warn).toHaveBeenCalledWith(
      'OSRM table request failed: boom; estimating drive times at 40 km/h',
    );
    warn.mockRestore();
  });

  it('returns the failure when fallback is off', async () => {
    const fetch = vi.fn(async () => {
      throw new Error('boom');
    });
    const result = await computeMatrices(COORDS, 'walk', { fetch, fallback: false });
    expect(result.ok ? undefined : result.error.code).toBe('ROUTING_FAILED');
  });

  it('tags service results', async () => {
    const fetch = vi.fn(async () =>
      jsonResponse({
        code: 'Ok',
        distances: [
          [0, 2000],
          [2000, 0],
        ],
        durations: [
          [0, 1400],
          [1400, 0],
        ],
      }),
    );
    const result = await computeMatrices(COORDS, 'walk', { fetch });
    expect(result.ok && result.value.source).toBe('osrm');
    expect(result.ok && result.value.durationSec[1][0]).toBe(1400);
  });
});
