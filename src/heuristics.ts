import { fail, ok, type Result } from './errors';
import { tourLength, unreachableLegs, validateMatrix } from './matrix';
import type { CostMatrix, Tour } from './types';

export type TourPhase = 'nearest-neighbor' | '2-opt' | 'search';

export type ProgressFn = (phase: TourPhase, tour: number[], length: number) => void;

export interface TourOptions {
  verbose?: boolean;
  progress?: ProgressFn;
}

export interface BuildTourOptions extends TourOptions {
  start?: number;
}

/**
 * Greedy construction: repeatedly append the cheapest unvisited neighbour of
 * the last stop. Ties go to the lowest index.
 */
export function nearestNeighbor(matrix: CostMatrix, start = 0): number[] {
  const n = matrix.length;
  if (n === 0) return [];
  const visited: boolean[] = Array(n).fill(false);
  visited[start] = true;
  const tour = [start];
  let current = start;
  for (let step = 1; step < n; step++) {
    let next = -1;
    let nextCost = Infinity;
    for (let j = 0; j < n; j++) {
      if (visited[j]) continue;
      const cost = matrix[current][j];
      // first unvisited candidate wins ties, including all-unreachable rows
      if (next === -1 || cost < nextCost) {
        next = j;
        nextCost = cost;
      }
    }
    visited[next] = true;
    tour.push(next);
    current = next;
  }
  return tour;
}

/**
 * First-improvement 2-opt over an open path. Reverses the half-open segment
 * `[i, j)`, so the first stop and the last two positions never move.
 * Returns a new array; the input tour is left untouched.
 */
export function twoOpt(tour: Tour, matrix: CostMatrix, opts: TourOptions = {}): number[] {
  let best = tour.slice();
  let bestLength = tourLength(best, matrix);
  const n = best.length;
  let improved = true;
  while (improved) {
    improved = false;
    outer: for (let i = 1; i < n - 2; i++) {
      for (let j = i + 1; j < n - 1; j++) {
        if (j - i === 1) continue;
        const candidate = best.slice(0, i).concat(best.slice(i, j).reverse(), best.slice(j));
        const length = tourLength(candidate, matrix);
        if (length < bestLength) {
          if (opts.verbose) {
            console.log(`2-opt reverse ${i}..${j - 1}: ${bestLength} -> ${length}`);
          }
          best = candidate;
          bestLength = length;
          opts.progress?.('2-opt', best.slice(), bestLength);
          improved = true;
          break outer;
        }
      }
    }
  }
  return best;
}

/** Largest matrix for which {@link findFinitePath} runs. */
export const MAX_SEARCH_SIZE = 20;

/**
 * Depth-first search for a visiting order from `start` that uses finite
 * legs only. Cheaper legs are tried first; dead (visited set, last stop)
 * states are remembered so each is explored once.
 */
export function findFinitePath(matrix: CostMatrix, start = 0): number[] | undefined {
  const n = matrix.length;
  if (n === 0) return [];
  const full = 2 ** n - 1;
  const dead = new Set<number>();
  const path = [start];

  const extend = (mask: number, last: number): boolean => {
    if (mask === full) return true;
    const key = mask * n + last;
    if (dead.has(key)) return false;
    const next: number[] = [];
    for (let j = 0; j < n; j++) {
      if ((mask & (1 << j)) === 0 && Number.isFinite(matrix[last][j])) next.push(j);
    }
    next.sort((a, b) => matrix[last][a] - matrix[last][b] || a - b);
    for (const j of next) {
      path.push(j);
      if (extend(mask | (1 << j), j)) return true;
      path.pop();
    }
    dead.add(key);
    return false;
  };

  return extend(1 << start, start) ? path : undefined;
}

/**
 * Nearest neighbour followed by 2-opt. When that tour still needs an
 * unreachable leg, falls back to {@link findFinitePath} (improved again by
 * 2-opt) and fails only if no finite order exists.
 */
export function buildTour(matrix: CostMatrix, opts: BuildTourOptions = {}): Result<number[]> {
  const valid = validateMatrix(matrix);
  if (!valid.ok) return valid;
  const n = matrix.length;
  if (n === 0) return ok([]);
  const start = opts.start ?? 0;
  if (!Number.isInteger(start) || start < 0 || start >= n) {
    return fail('INVALID_INPUT', `start index ${start} outside 0..${n - 1}`, { start });
  }

  const initial = nearestNeighbor(matrix, start);
  opts.progress?.('nearest-neighbor', initial.slice(), tourLength(initial, matrix));
  const tour = twoOpt(initial, matrix, opts);

  const legs = unreachableLegs(tour, matrix);
  if (legs.length === 0) return ok(tour);

  const list = legs.map((l) => `${l.from}->${l.to}`).join(', ');
  if (n > MAX_SEARCH_SIZE) {
    return fail(
      'NO_FEASIBLE_TOUR',
      `heuristic tour needs unreachable legs (${list}); no exhaustive search above ${MAX_SEARCH_SIZE} locations`,
      { legs },
    );
  }
  const path = findFinitePath(matrix, start);
  if (!path) {
    return fail(
      'NO_FEASIBLE_TOUR',
      `no visiting order from location ${start} avoids unreachable legs (heuristic tour needed ${list})`,
      { legs },
    );
  }
  opts.progress?.('search', path.slice(), tourLength(path, matrix));
  return ok(twoOpt(path, matrix, opts));
}
