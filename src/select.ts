import { fail, ok, type Result } from './errors';
import { buildTour, type TourOptions } from './heuristics';
import { tourLength } from './matrix';
import type { CostMatrix, Tour } from './types';

export const DEFAULT_THRESHOLD_PCT = 10;

export interface SelectOptions extends TourOptions {
  start?: number;
  thresholdPct?: number;
}

export interface TourCandidate {
  tour: Tour;
  durationSec: number;
}

export interface Selection {
  tour: Tour;
  criterion: 'time' | 'distance';
  totalDurationSec: number;
  /** undefined when the time-optimised tour takes no time at all */
  diffPct?: number;
  /** `distance` is absent when no finite order exists over the distance matrix */
  candidates: { time: TourCandidate; distance?: TourCandidate };
}

/**
 * Prefer the shorter-distance tour when it costs at most `thresholdPct`
 * percent more time than the fastest one.
 */
export function chooseCriterion(
  timeTourSec: number,
  distanceTourSec: number,
  thresholdPct: number,
): { criterion: 'time' | 'distance'; diffPct?: number } {
  if (timeTourSec === 0) {
    return { criterion: 'time' };
  }
  const diffPct = (Math.abs(timeTourSec - distanceTourSec) * 100) / timeTourSec;
  return { criterion: diffPct <= thresholdPct ? 'distance' : 'time', diffPct };
}

export function selectTour(
  distanceKm: CostMatrix,
  durationSec: CostMatrix,
  opts: SelectOptions = {},
): Result<Selection> {
  const thresholdPct = opts.thresholdPct ?? DEFAULT_THRESHOLD_PCT;
  if (!Number.isFinite(thresholdPct) || thresholdPct < 0) {
    return fail('INVALID_INPUT', `threshold must be a non-negative percentage: ${thresholdPct}`);
  }
  if (distanceKm.length !== durationSec.length) {
    return fail(
      'INVALID_MATRIX',
      `distance and duration matrices differ in size: ${distanceKm.length} vs ${durationSec.length}`,
    );
  }

  const timeTour = buildTour(durationSec, opts);
  if (!timeTour.ok) return timeTour;
  const time: TourCandidate = {
    tour: timeTour.value,
    durationSec: tourLength(timeTour.value, durationSec),
  };

  const distanceTour = buildTour(distanceKm, opts);
  if (!distanceTour.ok) {
    if (distanceTour.error.code !== 'NO_FEASIBLE_TOUR') return distanceTour;
    const fastest: Selection = {
      tour: time.tour,
      criterion: 'time',
      totalDurationSec: time.durationSec,
      candidates: { time },
    };
    return ok(fastest);
  }
  const distance: TourCandidate = {
    tour: distanceTour.value,
    durationSec: tourLength(distanceTour.value, durationSec),
  };
  // an unreachable leg on the distance tour gives an infinite diff, so time wins
  const { criterion, diffPct } = chooseCriterion(
    time.durationSec,
    distance.durationSec,
    thresholdPct,
  );
  const chosen = criterion === 'distance' ? distance : time;
  return ok({
    tour: chosen.tour,
    criterion,
    totalDurationSec: chosen.durationSec,
    diffPct,
    candidates: { time, distance },
  });
}
