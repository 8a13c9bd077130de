import seedrandom from 'seedrandom';
import { buildHaversineMatrices } from '../distance';
import { unwrap } from '../errors';
import { buildTour } from '../heuristics';
import { tourLength } from '../matrix';
import { projectSchedule } from '../schedule';
import type { Coord, Tour } from '../types';

export interface SimulateOptions {
  runs?: number;
  /** fixed stop count; otherwise 3-6 per run */
  stops?: number;
  seed?: number;
  speedKmh?: number;
  stayMin?: number;
  departure?: string;
  /** south-west corner of the sampling box */
  origin?: Coord;
  spanDeg?: number;
}

export interface SimulationRun {
  run: number;
  stops: number;
  tour: Tour;
  travelSec: number;
  /** departure from the last stop */
  finishSec: number;
  covered: boolean;
}

/**
 * Random end-to-end plans: scatter stops in a small box, build a tour over
 * straight-line distances and schedule it.
 */
export function simulate(opts: SimulateOptions = {}): SimulationRun[] {
  const rng = seedrandom(String(opts.seed ?? 0));
  const runs = opts.runs ?? 10;
  const [lat0, lon0] = opts.origin ?? [35.6, 139.6];
  const span = opts.spanDeg ?? 0.2;
  const results: SimulationRun[] = [];
  for (let run = 1; run <= runs; run++) {
    const n = opts.stops ?? 3 + Math.floor(rng() * 4);
    const coords: Coord[] = Array.from({ length: n }, () => [
      lat0 + rng() * span,
      lon0 + rng() * span,
    ]);
    const { distanceKm, durationSec } = buildHaversineMatrices(coords, opts.speedKmh ?? 40);
    const tour = unwrap(buildTour(distanceKm));
    const schedule = unwrap(
      projectSchedule(tour, durationSec, {
        departure: opts.departure ?? '09:00',
        stayMin: Array<number>(n).fill(opts.stayMin ?? 10),
      }),
    );
    const last = schedule.stops[schedule.stops.length - 1];
    results.push({
      run,
      stops: n,
      tour,
      travelSec: tourLength(tour, durationSec),
      finishSec: last ? last.departureSec : 0,
      covered: schedule.stops.length === n,
    });
  }
  return results;
}
