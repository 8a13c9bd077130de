import { fail, ok, type Result } from './errors';
import { DAY_SEC, formatClock, parseClock } from './time';
import type {
  CostMatrix,
  FeasibilityStatus,
  OpeningWindow,
  Schedule,
  ScheduledStop,
  Tour,
} from './types';

export interface ProjectOptions {
  /** "HH:mm" departure from the first stop */
  departure: string;
  /** minutes per location index; missing entries count as 0 */
  stayMin: readonly number[];
  windows?: readonly (OpeningWindow | null | undefined)[];
}

/**
 * Build an opening window from two "HH:mm" strings. The close time may equal
 * but not precede the open time.
 */
export function parseOpeningWindow(open: string, close: string): Result<OpeningWindow> {
  const openMin = parseClock(open);
  const closeMin = parseClock(close);
  if (openMin === undefined || closeMin === undefined) {
    return fail('INVALID_WINDOW_SPEC', `opening hours must be HH:mm: "${open}"-"${close}"`, {
      open,
      close,
    });
  }
  if (closeMin < openMin) {
    return fail('INVALID_WINDOW_SPEC', `closing time ${close} is before opening time ${open}`, {
      open,
      close,
    });
  }
  return ok({
    open: open.trim(),
    close: close.trim(),
    openSec: openMin * 60,
    closeSec: closeMin * 60,
  });
}

export function classifyArrival(arrivalSec: number, window?: OpeningWindow | null): FeasibilityStatus {
  if (!window) return 'onTime';
  if (arrivalSec < window.openSec) return 'tooEarly';
  if (arrivalSec > window.closeSec) return 'tooLate';
  return 'onTime';
}

/**
 * Walk a fixed visiting order with one travel duration per leg
 * (`legDurationsSec[k]` is the leg from `order[k]` to `order[k + 1]`).
 * Stops outside their window are still visited and still incur their stay.
 */
export function projectLegs(
  order: Tour,
  legDurationsSec: readonly number[],
  opts: ProjectOptions,
): Result<Schedule> {
  if (order.length === 0) return ok({ stops: [], warnings: [] });
  if (legDurationsSec.length !== order.length - 1) {
    return fail(
      'INVALID_INPUT',
      `expected ${order.length - 1} leg durations for ${order.length} stops, got ${legDurationsSec.length}`,
    );
  }
  const departureMin = parseClock(opts.departure);
  if (departureMin === undefined) {
    return fail('INVALID_INPUT', `departure time must be HH:mm: "${opts.departure}"`);
  }

  const stops: ScheduledStop[] = [];
  const warnings: string[] = [];
  let current = departureMin * 60;
  for (let k = 0; k < order.length; k++) {
    const index = order[k];
    const stay = opts.stayMin[index] ?? 0;
    if (!Number.isFinite(stay) || stay < 0) {
      return fail('INVALID_INPUT', `stay duration for location ${index} must be >= 0: ${stay}`);
    }
    const arrivalSec = current;
    const departureSec = arrivalSec + stay * 60;
    const pastMidnight = arrivalSec >= DAY_SEC;
    if (pastMidnight && !stops.some((s) => s.pastMidnight)) {
      // no day rollover: windows still refer to the departure date
      warnings.push(
        `schedule crosses midnight: location ${index} reached at ${formatClock(arrivalSec)}; opening hours compared against the departure date`,
      );
    }
    stops.push({
      index,
      arrivalSec,
      departureSec,
      status: classifyArrival(arrivalSec, opts.windows?.[index]),
      pastMidnight,
    });

    if (k < order.length - 1) {
      const leg = legDurationsSec[k];
      if (Number.isNaN(leg) || leg < 0) {
        return fail('INVALID_INPUT', `leg ${k} duration must be >= 0: ${leg}`);
      }
      if (!Number.isFinite(leg)) {
        return fail('NO_FEASIBLE_TOUR', `location ${order[k + 1]} is unreachable from ${index}`, {
          from: index,
          to: order[k + 1],
        });
      }
      current = departureSec + leg;
    }
  }
  return ok({ stops, warnings });
}

/** Project a tour using leg durations drawn from one duration matrix (seconds). */
export function projectSchedule(
  tour: Tour,
  durationSec: CostMatrix,
  opts: ProjectOptions,
): Result<Schedule> {
  const n = durationSec.length;
  const outside = tour.find((i) => !Number.isInteger(i) || i < 0 || i >= n);
  if (outside !== undefined) {
    return fail('INVALID_INPUT', `tour index ${outside} outside duration matrix of size ${n}`);
  }
  const legs: number[] = [];
  for (let k = 0; k < tour.length - 1; k++) {
    legs.push(durationSec[tour[k]][tour[k + 1]]);
  }
  return projectLegs(tour, legs, opts);
}
