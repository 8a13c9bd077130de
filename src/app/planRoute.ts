import { readFileSync } from 'node:fs';
import { MODE_SPEED_KMH } from '../distance';
import { PlanError, unwrap } from '../errors';
import type { ProgressFn } from '../heuristics';
import { emitItinerary, type EmitResult } from '../io/emit';
import { parsePlan } from '../io/parse';
import { createGeocodeCache, geocodeAddress, type GeocodeCache } from '../providers/geocode';
import { computeMatrices, type FetchFn, type RoutedMatrices } from '../providers/routing';
import { projectLegs, projectSchedule } from '../schedule';
import { DEFAULT_THRESHOLD_PCT, selectTour } from '../select';
import { formatDuration, todayIsoDate } from '../time';
import type {
  Coord,
  Itinerary,
  PlanInput,
  PlanMatrices,
  RoutePlan,
  StopInput,
  TravelMode,
} from '../types';

export interface PlanRouteOptions {
  planPath: string;
  departure?: string;
  date?: string;
  thresholdPct?: number;
  mode?: TravelMode;
  offline?: boolean;
  /** estimate travel times when the routing service fails (default on) */
  fallback?: boolean;
  verbose?: boolean;
  progress?: ProgressFn;
  fetch?: FetchFn;
  geocodeCache?: GeocodeCache;
  /** also render a Markdown summary */
  markdown?: boolean;
}

export interface PlanRouteResult extends EmitResult {
  plan: RoutePlan;
}

interface Settings {
  departure: string;
  thresholdPct: number;
  mode: TravelMode;
  offline: boolean;
  fallback: boolean;
  verbose?: boolean;
  progress?: ProgressFn;
  fetch?: FetchFn;
}

/**
 * Coordinates for every stop, geocoding those given only by address or
 * name. Any miss aborts the whole plan.
 */
export async function resolveCoords(
  stops: readonly StopInput[],
  opts: { fetch?: FetchFn; cache?: GeocodeCache } = {},
): Promise<Coord[]> {
  const coords: Coord[] = [];
  for (const stop of stops) {
    if (stop.coord) {
      coords.push(stop.coord);
      continue;
    }
    const result = await geocodeAddress(stop.address ?? stop.name, opts);
    if (!result.ok) {
      throw new PlanError('GEOCODE_FAILED', `Could not locate ${stop.name}: ${result.error.message}`, {
        stop: stop.name,
      });
    }
    coords.push(result.value);
  }
  return coords;
}

function estimateNote(matrices: RoutedMatrices, mode: TravelMode): string[] {
  return matrices.source === 'estimate'
    ? [`travel times estimated from straight-line distance at ${MODE_SPEED_KMH[mode]} km/h`]
    : [];
}

/** Time- and distance-optimised tours, pick one by threshold, then schedule it. */
export function optimiseRoute(
  stops: readonly StopInput[],
  matrices: PlanMatrices,
  settings: Pick<Settings, 'departure' | 'thresholdPct' | 'verbose' | 'progress'>,
): { itinerary: Itinerary; warnings: string[] } {
  const selection = unwrap(
    selectTour(matrices.distanceKm, matrices.durationSec, {
      thresholdPct: settings.thresholdPct,
      verbose: settings.verbose,
      progress: settings.progress,
    }),
  );
  if (settings.verbose) {
    const { time, distance } = selection.candidates;
    const distanceNote = distance
      ? `${distance.tour.join(',')} (${Math.round(distance.durationSec)} s)`
      : 'unreachable';
    console.log(
      `time tour ${time.tour.join(',')} (${Math.round(time.durationSec)} s); distance tour ${distanceNote}`,
    );
  }
  const schedule = unwrap(
    projectSchedule(selection.tour, matrices.durationSec, {
      departure: settings.departure,
      stayMin: stops.map((s) => s.stayMin),
      windows: stops.map((s) => s.window),
    }),
  );
  return {
    itinerary: {
      tour: selection.tour,
      stops: schedule.stops,
      criterion: selection.criterion,
      totalDurationSec: selection.totalDurationSec,
    },
    warnings: schedule.warnings,
  };
}

/**
 * Visit stops in the order given, each leg timed with the mode chosen for
 * the stop it leads to.
 */
export async function sequentialRoute(
  stops: readonly StopInput[],
  coords: readonly Coord[],
  settings: Pick<Settings, 'departure' | 'mode' | 'offline' | 'fallback' | 'fetch'>,
): Promise<{ itinerary: Itinerary; warnings: string[] }> {
  const legs: number[] = [];
  const warnings: string[] = [];
  for (let k = 1; k < stops.length; k++) {
    const mode = stops[k].mode ?? settings.mode;
    const pair = unwrap(
      await computeMatrices([coords[k - 1], coords[k]], mode, {
        offline: settings.offline,
        fallback: settings.fallback,
        fetch: settings.fetch,
      }),
    );
    legs.push(pair.durationSec[0][1]);
    for (const note of estimateNote(pair, mode)) {
      warnings.push(`leg ${k}: ${note}`);
    }
  }
  const fixed = fixedOrderRoute(stops, legs, settings.departure);
  return { itinerary: fixed.itinerary, warnings: [...warnings, ...fixed.warnings] };
}

/** Schedule stops in the order given from one duration per leg. */
export function fixedOrderRoute(
  stops: readonly StopInput[],
  legDurationsSec: readonly number[],
  departure: string,
): { itinerary: Itinerary; warnings: string[] } {
  const order = stops.map((_, i) => i);
  const schedule = unwrap(
    projectLegs(order, legDurationsSec, {
      departure,
      stayMin: stops.map((s) => s.stayMin),
      windows: stops.map((s) => s.window),
    }),
  );
  return {
    itinerary: {
      tour: order,
      stops: schedule.stops,
      criterion: 'custom',
      totalDurationSec: legDurationsSec.reduce((sum, d) => sum + d, 0),
    },
    warnings: schedule.warnings,
  };
}

function legModes(plan: PlanInput, fallbackMode: TravelMode): TravelMode[] {
  return plan.stops.slice(1).map((s) => s.mode ?? fallbackMode);
}

export async function planRoute(opts: PlanRouteOptions): Promise<PlanRouteResult> {
  const raw = readFileSync(opts.planPath, 'utf8');
  const plan = parsePlan(JSON.parse(raw));
  const cfg = plan.config;

  const settings: Settings = {
    departure: opts.departure ?? cfg.departure ?? '09:00',
    thresholdPct: opts.thresholdPct ?? cfg.thresholdPct ?? DEFAULT_THRESHOLD_PCT,
    mode: opts.mode ?? cfg.mode ?? 'walk',
    offline: opts.offline ?? false,
    fallback: opts.fallback ?? true,
    verbose: opts.verbose,
    progress: opts.progress,
    fetch: opts.fetch,
  };
  const date = opts.date ?? cfg.date ?? todayIsoDate();
  const modes = legModes(plan, settings.mode);
  const singleMode = modes.every((m) => m === modes[0]);

  let coords: (Coord | undefined)[];
  let routed: { itinerary: Itinerary; warnings: string[] };
  if (plan.matrices) {
    coords = plan.stops.map((s) => s.coord);
    const { durationSec } = plan.matrices;
    routed = singleMode
      ? optimiseRoute(plan.stops, plan.matrices, settings)
      : fixedOrderRoute(
          plan.stops,
          plan.stops.slice(1).map((_, k) => durationSec[k][k + 1]),
          settings.departure,
        );
  } else {
    const resolved = await resolveCoords(plan.stops, {
      fetch: opts.fetch,
      cache: opts.geocodeCache ?? createGeocodeCache(),
    });
    coords = resolved;
    if (singleMode) {
      const mode = modes[0] ?? settings.mode;
      const matrices = unwrap(
        await computeMatrices(resolved, mode, {
          offline: settings.offline,
          fallback: settings.fallback,
          fetch: settings.fetch,
        }),
      );
      const result = optimiseRoute(plan.stops, matrices, settings);
      routed = { ...result, warnings: [...estimateNote(matrices, mode), ...result.warnings] };
    } else {
      routed = await sequentialRoute(plan.stops, resolved, settings);
    }
  }

  const routePlan: RoutePlan = {
    date,
    itinerary: routed.itinerary,
    names: plan.stops.map((s) => s.name),
    coords,
    warnings: routed.warnings,
    runId: cfg.runId,
    runNote: cfg.runNote,
  };

  const { itinerary } = routePlan;
  console.log(
    [
      `Plan ${date}`,
      `criterion=${itinerary.criterion}`,
      `stops=${itinerary.stops.length}`,
      `travel=${formatDuration(itinerary.totalDurationSec)}`,
      `late=${itinerary.stops.filter((s) => s.status === 'tooLate').length}`,
      `early=${itinerary.stops.filter((s) => s.status === 'tooEarly').length}`,
    ].join(' | '),
  );
  for (const w of routePlan.warnings) {
    console.warn(`warning: ${w}`);
  }

  const emit = emitItinerary(routePlan, new Date().toISOString(), {
    markdown: opts.markdown,
  });
  return { ...emit, plan: routePlan };
}
