export type Coord = readonly [number, number];

/** Square table of non-negative travel costs; `Infinity` marks an unreachable leg. */
export type CostMatrix = readonly (readonly number[])[];

export type Tour = readonly number[];

export type TravelMode = 'walk' | 'drive' | 'transit';

export type FeasibilityStatus = 'onTime' | 'tooEarly' | 'tooLate';

export type Criterion = 'time' | 'distance' | 'custom';

export interface OpeningWindow {
  open: string; // "HH:mm"
  close: string; // "HH:mm"
  openSec: number;
  closeSec: number;
}

export interface ScheduledStop {
  index: number;
  /** seconds since midnight of the reference date */
  arrivalSec: number;
  departureSec: number;
  status: FeasibilityStatus;
  pastMidnight: boolean;
}

export interface Schedule {
  stops: ScheduledStop[];
  warnings: string[];
}

export interface Itinerary {
  tour: Tour;
  stops: ScheduledStop[];
  criterion: Criterion;
  totalDurationSec: number;
}

export interface StopInput {
  name: string;
  address?: string;
  coord?: Coord;
  stayMin: number;
  window?: OpeningWindow;
  mode?: TravelMode;
}

export interface PlanConfig {
  departure?: string;
  date?: string;
  thresholdPct?: number;
  mode?: TravelMode;
  runId?: string;
  runNote?: string;
}

export interface PlanMatrices {
  distanceKm: number[][];
  durationSec: number[][];
}

export interface PlanInput {
  config: PlanConfig;
  /** index 0 is the start */
  stops: StopInput[];
  matrices?: PlanMatrices;
}

export interface RoutePlan {
  /** reference date of every timestamp, "YYYY-MM-DD" */
  date: string;
  itinerary: Itinerary;
  /** per location index; coordinates may be unknown when matrices were supplied */
  names: string[];
  coords: (Coord | undefined)[];
  warnings: string[];
  runId?: string;
  runNote?: string;
}
