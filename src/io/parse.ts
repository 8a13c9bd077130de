import { OpenLocationCode } from 'open-location-code';
import { PlanError, unwrap } from '../errors';
import { parseOpeningWindow } from '../schedule';
import { parseClock } from '../time';
import type {
  Coord,
  PlanConfig,
  PlanInput,
  PlanMatrices,
  StopInput,
  TravelMode,
} from '../types';

const TRAVEL_MODES: readonly TravelMode[] = ['walk', 'drive', 'transit'];

function invalid(message: string): PlanError {
  return new PlanError('INVALID_INPUT', message);
}

function ensureValidCoord(lat: number, lon: number): Coord {
  if (
    Number.isNaN(lat) ||
    Number.isNaN(lon) ||
    lat < -90 ||
    lat > 90 ||
    lon < -180 ||
    lon > 180
  ) {
    throw invalid(`Invalid coordinates: ${lat},${lon}`);
  }
  return [lat, lon];
}

/**
 * Parse a location string into `[lat, lon]` coordinates.
 * Supports `lat,lon`, Plus Codes, and Google Maps URLs containing `@lat,lon`.
 */
export function parseLocation(input: string): Coord {
  const str = input.trim();

  const latLon = str.match(/^(-?\d+(?:\.\d+)?)[,\s]+(-?\d+(?:\.\d+)?)$/);
  if (latLon) {
    return ensureValidCoord(parseFloat(latLon[1]), parseFloat(latLon[2]));
  }

  const urlMatch = str.match(/@(-?\d+(?:\.\d+)?),(-?\d+(?:\.\d+)?)/);
  if (urlMatch) {
    return ensureValidCoord(parseFloat(urlMatch[1]), parseFloat(urlMatch[2]));
  }

  let decoded: { latitudeCenter: number; longitudeCenter: number } | undefined;
  try {
    decoded = OpenLocationCode.decode(str);
  } catch {
    decoded = undefined; // not a full Plus Code
  }
  if (decoded) {
    return ensureValidCoord(decoded.latitudeCenter, decoded.longitudeCenter);
  }

  throw invalid(
    `Unable to parse location: "${input}". Provide lat/lon, a full Plus Code, or a Maps URL with @lat,lon.`,
  );
}

type PlainObj = Record<string, unknown>;

function isPlainObj(value: unknown): value is PlainObj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseTravelMode(value: unknown): TravelMode {
  const mode = String(value).toLowerCase();
  const match = TRAVEL_MODES.find((m) => m === mode);
  if (!match) {
    throw invalid(`Unknown travel mode: ${String(value)} (expected ${TRAVEL_MODES.join(', ')})`);
  }
  return match;
}

function parseCoord(obj: PlainObj): Coord | undefined {
  if (obj.lat !== undefined || obj.lon !== undefined) {
    return ensureValidCoord(Number(obj.lat), Number(obj.lon));
  }
  if (typeof obj.location === 'string') {
    return parseLocation(obj.location);
  }
  return undefined;
}

function parseStop(obj: unknown, label: string, isStart: boolean): StopInput {
  if (!isPlainObj(obj)) {
    throw invalid(`${label} must be an object`);
  }
  const address = typeof obj.address === 'string' && obj.address.trim() ? obj.address.trim() : undefined;
  const name =
    typeof obj.name === 'string' && obj.name.trim() ? obj.name.trim() : address ?? label;
  const stop: StopInput = { name, stayMin: 0 };
  if (address) stop.address = address;

  const coord = parseCoord(obj);
  if (coord) stop.coord = coord;

  if (!isStart) {
    if (obj.stayMin !== undefined) {
      const stay = Number(obj.stayMin);
      if (!Number.isInteger(stay) || stay < 0) {
        throw invalid(`Invalid stayMin for ${name}: ${String(obj.stayMin)}`);
      }
      stop.stayMin = stay;
    }

    const hasOpen = typeof obj.open === 'string' && obj.open.trim() !== '';
    const hasClose = typeof obj.close === 'string' && obj.close.trim() !== '';
    if (hasOpen || hasClose) {
      if (!hasOpen || !hasClose) {
        throw new PlanError(
          'INVALID_WINDOW_SPEC',
          `Opening hours for ${name} need both open and close`,
        );
      }
      stop.window = unwrap(parseOpeningWindow(String(obj.open), String(obj.close)));
    }

    if (obj.mode !== undefined) {
      stop.mode = parseTravelMode(obj.mode);
    }
  }

  return stop;
}

function parseGrid(value: unknown, n: number, label: string): number[][] {
  if (!Array.isArray(value) || value.length !== n) {
    throw invalid(`matrices.${label} must have ${n} rows`);
  }
  return value.map((row, i) => {
    if (!Array.isArray(row) || row.length !== n) {
      throw invalid(`matrices.${label}[${i}] must have ${n} entries`);
    }
    return row.map((cell) => (cell === null ? Infinity : Number(cell)));
  });
}

function parseMatrices(value: unknown, n: number): PlanMatrices {
  if (!isPlainObj(value)) {
    throw invalid('matrices must be an object');
  }
  return {
    distanceKm: parseGrid(value.distanceKm, n, 'distanceKm'),
    durationSec: parseGrid(value.durationSec, n, 'durationSec'),
  };
}

function parsePlanConfig(obj: unknown): PlanConfig {
  const cfg: PlanConfig = {};
  if (!isPlainObj(obj)) return cfg;
  if (obj.departure !== undefined) {
    const departure = String(obj.departure);
    if (parseClock(departure) === undefined) {
      throw invalid(`Invalid departure time: ${departure}`);
    }
    cfg.departure = departure;
  }
  if (obj.date !== undefined) {
    const date = String(obj.date);
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
      throw invalid(`Invalid date (expected YYYY-MM-DD): ${date}`);
    }
    cfg.date = date;
  }
  if (obj.thresholdPct !== undefined) cfg.thresholdPct = Number(obj.thresholdPct);
  if (obj.mode !== undefined) cfg.mode = parseTravelMode(obj.mode);
  if (obj.runId !== undefined) cfg.runId = String(obj.runId);
  if (obj.runNote !== undefined) cfg.runNote = String(obj.runNote);
  return cfg;
}

/**
 * Parse plan JSON into typed structures with validation. The start becomes
 * location 0 and the stops follow in the order given.
 */
export function parsePlan(json: unknown): PlanInput {
  if (!isPlainObj(json)) {
    throw invalid('Plan JSON must be an object');
  }
  const config = parsePlanConfig(json.config);
  const start = parseStop(json.start, 'start', true);
  if (!Array.isArray(json.stops) || json.stops.length === 0) {
    throw invalid('Plan must list at least one stop');
  }
  const stops = json.stops.map((s, i) => parseStop(s, `stop ${i + 1}`, false));

  const plan: PlanInput = { config, stops: [start, ...stops] };
  if (json.matrices !== undefined) {
    plan.matrices = parseMatrices(json.matrices, plan.stops.length);
  }
  return plan;
}
