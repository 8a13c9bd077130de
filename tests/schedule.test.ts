import { describe, it, expect } from 'vitest';
import seedrandom from 'seedrandom';
import { parseOpeningWindow, projectLegs, projectSchedule } from '../src/schedule';
import { unwrap } from '../src/errors';
import type { OpeningWindow } from '../src/types';

const WINDOW: OpeningWindow = unwrap(parseOpeningWindow('10:00', '18:00'));

function statusAt(departure: string): string | undefined {
  const result = projectSchedule([0], [[0]], { departure, stayMin: [0], windows: [WINDOW] });
  return result.ok ? result.value.stops[0].status : undefined;
}

describe('parseOpeningWindow', () => {
  it('converts HH:mm into seconds since midnight', () => {
    expect(WINDOW).toEqual({ open: '10:00', close: '18:00', openSec: 36000, closeSec: 64800 });
  });

  it('rejects malformed times and inverted windows', () => {
    for (const [open, close] of [
      ['10am', '18:00'],
      ['10:00', '24:00'],
      ['10:60', '18:00'],
      ['18:00', '10:00'],
    ]) {
      const result = parseOpeningWindow(open, close);
      expect(result.ok ? undefined : result.error.code).toBe('INVALID_WINDOW_SPEC');
    }
  });
});

describe('projectSchedule', () => {
  it('classifies arrivals against the opening window', () => {
    expect(statusAt('09:00')).toBe('tooEarly');
    expect(statusAt('19:00')).toBe('tooLate');
    expect(statusAt('12:00')).toBe('onTime');
    expect(statusAt('10:00')).toBe('onTime');
    expect(statusAt('18:00')).toBe('onTime');
  });

  it('walks the tour adding travel and stay times', () => {
    const durations = [
      [0, 600, 1200],
      [600, 0, 900],
      [1200, 900, 0],
    ];
    const result = projectSchedule([0, 2, 1], durations, {
      departure: '09:00',
      stayMin: [0, 30, 15],
      windows: [undefined, WINDOW, undefined],
    });
    expect(result).toEqual({
      ok: true,
      value: {
        stops: [
          { index: 0, arrivalSec: 32400, departureSec: 32400, status: 'onTime', pastMidnight: false },
          { index: 2, arrivalSec: 33600, departureSec: 34500, status: 'onTime', pastMidnight: false },
          { index: 1, arrivalSec: 35400, departureSec: 37200, status: 'tooEarly', pastMidnight: false },
        ],
        warnings: [],
      },
    });
  });

  it('departs each stop exactly one stay after arriving', () => {
    const rng = seedrandom('stays');
    const n = 6;
    const durations = Array.from({ length: n }, (_, i) =>
      Array.from({ length: n }, (_, j) => (i === j ? 0 : Math.round(rng() * 1800))),
    );
    const stayMin = Array.from({ length: n }, () => Math.floor(rng() * 90));
    const tour = [0, 3, 1, 5, 2, 4];
    const schedule = unwrap(projectSchedule(tour, durations, { departure: '08:15', stayMin }));
    expect(schedule.stops.map((s) => s.index)).toEqual(tour);
    for (const stop of schedule.stops) {
      expect(stop.departureSec - stop.arrivalSec).toBe(stayMin[stop.index] * 60);
    }
  });

  it('returns an empty schedule for an empty tour', () => {
    expect(projectSchedule([], [], { departure: '09:00', stayMin: [] })).toEqual({
      ok: true,
      value: { stops: [], warnings: [] },
    });
  });

  it('flags stops reached after midnight', () => {
    const late = unwrap(parseOpeningWindow('09:00', '23:59'));
    const schedule = unwrap(
      projectSchedule(
        [0, 1],
        [
          [0, 3600],
          [3600, 0],
        ],
        { departure: '23:30', stayMin: [0, 0], windows: [undefined, late] },
      ),
    );
    expect(schedule.stops[1]).toEqual({
      index: 1,
      arrivalSec: 88200,
      departureSec: 88200,
      status: 'tooLate',
      pastMidnight: true,
    });
    expect(schedule.warnings).toEqual([
      'schedule crosses midnight: location 1 reached at 00:30+1d; opening hours compared against the departure date',
    ]);
  });

  it('fails on unreachable legs and bad input', () => {
    const unreachable = projectSchedule(
      [0, 1],
      [
        [0, Infinity],
        [Infinity, 0],
      ],
      { departure: '09:00', stayMin: [0, 0] },
    );
    expect(unreachable.ok ? undefined : unreachable.error.code).toBe('NO_FEASIBLE_TOUR');

    const departure = projectSchedule([0], [[0]], { departure: '9 o clock', stayMin: [0] });
    expect(departure.ok ? undefined : departure.error.code).toBe('INVALID_INPUT');

    const outside = projectSchedule([0, 2], [[0]], { departure: '09:00', stayMin: [0] });
    expect(outside.ok ? undefined : outside.error.code).toBe('INVALID_INPUT');
  });
});

describe('projectLegs', () => {
  it('matches projectSchedule given the same legs', () => {
    const durations = [
      [0, 600, 1200],
      [600, 0, 900],
      [1200, 900, 0],
    ];
    const opts = { departure: '09:00', stayMin: [0, 30, 15], windows: [undefined, WINDOW] };
    expect(projectLegs([0, 2, 1], [1200, 900], opts)).toEqual(
      projectSchedule([0, 2, 1], durations, opts),
    );
  });

  it('needs one duration per leg', () => {
    const result = projectLegs([0, 1, 2], [600], { departure: '09:00', stayMin: [] });
    expect(result.ok ? undefined : result.error.code).toBe('INVALID_INPUT');
  });
});
