import { describe, it, expect } from 'vitest';
import { chooseCriterion, selectTour } from '../src/select';

const DISTANCE = [
  [0, 10, 5],
  [10, 0, 10],
  [5, 10, 0],
];

describe('chooseCriterion', () => {
  it('prefers the shorter route within the threshold', () => {
    expect(chooseCriterion(100, 105, 10)).toEqual({ criterion: 'distance', diffPct: 5 });
    expect(chooseCriterion(100, 110, 10)).toEqual({ criterion: 'distance', diffPct: 10 });
  });

  it('keeps the fastest route beyond the threshold', () => {
    expect(chooseCriterion(100, 115, 10)).toEqual({ criterion: 'time', diffPct: 15 });
  });

  it('keeps the fastest route when it takes no time', () => {
    expect(chooseCriterion(0, 50, 10)).toEqual({ criterion: 'time' });
  });
});

describe('selectTour', () => {
  it('takes the distance tour when it is 5% slower', () => {
    const duration = [
      [0, 50, 55],
      [50, 0, 50],
      [55, 50, 0],
    ];
    const result = selectTour(DISTANCE, duration, { thresholdPct: 10 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.criterion).toBe('distance');
    expect(result.value.tour).toEqual([0, 2, 1]);
    expect(result.value.totalDurationSec).toBe(105);
    expect(result.value.diffPct).toBe(5);
    expect(result.value.candidates.time).toEqual({ tour: [0, 1, 2], durationSec: 100 });
  });

  it('takes the time tour when the distance tour is 15% slower', () => {
    const duration = [
      [0, 50, 65],
      [50, 0, 50],
      [65, 50, 0],
    ];
    const result = selectTour(DISTANCE, duration, { thresholdPct: 10 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.criterion).toBe('time');
    expect(result.value.tour).toEqual([0, 1, 2]);
    expect(result.value.totalDurationSec).toBe(100);
    expect(result.value.diffPct).toBe(15);
  });

  it('keeps time when every leg takes zero seconds', () => {
    const zero = [
      [0, 0, 0],
      [0, 0, 0],
      [0, 0, 0],
    ];
    const result = selectTour(DISTANCE, zero);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.criterion).toBe('time');
    expect(result.value.totalDurationSec).toBe(0);
    expect(result.value.diffPct).toBeUndefined();
  });

  it('falls back to the time tour when no finite order exists by distance', () => {
    const distance = [
      [0, 1, 2],
      [1, 0, Infinity],
      [2, Infinity, 0],
    ];
    const duration = [
      [0, 60, 120],
      [60, 0, 60],
      [120, 60, 0],
    ];
    const result = selectTour(distance, duration);
    expect(result).toEqual({
      ok: true,
      value: {
        tour: [0, 1, 2],
        criterion: 'time',
        totalDurationSec: 120,
        candidates: { time: { tour: [0, 1, 2], durationSec: 120 } },
      },
    });
  });

  it('fails when no finite order exists by time', () => {
    const duration = [
      [0, 60, Infinity],
      [60, 0, Infinity],
      [Infinity, Infinity, 0],
    ];
    const result = selectTour(DISTANCE, duration);
    expect(result.ok ? undefined : result.error.code).toBe('NO_FEASIBLE_TOUR');
  });

  it('handles one or no locations', () => {
    const one = selectTour([[0]], [[0]]);
    expect(one.ok && one.value.tour).toEqual([0]);
    const none = selectTour([], []);
    expect(none.ok && none.value.tour).toEqual([]);
  });

  it('rejects a negative threshold and mismatched matrices', () => {
    const threshold = selectTour(DISTANCE, DISTANCE, { thresholdPct: -1 });
    expect(threshold.ok ? undefined : threshold.error.code).toBe('INVALID_INPUT');
    const sizes = selectTour(DISTANCE, [[0]]);
    expect(sizes.ok ? undefined : sizes.error.code).toBe('INVALID_MATRIX');
  });
});
