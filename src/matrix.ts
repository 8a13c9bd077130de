import { fail, ok, type Result } from './errors';
import type { CostMatrix, Tour } from './types';

export const UNREACHABLE = Number.POSITIVE_INFINITY;

/**
 * Check that a matrix is square with non-negative entries. Off-diagonal
 * cells may be {@link UNREACHABLE}; NaN is never accepted.
 */
export function validateMatrix(matrix: CostMatrix, label = 'matrix'): Result<CostMatrix> {
  const n = matrix.length;
  for (let i = 0; i < n; i++) {
    const row = matrix[i];
    if (row.length !== n) {
      return fail('INVALID_MATRIX', `${label} must be square: row ${i} has ${row.length} entries, expected ${n}`, {
        row: i,
      });
    }
    for (let j = 0; j < n; j++) {
      const v = row[j];
      if (Number.isNaN(v) || v < 0) {
        return fail('INVALID_MATRIX', `${label}[${i}][${j}] must be a non-negative number: ${v}`, {
          row: i,
          col: j,
        });
      }
    }
  }
  return ok(matrix);
}

/** Sum of consecutive edge costs along an open path (no closing edge). */
export function tourLength(tour: Tour, matrix: CostMatrix): number {
  let length = 0;
  for (let k = 0; k < tour.length - 1; k++) {
    length += matrix[tour[k]][tour[k + 1]];
  }
  return length;
}

export function unreachableLegs(
  tour: Tour,
  matrix: CostMatrix,
): { from: number; to: number }[] {
  const legs: { from: number; to: number }[] = [];
  for (let k = 0; k < tour.length - 1; k++) {
    if (!Number.isFinite(matrix[tour[k]][tour[k + 1]])) {
      legs.push({ from: tour[k], to: tour[k + 1] });
    }
  }
  return legs;
}
