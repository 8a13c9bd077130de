export type PlanErrorCode =
  | 'INVALID_MATRIX'
  | 'INVALID_INPUT'
  | 'INVALID_WINDOW_SPEC'
  | 'NO_FEASIBLE_TOUR'
  | 'GEOCODE_FAILED'
  | 'ROUTING_FAILED'
  | 'DELIVERY_FAILED';

export class PlanError extends Error {
  code: PlanErrorCode;
  details?: Record<string, unknown>;
  constructor(code: PlanErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PlanError';
    this.code = code;
    this.details = details;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: PlanError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(
  code: PlanErrorCode,
  message: string,
  details?: Record<string, unknown>,
): Result<T> {
  return { ok: false, error: new PlanError(code, message, details) };
}

/** Return the value or throw the carried error. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
