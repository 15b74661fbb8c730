// ---------------------------------------------------------------------------
// Design errors
// ---------------------------------------------------------------------------
// Raised synchronously before any computation; a failed call returns nothing.

export type FilterDesignErrorCode = 'INVALID_PARAMETER' | 'INVALID_SPECIFICATION';

export class FilterDesignError extends Error {
  constructor(
    public readonly code: FilterDesignErrorCode,
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'FilterDesignError';
  }
}

/** Length, shape parameter, grid size or sample rate out of range. */
export class InvalidParameterError extends FilterDesignError {
  constructor(message: string, field?: string) {
    super('INVALID_PARAMETER', message, field);
    this.name = 'InvalidParameterError';
  }
}

/** Band edges or tolerances that describe no realisable filter. */
export class InvalidSpecificationError extends FilterDesignError {
  constructor(message: string, field?: string) {
    super('INVALID_SPECIFICATION', message, field);
    this.name = 'InvalidSpecificationError';
  }
}

export function isFilterDesignError(err: unknown): err is FilterDesignError {
  return err instanceof FilterDesignError;
}

/** Filter length: integer ≥ 1, odd unless even lengths are allowed. */
export function assertLength(length: number, field = 'order', allowEven = true): void {
  if (!Number.isInteger(length) || length < 1) {
    throw new InvalidParameterError(`${field} must be a positive integer, got ${length}`, field);
  }
  if (!allowEven && length % 2 === 0) {
    throw new InvalidParameterError(`${field} must be odd for a Type I design, got ${length}`, field);
  }
}

/** Normalized frequency strictly inside (0, 1). */
export function assertNormalizedFrequency(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0 || value >= 1) {
    throw new InvalidSpecificationError(`${field} must lie in (0, 1), got ${value}`, field);
  }
}
