/**
 * Error taxonomy for mesh generation.
 *
 * Bad input raises InvalidRangeError / InvalidParameterError before any
 * sampling happens. ContractViolationError marks a caller bug (for
 * example a height ring sampled with the wrong vertex count).
 */

/** Domain is empty, reversed or not finite. */
export class InvalidRangeError extends Error {
  readonly start: number;
  readonly end: number;

  constructor(start: number, end: number, what = 'range') {
    super(`Invalid ${what} [${start}, ${end}]: start must be finite and lower than end`);
    this.name = 'InvalidRangeError';
    this.start = start;
    this.end = end;
  }
}

/** A count, ratio or table is outside what the generator accepts. */
export class InvalidParameterError extends Error {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`${parameter}: ${message}`);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
  }
}

/** Internal precondition broken. Not recoverable by retrying with the same call. */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export function requireRange(start: number, end: number, what?: string): void {
  if (!Number.isFinite(start) || !Number.isFinite(end) || !(start < end)) {
    throw new InvalidRangeError(start, end, what);
  }
}

export function requireCount(parameter: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidParameterError(parameter, `must be an integer >= ${min} (got ${value})`);
  }
}

export function requireUnitInterval(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidParameterError(parameter, `must be within [0, 1] (got ${value})`);
  }
}
