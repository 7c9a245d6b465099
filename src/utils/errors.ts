export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationError';
  }
}

/** A simulation parameter or option is missing, non-finite or out of range. */
export class InvalidParameterError extends SimulationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

/** Pen callbacks arrived out of order, e.g. lineTo before any moveTo. */
export class OutlineProtocolError extends SimulationError {
  constructor(message: string) {
    super(message);
    this.name = 'OutlineProtocolError';
  }
}

export function assertFiniteNumber(value: unknown, field: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParameterError(`${field} must be a finite number, got ${String(value)}`);
  }
}

export function assertPositiveNumber(value: unknown, field: string): asserts value is number {
  assertFiniteNumber(value, field);
  if (value <= 0) {
    throw new InvalidParameterError(`${field} must be positive, got ${value}`);
  }
}

export function assertNonNegativeNumber(value: unknown, field: string): asserts value is number {
  assertFiniteNumber(value, field);
  if (value < 0) {
    throw new InvalidParameterError(`${field} must not be negative, got ${value}`);
  }
}
