export type ComplianceErrorCode =
  | 'INVALID_INPUT_ORDER'
  | 'INVALID_MEASUREMENT'
  | 'MIXED_SERIES'
  | 'INVALID_WINDOW';

/**
 * Base class for errors raised while scoring a measurement series.
 */
export class ComplianceError extends Error {
  constructor(
    public readonly code: ComplianceErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ComplianceError';
  }
}

/**
 * Raised when a measurement's timestamp precedes the one before it.
 */
export class InvalidInputOrderError extends ComplianceError {
  constructor(
    public readonly position: number,
    public readonly previous: Date,
    public readonly received: Date,
  ) {
    super(
      'INVALID_INPUT_ORDER',
      `Measurement ${position} at ${received.toISOString()} precedes ${previous.toISOString()}; input must be sorted by timestamp`,
    );
    this.name = 'InvalidInputOrderError';
  }
}

export class InvalidMeasurementError extends ComplianceError {
  constructor(
    public readonly position: number,
    reason: string,
  ) {
    super('INVALID_MEASUREMENT', `Measurement ${position}: ${reason}`);
    this.name = 'InvalidMeasurementError';
  }
}

/**
 * Raised when a series mixes cities or pollutants.
 */
export class MixedSeriesError extends ComplianceError {
  constructor(
    public readonly position: number,
    expected: string,
    received: string,
  ) {
    super(
      'MIXED_SERIES',
      `Measurement ${position} belongs to ${received}, expected ${expected}`,
    );
    this.name = 'MixedSeriesError';
  }
}

export class InvalidWindowError extends ComplianceError {
  constructor(message: string) {
    super('INVALID_WINDOW', message);
    this.name = 'InvalidWindowError';
  }
}
