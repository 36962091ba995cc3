import { Pollutant } from './pollutants';

/**
 * A single pollutant concentration for a city at an instant.
 * `value` is null when the source had no reading (before imputation).
 */
export interface Measurement {
  readonly city: string;
  readonly timestamp: Date;
  readonly pollutant: Pollutant;
  readonly value: number | null;
}

/**
 * Half-open time range [start, end)
 */
export interface Period {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Mean concentration of one city/pollutant series over one window.
 * `meanValue` is null for a window without any valued measurement.
 */
export interface Aggregate {
  readonly city: string;
  readonly pollutant: Pollutant;
  readonly period: Period;
  readonly meanValue: number | null;
  readonly sampleCount: number;
}

export type ComplianceState = 'Compliant' | 'Non-Compliant' | 'Unknown';

export interface ComplianceStatus {
  readonly city: string;
  readonly pollutant: Pollutant;
  readonly period: Period;
  readonly threshold: number;
  readonly status: ComplianceState;
}

export interface ScoredWindow {
  readonly aggregate: Aggregate;
  readonly status: ComplianceStatus;
}

export interface ScoringOptions {
  /** Window length in milliseconds (default: 24 hours) */
  windowMs?: number;
  /**
   * Offset from UTC used to align window boundaries, e.g. 330 for IST
   * so that 24-hour windows follow Indian calendar days (default: 0)
   */
  utcOffsetMinutes?: number;
}
