import { getThreshold, Pollutant } from './pollutants';
import {
  Aggregate,
  ComplianceState,
  ComplianceStatus,
  Measurement,
  ScoredWindow,
  ScoringOptions,
} from './compliance.types';
import {
  InvalidInputOrderError,
  InvalidMeasurementError,
  InvalidWindowError,
  MixedSeriesError,
} from './compliance.errors';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

interface SeriesKey {
  city: string;
  pollutant: Pollutant;
}

interface WindowAccumulator {
  start: number;
  sum: number;
  count: number;
}

/**
 * Partition an ordered city/pollutant series into fixed, non-overlapping
 * windows and yield the mean of each window in chronological order.
 *
 * Window boundaries are aligned to `utcOffsetMinutes`, so a 24-hour window
 * with offset 330 covers one IST calendar day. The sequence runs from the
 * window of the first measurement to the window of the last one; windows
 * in between that received nothing are yielded with `meanValue: null`.
 *
 * Validation happens while iterating: an out-of-order, mixed or malformed
 * measurement throws once it is reached, after the windows before it have
 * been yielded.
 *
 * @throws InvalidInputOrderError when timestamps decrease
 * @throws MixedSeriesError when city or pollutant changes
 * @throws InvalidMeasurementError for invalid dates or negative values
 * @throws InvalidWindowError for a non-positive or fractional window
 */
export function* aggregateWindows(
  measurements: Iterable<Measurement>,
  options: ScoringOptions = {},
): Generator<Aggregate, void, undefined> {
  const windowMs = options.windowMs ?? DAY_MS;
  const offsetMinutes = options.utcOffsetMinutes ?? 0;

  if (!Number.isInteger(windowMs) || windowMs <= 0) {
    throw new InvalidWindowError(
      `Window must be a positive whole number of milliseconds, got ${windowMs}`,
    );
  }
  if (!Number.isFinite(offsetMinutes)) {
    throw new InvalidWindowError(`Invalid UTC offset: ${offsetMinutes}`);
  }

  const offsetMs = offsetMinutes * 60_000;
  let series: SeriesKey | undefined;
  let current: WindowAccumulator | undefined;
  let previous: Date | undefined;
  let position = 0;

  for (const measurement of measurements) {
    const ts = measurement.timestamp.getTime();
    if (Number.isNaN(ts)) {
      throw new InvalidMeasurementError(
        position,
        'timestamp is not a valid date',
      );
    }

    const { value } = measurement;
    if (value !== null && (!Number.isFinite(value) || value < 0)) {
      throw new InvalidMeasurementError(
        position,
        `value ${value} must be a finite number >= 0`,
      );
    }

    if (series === undefined) {
      series = { city: measurement.city, pollutant: measurement.pollutant };
    } else if (
      measurement.city !== series.city ||
      measurement.pollutant !== series.pollutant
    ) {
      throw new MixedSeriesError(
        position,
        `${series.city}/${series.pollutant}`,
        `${measurement.city}/${measurement.pollutant}`,
      );
    }

    if (previous !== undefined && ts < previous.getTime()) {
      throw new InvalidInputOrderError(
        position,
        previous,
        measurement.timestamp,
      );
    }

    const start = windowStart(ts, windowMs, offsetMs);
    if (current === undefined) {
      current = { start, sum: 0, count: 0 };
    } else if (start !== current.start) {
      yield toAggregate(series, current, windowMs);

      // Gaps between two populated windows are still part of the span
      for (let gap = current.start + windowMs; gap < start; gap += windowMs) {
        yield toAggregate(series, { start: gap, sum: 0, count: 0 }, windowMs);
      }
      current = { start, sum: 0, count: 0 };
    }

    if (value !== null) {
      current.sum += value;
      current.count++;
    }

    previous = measurement.timestamp;
    position++;
  }

  if (series !== undefined && current !== undefined) {
    yield toAggregate(series, current, windowMs);
  }
}

/**
 * Compare an aggregate against the fixed CPCB limit of its pollutant.
 * A mean equal to the limit is compliant; a window without data is Unknown.
 */
export function classifyAggregate(aggregate: Aggregate): ComplianceStatus {
  const threshold = getThreshold(aggregate.pollutant);
  let status: ComplianceState;

  if (aggregate.meanValue === null) {
    status = 'Unknown';
  } else if (aggregate.meanValue > threshold) {
    status = 'Non-Compliant';
  } else {
    status = 'Compliant';
  }

  return {
    city: aggregate.city,
    pollutant: aggregate.pollutant,
    period: aggregate.period,
    threshold,
    status,
  };
}

/**
 * ComplianceScorer: lazily yields each window's aggregate together with
 * its compliance status.
 *
 * @example
 * for (const { aggregate, status } of scoreCompliance(series)) {
 *   console.log(aggregate.period.start, aggregate.meanValue, status.status);
 * }
 */
export function* scoreCompliance(
  measurements: Iterable<Measurement>,
  options: ScoringOptions = {},
): Generator<ScoredWindow, void, undefined> {
  for (const aggregate of aggregateWindows(measurements, options)) {
    yield { aggregate, status: classifyAggregate(aggregate) };
  }
}

function windowStart(ts: number, windowMs: number, offsetMs: number): number {
  return Math.floor((ts + offsetMs) / windowMs) * windowMs - offsetMs;
}

function toAggregate(
  series: SeriesKey,
  window: WindowAccumulator,
  windowMs: number,
): Aggregate {
  return {
    city: series.city,
    pollutant: series.pollutant,
    period: {
      start: new Date(window.start),
      end: new Date(window.start + windowMs),
    },
    meanValue: window.count > 0 ? window.sum / window.count : null,
    sampleCount: window.count,
  };
}
