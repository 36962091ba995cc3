import { Measurement } from '../compliance';
import { median, presentValues } from './statistics';

/**
 * Fill missing values of one city/pollutant series with the median of the
 * values that are present. Order and timestamps are kept; the input array
 * is not modified. A series with no value at all is returned as is.
 */
export function imputeMedian(series: readonly Measurement[]): Measurement[] {
  const fill = median(presentValues(series.map((m) => m.value)));
  if (fill === null) {
    return [...series];
  }
  return series.map((m) => (m.value === null ? { ...m, value: fill } : m));
}
