/**
 * Arithmetic mean, or null for an empty list
 */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Median, averaging the two middle values for an even count.
 * Returns null for an empty list.
 */
export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

export function presentValues(
  values: ReadonlyArray<number | null>,
): number[] {
  return values.filter((value): value is number => value !== null);
}

/**
 * Quantile with linear interpolation between closest ranks, `p` in 0..1.
 * Returns null for an empty list.
 */
export function quantile(values: readonly number[], p: number): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (sorted.length - 1) * p;
  const lower = Math.floor(rank);
  const upper = Math.min(lower + 1, sorted.length - 1);
  return sorted[lower] + (rank - lower) * (sorted[upper] - sorted[lower]);
}

export interface FiveNumberSummary {
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

export function fiveNumberSummary(
  values: readonly number[],
): FiveNumberSummary | null {
  const [min, q1, med, q3, max] = [0, 0.25, 0.5, 0.75, 1].map((p) =>
    quantile(values, p),
  );
  if (
    min === null ||
    q1 === null ||
    med === null ||
    q3 === null ||
    max === null
  ) {
    return null;
  }
  return { min, q1, median: med, q3, max };
}

export interface HistogramBin {
  lower: number;
  upper: number;
  count: number;
}

/**
 * Equal-width bins from min to max. The last bin includes max; a list
 * of identical values gives one bin.
 */
export function histogram(
  values: readonly number[],
  binCount: number,
): HistogramBin[] {
  if (values.length === 0) {
    return [];
  }
  const min = values.reduce((a, b) => Math.min(a, b));
  const max = values.reduce((a, b) => Math.max(a, b));
  if (min === max) {
    return [{ lower: min, upper: max, count: values.length }];
  }

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    lower: min + i * width,
    upper: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const value of values) {
    const index = Math.min(Math.floor((value - min) / width), binCount - 1);
    bins[index].count++;
  }
  return bins;
}
