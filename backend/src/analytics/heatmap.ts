import { Measurement } from '../compliance';
import { mean } from './statistics';

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export interface Heatmap {
  days: readonly Weekday[];
  hours: number[];
  /** values[day][hour], null where no reading fell in the cell */
  values: Array<Array<number | null>>;
}

/**
 * Mean concentration per weekday and hour of day, read in local time
 * given by `utcOffsetMinutes`.
 */
export function buildHeatmap(
  measurements: Iterable<Measurement>,
  utcOffsetMinutes: number,
): Heatmap {
  const buckets: number[][][] = WEEKDAYS.map(() =>
    Array.from({ length: 24 }, () => []),
  );
  const offsetMs = utcOffsetMinutes * 60_000;

  for (const { timestamp, value } of measurements) {
    if (value === null) continue;
    const local = new Date(timestamp.getTime() + offsetMs);
    // getUTCDay() is 0 for Sunday
    const day = (local.getUTCDay() + 6) % 7;
    buckets[day][local.getUTCHours()].push(value);
  }

  return {
    days: WEEKDAYS,
    hours: Array.from({ length: 24 }, (_, hour) => hour),
    values: buckets.map((hours) => hours.map((cell) => mean(cell))),
  };
}
