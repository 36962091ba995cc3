const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

export type DateBound = 'start' | 'end';

/**
 * Parse one end of a date range from a query string.
 *
 * A bare `YYYY-MM-DD` covers its whole UTC day: as a start it is
 * 00:00:00.000, as an end 23:59:59.999. Returns null when the value is
 * not a date.
 */
export function parseDateBound(value: string, bound: DateBound): Date | null {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  if (bound === 'end' && DATE_ONLY.test(value)) {
    return new Date(date.getTime() + DAY_MS - 1);
  }
  return date;
}
