import { normalizeKey } from './value-parsers';

/**
 * Header names (normalized) accepted for the city column
 */
export const CITY_FIELDS = ['city', 'cityname', 'station', 'location'];

/**
 * Header names (normalized) accepted for the timestamp column
 */
export const TIMESTAMP_FIELDS = [
  'datetime',
  'timestamp',
  'datetimeutc',
  'date',
  'time',
  'measurementtime',
];

/**
 * First header whose normalized form is in `candidates`, honoring the
 * order of `candidates`
 */
export function findColumn(
  headers: readonly string[],
  candidates: readonly string[],
): string | undefined {
  for (const candidate of candidates) {
    const header = headers.find((h) => normalizeKey(h) === candidate);
    if (header !== undefined) {
      return header;
    }
  }
  return undefined;
}

/**
 * Normalized header names of the first line of a snippet
 */
export function snippetHeaders(snippet: string): string[] {
  const firstLine = snippet.split(/\r?\n/, 1)[0] ?? '';
  return firstLine
    .replace(/^\uFEFF/, '')
    .split(/[,;]/)
    .map((header) => normalizeKey(header.replaceAll('"', '')))
    .filter((header) => header.length > 0);
}
