/**
 * Cell-level parsing shared by the CSV strategies
 */

const MISSING_TOKENS = new Set(['', '-', 'na', 'n/a', 'null', 'nan', 'none']);

/**
 * Safely convert unknown value to string (handles primitives only)
 */
export function toSafeString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean')
    return String(value);
  return '';
}

/**
 * Safely get a value from row by key and trim whitespace
 */
export function safeGetAndTrim(
  row: Record<string, string>,
  key: string,
): string {
  const value = row[key];
  if (value === undefined || value === null) {
    return '';
  }
  return String(value).trim();
}

/**
 * Lowercase and strip everything but letters and digits, for header matching.
 * Example: "DateTime_UTC" -> "datetimeutc"
 */
export function normalizeKey(name: string): string {
  return name.toLowerCase().replaceAll(/[^a-z0-9]/g, '');
}

/**
 * camelCase a column header for metadata storage.
 * Example: "Temperature_C" -> "temperatureC", "AQI_Bucket" -> "aqiBucket"
 */
export function toCamelCase(name: string): string {
  const words = name.split(/[^a-zA-Z0-9]+/).filter((word) => word.length > 0);
  return words
    .map((word, index) => {
      if (index > 0) {
        return word.charAt(0).toUpperCase() + word.slice(1);
      }
      return word === word.toUpperCase()
        ? word.toLowerCase()
        : word.charAt(0).toLowerCase() + word.slice(1);
    })
    .join('');
}

/**
 * Parse string value to number, handling missing markers and units
 */
export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const str = toSafeString(value).trim();
  if (MISSING_TOKENS.has(str.toLowerCase())) {
    return null;
  }

  // Remove thousands separators, spaces and trailing units
  const cleaned = str
    .replaceAll(/[,\s]/g, '')
    .replace(/[a-zA-Z%°µ/³]+$/, '');

  if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(cleaned)) {
    return null;
  }
  const num = Number.parseFloat(cleaned);
  return Number.isFinite(num) ? num : null;
}

export interface ParsedConcentration {
  value: number | null;
  /** True when a negative reading was raised to zero */
  clipped: boolean;
}

/**
 * Concentrations cannot be negative; sensor drift below zero is stored as 0.
 */
export function parseConcentration(value: unknown): ParsedConcentration {
  const num = parseNumber(value);
  if (num !== null && num < 0) {
    return { value: 0, clipped: true };
  }
  return { value: num, clipped: false };
}

interface DateFormat {
  pattern: RegExp;
  yearFirst: boolean;
}

/**
 * Supported layouts, all read as UTC:
 * - 2024-01-15, 2024-01-15 14:30, 2024-01-15T14:30:00
 * - 15/01/2024, 15/01/2024 14:30:00
 * - 15-01-2024, 15-01-2024 14:30
 */
const DATE_FORMATS: DateFormat[] = [
  {
    pattern:
      /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s]+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/,
    yearFirst: true,
  },
  {
    pattern:
      /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/,
    yearFirst: false,
  },
  {
    pattern:
      /^(\d{1,2})-(\d{1,2})-(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/,
    yearFirst: false,
  },
];

function parseCustomFormat(value: string, format: DateFormat): Date | null {
  const match = format.pattern.exec(value);
  if (!match) {
    return null;
  }

  const year = Number.parseInt(format.yearFirst ? match[1] : match[3], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(format.yearFirst ? match[3] : match[1], 10);
  const hour = match[4] ? Number.parseInt(match[4], 10) : 0;
  const minute = match[5] ? Number.parseInt(match[5], 10) : 0;
  const second = match[6] ? Number.parseInt(match[6], 10) : 0;

  // Date.UTC maps years 0-99 onto 1900-1999
  if (
    year < 1000 ||
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > 31 ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Reject rollovers such as 31/02
  if (date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parse the timestamp formats found in CPCB and city exports to a UTC Date.
 * ISO strings with an offset keep it; everything without a zone is UTC.
 */
export function parseTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;

  for (const format of DATE_FORMATS) {
    const result = parseCustomFormat(trimmed, format);
    if (result) {
      return result;
    }
  }

  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/.test(trimmed)) {
    const hasZone = /(z|[+-]\d{2}:?\d{2})$/i.test(trimmed);
    const date = new Date(hasZone ? trimmed : `${trimmed}Z`);
    return Number.isNaN(date.getTime()) || date.getUTCFullYear() < 1000
      ? null
      : date;
  }

  return null;
}
