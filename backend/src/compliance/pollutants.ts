/**
 * Pollutants tracked by the platform and their CPCB (India) NAAQS limits.
 *
 * Limits are the fixed thresholds used for compliance scoring. PM and
 * gaseous pollutants use 24-hour averages except CO and O3 (8-hour).
 * CO is expressed in mg/m³, everything else in µg/m³.
 */
export const POLLUTANTS = ['PM2.5', 'PM10', 'NO2', 'SO2', 'CO', 'O3'] as const;

export type Pollutant = (typeof POLLUTANTS)[number];

/**
 * Column of the readings table holding a pollutant's concentration
 */
export type PollutantColumn = 'pm25' | 'pm10' | 'no2' | 'so2' | 'co' | 'o3';

export interface PollutantLimit {
  pollutant: Pollutant;
  label: string;
  column: PollutantColumn;
  limit: number;
  unit: 'µg/m³' | 'mg/m³';
  averagingHours: number;
}

export const CPCB_LIMITS: Readonly<Record<Pollutant, PollutantLimit>> = {
  'PM2.5': {
    pollutant: 'PM2.5',
    label: 'PM2.5 (Fine Particles)',
    column: 'pm25',
    limit: 60,
    unit: 'µg/m³',
    averagingHours: 24,
  },
  PM10: {
    pollutant: 'PM10',
    label: 'PM10 (Coarse Particles)',
    column: 'pm10',
    limit: 100,
    unit: 'µg/m³',
    averagingHours: 24,
  },
  NO2: {
    pollutant: 'NO2',
    label: 'NO2 (Nitrogen Dioxide)',
    column: 'no2',
    limit: 80,
    unit: 'µg/m³',
    averagingHours: 24,
  },
  SO2: {
    pollutant: 'SO2',
    label: 'SO2 (Sulfur Dioxide)',
    column: 'so2',
    limit: 80,
    unit: 'µg/m³',
    averagingHours: 24,
  },
  CO: {
    pollutant: 'CO',
    label: 'CO (Carbon Monoxide)',
    column: 'co',
    limit: 2,
    unit: 'mg/m³',
    averagingHours: 8,
  },
  O3: {
    pollutant: 'O3',
    label: 'Ozone (O3)',
    column: 'o3',
    limit: 100,
    unit: 'µg/m³',
    averagingHours: 8,
  },
};

/**
 * Aliases keyed by the normalized form (lowercase, alphanumerics only,
 * unit suffix removed). Covers dataset headers such as "PM2_5_ugm3".
 */
const POLLUTANT_ALIASES: Record<string, Pollutant> = {
  pm25: 'PM2.5',
  pm10: 'PM10',
  no2: 'NO2',
  so2: 'SO2',
  co: 'CO',
  o3: 'O3',
  ozone: 'O3',
};

export function isPollutant(value: string): value is Pollutant {
  return (POLLUTANTS as readonly string[]).includes(value);
}

/**
 * Resolve a pollutant from a free-form name or column header.
 *
 * @example
 * normalizePollutant('PM2_5_ugm3') // 'PM2.5'
 * normalizePollutant('Ozone (O3)') // null, labels are not aliases
 */
export function normalizePollutant(raw: string): Pollutant | null {
  const trimmed = raw.trim();
  if (isPollutant(trimmed)) {
    return trimmed;
  }

  const key = trimmed
    .toLowerCase()
    .replaceAll(/[^a-z0-9]/g, '')
    .replace(/(ugm3|mgm3)$/, '');

  return POLLUTANT_ALIASES[key] ?? null;
}

export function getThreshold(pollutant: Pollutant): number {
  return CPCB_LIMITS[pollutant].limit;
}
