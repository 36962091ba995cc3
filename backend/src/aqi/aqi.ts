import { z } from 'zod';
import { POLLUTANTS, Pollutant } from '../compliance/pollutants';
import breakpointsJson from './cpcb-breakpoints.json';

/**
 * CPCB breakpoint row: [C_low, C_high, I_low, I_high]
 */
const BreakpointSchema = z.tuple([
  z.number(),
  z.number(),
  z.number(),
  z.number(),
]);

const BracketsSchema = z.array(BreakpointSchema).min(1);

const BreakpointTableSchema = z.object({
  'PM2.5': BracketsSchema,
  PM10: BracketsSchema,
  NO2: BracketsSchema,
  SO2: BracketsSchema,
  CO: BracketsSchema,
  O3: BracketsSchema,
});

export type Breakpoint = z.infer<typeof BreakpointSchema>;

export const CPCB_BREAKPOINTS: Readonly<Record<Pollutant, Breakpoint[]>> =
  BreakpointTableSchema.parse(breakpointsJson);

export const MAX_AQI = 500;

export type AqiCategory =
  | 'Good'
  | 'Satisfactory'
  | 'Moderate'
  | 'Poor'
  | 'Very Poor'
  | 'Severe';

export interface AqiBand {
  category: AqiCategory;
  color: string;
}

const AQI_BANDS: ReadonlyArray<AqiBand & { upTo: number }> = [
  { upTo: 50, category: 'Good', color: '#00E400' },
  { upTo: 100, category: 'Satisfactory', color: '#FFFF00' },
  { upTo: 200, category: 'Moderate', color: '#FF7E00' },
  { upTo: 300, category: 'Poor', color: '#FF0000' },
  { upTo: 400, category: 'Very Poor', color: '#8F3F97' },
];

const SEVERE: AqiBand = { category: 'Severe', color: '#7E0023' };

/**
 * Sub-index of one pollutant by linear interpolation inside its bracket.
 *
 * The bracket is the first one whose upper bound is at or above the
 * concentration, so a value falling between two published brackets
 * (e.g. PM2.5 30.5) is placed in the upper one. Beyond the table: 500.
 */
export function computeSubIndex(
  pollutant: Pollutant,
  concentration: number,
): number {
  const c = Math.max(0, concentration);
  const bracket = CPCB_BREAKPOINTS[pollutant].find(([, cHigh]) => c <= cHigh);
  if (!bracket) {
    return MAX_AQI;
  }

  const [cLow, cHigh, iLow, iHigh] = bracket;
  return Math.round(((iHigh - iLow) / (cHigh - cLow)) * (c - cLow) + iLow);
}

/**
 * Overall AQI: the highest sub-index among the pollutants present.
 * Returns null when no pollutant has a value.
 */
export function computeAqi(
  concentrations: Partial<Record<Pollutant, number | null>>,
): number | null {
  let aqi: number | null = null;

  for (const pollutant of POLLUTANTS) {
    const value = concentrations[pollutant];
    if (value === undefined || value === null || !Number.isFinite(value)) {
      continue;
    }
    const subIndex = computeSubIndex(pollutant, value);
    aqi = aqi === null ? subIndex : Math.max(aqi, subIndex);
  }

  return aqi;
}

export function categorizeAqi(aqi: number): AqiBand {
  const band = AQI_BANDS.find(({ upTo }) => aqi <= upTo);
  return band ? { category: band.category, color: band.color } : SEVERE;
}
