import { ComplianceStatus } from './compliance.types';
import { CPCB_LIMITS, Pollutant } from './pollutants';

export const GRAP_RECOMMENDATION = 'Consider GRAP measures';

/**
 * Policy text shown next to a window's pass/fail badge.
 * Only a PM2.5 exceedance triggers the Graded Response Action Plan.
 */
export function recommendFor(status: ComplianceStatus): string | null {
  if (status.pollutant === 'PM2.5' && status.status === 'Non-Compliant') {
    return GRAP_RECOMMENDATION;
  }
  return null;
}

export type PolicyTier =
  | 'GOOD'
  | 'SATISFACTORY'
  | 'MODERATE RISK'
  | 'POOR'
  | 'SEVERE EMERGENCY';

export interface PolicyAssessment {
  tier: PolicyTier;
  action: string;
}

/**
 * Tiered recommendation for a city's average level, graded against
 * multiples of the pollutant limit (0.5x, 1x, 1.5x, 2x).
 */
export function assessPolicy(
  pollutant: Pollutant,
  averageValue: number,
): PolicyAssessment {
  const { limit, label } = CPCB_LIMITS[pollutant];

  if (averageValue <= limit * 0.5) {
    return { tier: 'GOOD', action: 'Maintain current green cover.' };
  }
  if (averageValue <= limit) {
    return { tier: 'SATISFACTORY', action: 'Routine monitoring.' };
  }
  if (averageValue <= limit * 1.5) {
    return {
      tier: 'MODERATE RISK',
      action: `Activate pollution control for ${label} sources.`,
    };
  }
  if (averageValue <= limit * 2) {
    return {
      tier: 'POOR',
      action: 'Activate GRAP Stage 2 (Strict enforcement).',
    };
  }
  return {
    tier: 'SEVERE EMERGENCY',
    action: 'Emergency measures (GRAP Stage 4) required immediately.',
  };
}

/**
 * Colour band for a KPI tile: within limit, up to twice the limit, beyond.
 */
export type KpiColor = 'normal' | 'off' | 'inverse';

export function kpiColor(pollutant: Pollutant, averageValue: number): KpiColor {
  const { limit } = CPCB_LIMITS[pollutant];
  if (averageValue <= limit) return 'normal';
  if (averageValue <= limit * 2) return 'off';
  return 'inverse';
}

/**
 * Percentage of readings at or below the limit, or null without readings.
 * A reading with a missing value counts as not compliant.
 */
export function compliancePercentage(
  pollutant: Pollutant,
  values: ReadonlyArray<number | null>,
): number | null {
  if (values.length === 0) {
    return null;
  }
  const { limit } = CPCB_LIMITS[pollutant];
  const safe = values.filter(
    (value) => value !== null && value <= limit,
  ).length;
  return (safe / values.length) * 100;
}
