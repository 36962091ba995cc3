/**
 * Population health estimates from long-term PM2.5 exposure.
 *
 * Coefficients follow WHO Global Air Quality Guidelines (2021),
 * ICMR burden-of-disease studies and the AQLI life-expectancy model:
 * - mortality rises ~6% per 10 µg/m³ above the 10 µg/m³ reference level
 * - one year of life expectancy is lost per 10 µg/m³ above that level
 */

/** Baseline all-cause deaths per 100,000 population per year (India) */
export const BASELINE_MORTALITY = 700;
export const REFERENCE_PM25 = 10;
export const WHO_PM25_GUIDELINE = 15;
export const CPCB_PM25_ANNUAL_STANDARD = 40;

export type RiskLevel = 'low' | 'elevated' | 'high';

export interface DiseaseRisk {
  /** Multiplier over baseline risk */
  multiplier: number;
  level: RiskLevel;
}

export type AdvisoryLevel = 'SEVERE' | 'UNHEALTHY' | 'MODERATE' | 'SAFE';

export interface HealthAdvisory {
  level: AdvisoryLevel;
  message: string;
}

export interface HealthImpact {
  averagePm25: number;
  averageAqi: number | null;
  prematureDeathsPer100k: number;
  lifeYearsLost: number;
  risks: {
    copd: DiseaseRisk;
    asthma: DiseaseRisk;
    cardiovascular: DiseaseRisk;
  };
  standards: {
    whoGuideline: number;
    cpcbStandard: number;
    current: number;
  };
  advisory: HealthAdvisory;
}

function riskLevel(multiplier: number, high: number, elevated: number): RiskLevel {
  if (multiplier > high) return 'high';
  if (multiplier > elevated) return 'elevated';
  return 'low';
}

export function healthAdvisory(averageAqi: number | null): HealthAdvisory {
  const aqi = averageAqi ?? 0;
  if (aqi > 300) {
    return {
      level: 'SEVERE',
      message:
        'Avoid outdoor activities. Use N95 masks if going outside. Vulnerable groups should stay indoors with air purifiers.',
    };
  }
  if (aqi > 200) {
    return {
      level: 'UNHEALTHY',
      message:
        'Limit outdoor exposure. Children, elderly, and people with respiratory conditions should stay indoors.',
    };
  }
  if (aqi > 100) {
    return {
      level: 'MODERATE',
      message:
        'Sensitive individuals should consider reducing prolonged outdoor exertion.',
    };
  }
  return {
    level: 'SAFE',
    message: 'Air quality is acceptable for most individuals.',
  };
}

export function assessHealthImpact(
  averagePm25: number,
  averageAqi: number | null,
): HealthImpact {
  const excess = Math.max(0, averagePm25 - REFERENCE_PM25);
  const mortalityIncreasePct = (excess / 10) * 6;

  const copd = 1 + (averagePm25 / 100) * 0.8;
  const asthma = 1 + (averagePm25 / 50) * 0.3;
  const cardiovascular = 1 + (averagePm25 / 100) * 1.2;

  return {
    averagePm25,
    averageAqi,
    prematureDeathsPer100k: (BASELINE_MORTALITY * mortalityIncreasePct) / 100,
    lifeYearsLost: excess / 10,
    risks: {
      copd: { multiplier: copd, level: riskLevel(copd, 2, 1.5) },
      asthma: { multiplier: asthma, level: riskLevel(asthma, 1.5, 1.2) },
      cardiovascular: {
        multiplier: cardiovascular,
        level: riskLevel(cardiovascular, 2, 1.5),
      },
    },
    standards: {
      whoGuideline: WHO_PM25_GUIDELINE,
      cpcbStandard: CPCB_PM25_ANNUAL_STANDARD,
      current: averagePm25,
    },
    advisory: healthAdvisory(averageAqi),
  };
}
