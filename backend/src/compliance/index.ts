// Re-export public API
export {
  aggregateWindows,
  classifyAggregate,
  scoreCompliance,
  DAY_MS,
  HOUR_MS,
} from './compliance-scorer';
export {
  ComplianceError,
  InvalidInputOrderError,
  InvalidMeasurementError,
  InvalidWindowError,
  MixedSeriesError,
} from './compliance.errors';
export type { ComplianceErrorCode } from './compliance.errors';
export type {
  Aggregate,
  ComplianceState,
  ComplianceStatus,
  Measurement,
  Period,
  ScoredWindow,
  ScoringOptions,
} from './compliance.types';
export {
  CPCB_LIMITS,
  POLLUTANTS,
  getThreshold,
  isPollutant,
  normalizePollutant,
} from './pollutants';
export type { Pollutant, PollutantColumn, PollutantLimit } from './pollutants';
export {
  GRAP_RECOMMENDATION,
  assessPolicy,
  compliancePercentage,
  kpiColor,
  recommendFor,
} from './policy';
export type { KpiColor, PolicyAssessment, PolicyTier } from './policy';
