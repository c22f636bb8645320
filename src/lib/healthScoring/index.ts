/**
 * Health Scoring — Public API
 */

export type {
  DimensionScore,
  HealthAssessment,
  HealthOutlook,
  IndicatorScore,
  NarrativeEntry,
  Recommendation,
  UnavailableIndicator,
} from "./types";

export { resolveIndicatorValue, scoreIndicator } from "./indicators";
export { buildNarrative, DIMENSION_LABELS, selectOutlook } from "./narrative";
export { resolveRiskLevel, scoreFinancialHealth } from "./scorer";
