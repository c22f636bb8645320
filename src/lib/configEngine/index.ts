/**
 * Config Engine — Public API
 *
 * Scoring rubric: types, defaults, validation, overrides and versioning.
 */

export type {
  HealthDimension,
  IndicatorRule,
  IndicatorSource,
  NarrativeThresholds,
  RiskLevel,
  RiskTierRule,
  ScoringRubric,
  ScoringRubricOverride,
} from "./types";

export { HEALTH_DIMENSIONS, RISK_LEVELS } from "./types";

export {
  DEFAULT_DIMENSION_WEIGHTS,
  DEFAULT_INDICATORS,
  DEFAULT_LOOKBACK_WINDOW,
  DEFAULT_NARRATIVE_THRESHOLDS,
  DEFAULT_RISK_TIERS,
  DEFAULT_SCORING_RUBRIC,
  DEFAULT_TREND_DEAD_BAND_PCT,
} from "./defaults";

export {
  loadScoringRubric,
  parseRubricOverride,
  ScoringRubricOverrideSchema,
  ScoringRubricSchema,
} from "./schema";
export { mergeRubric } from "./merge";
export { loadScoringRubricFromFile } from "./loadConfig";
export { computeRubricVersion } from "./version";
