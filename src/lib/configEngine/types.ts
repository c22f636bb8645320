/**
 * Config Engine — Types
 *
 * The scoring rubric: every weight, anchor, tier cut-off and threshold the
 * health scorer and trend analyzer read. Passed explicitly; nothing in the
 * scoring path reads a module-level constant.
 */

import type { RatioKey } from "@/lib/ratioEngine/types";
import type { TrendQuantity } from "@/lib/trendEngine/types";

// ---------------------------------------------------------------------------
// Fixed vocabularies
// ---------------------------------------------------------------------------

/** Declaration order drives narrative ordering. */
export const HEALTH_DIMENSIONS = [
  "profitability",
  "solvency",
  "efficiency",
  "growth",
  "cashFlowQuality",
] as const;

export type HealthDimension = (typeof HEALTH_DIMENSIONS)[number];

/** Best to worst. */
export const RISK_LEVELS = ["低风险", "中低风险", "中等风险", "中高风险", "高风险"] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

// ---------------------------------------------------------------------------
// Indicator rules
// ---------------------------------------------------------------------------

export type IndicatorSource =
  | { kind: "ratio"; ratio: RatioKey }
  | { kind: "cagr"; quantity: TrendQuantity };

/**
 * Linear scoring rule. Score is 0 at `zeroAt`, 100 at `fullAt`, clamped
 * outside. `fullAt < zeroAt` expresses lower-is-better.
 */
export interface IndicatorRule {
  id: string;
  label: string;
  dimension: HealthDimension;
  source: IndicatorSource;
  /** Relative weight inside the dimension, > 0 */
  weight: number;
  zeroAt: number;
  fullAt: number;
}

export interface RiskTierRule {
  level: RiskLevel;
  /** Inclusive lower bound */
  minScore: number;
}

export interface NarrativeThresholds {
  /** Indicator score at or above which a strength is reported */
  strengthAt: number;
  /** Indicator score below which a weakness is reported */
  weaknessBelow: number;
}

// ---------------------------------------------------------------------------
// Rubric
// ---------------------------------------------------------------------------

export interface ScoringRubric {
  /** Percent, summing to 100 */
  dimensionWeights: Record<HealthDimension, number>;
  indicators: IndicatorRule[];
  /** Sorted by minScore, highest first */
  riskTiers: RiskTierRule[];
  /** CAGR band, in percentage points, classified as flat */
  trendDeadBandPct: number;
  narrative: NarrativeThresholds;
  /** Default trend window, in periods */
  lookbackWindow: number;
}

/**
 * Partial rubric. Dimension weights and narrative thresholds merge key by key;
 * indicator and tier lists replace the base list when present.
 */
export interface ScoringRubricOverride {
  dimensionWeights?: Partial<Record<HealthDimension, number>>;
  indicators?: IndicatorRule[];
  riskTiers?: RiskTierRule[];
  trendDeadBandPct?: number;
  narrative?: Partial<NarrativeThresholds>;
  lookbackWindow?: number;
}
