/**
 * Health Scoring — Types
 *
 * Five-dimension composite score, risk tier and rule-based narrative.
 */

import type {
  HealthDimension,
  IndicatorSource,
  RiskLevel,
} from "@/lib/configEngine/types";
import type { MetricValue, UnavailableReason } from "@/lib/metricValue/types";

export interface IndicatorScore {
  id: string;
  label: string;
  dimension: HealthDimension;
  source: IndicatorSource;
  /** Configured relative weight */
  weight: number;
  /** Share of the dimension after redistribution; 0 when unavailable */
  effectiveWeight: number;
  /** Raw indicator value (ratio or CAGR) */
  value: MetricValue;
  /** 0–100, one decimal */
  score: MetricValue;
}

export interface DimensionScore {
  dimension: HealthDimension;
  label: string;
  /** Percent, from the rubric */
  configuredWeight: number;
  /** Percent after redistribution over available dimensions; 0 when unavailable */
  effectiveWeight: number;
  score: MetricValue;
  /** score × effectiveWeight / 100 */
  contribution: MetricValue;
  indicators: IndicatorScore[];
}

export interface NarrativeEntry {
  dimension: HealthDimension;
  indicatorId: string;
  text: string;
}

export interface Recommendation {
  dimension: HealthDimension;
  text: string;
}

export interface HealthOutlook {
  title: string;
  detail: string;
  shortTerm: string;
  longTerm: string;
}

export interface UnavailableIndicator {
  id: string;
  dimension: HealthDimension;
  reason: UnavailableReason;
  detail: string;
}

export interface HealthAssessment {
  /** 0–100, one decimal */
  overallScore: MetricValue;
  riskLevel: MetricValue<RiskLevel>;
  dimensions: Record<HealthDimension, DimensionScore>;
  strengths: NarrativeEntry[];
  weaknesses: NarrativeEntry[];
  recommendations: Recommendation[];
  outlook: MetricValue<HealthOutlook>;
  unavailableIndicators: UnavailableIndicator[];
}
