/**
 * Health Scoring — Composite Scorer
 *
 * Indicator scores → dimension scores (weights renormalised over available
 * indicators) → overall score (weights renormalised over available
 * dimensions) → risk tier and narrative.
 *
 * Every aggregate is computed from the reported, rounded scores one level
 * down, so a reader can recompute each figure from the output alone.
 */

import {
  available,
  isAvailable,
  roundTo,
  unavailable,
  type MetricValue,
} from "@/lib/metricValue";
import {
  HEALTH_DIMENSIONS,
  type HealthDimension,
  type RiskLevel,
  type RiskTierRule,
  type ScoringRubric,
} from "@/lib/configEngine/types";
import type { RatioSet } from "@/lib/ratioEngine/types";
import type { TrendSet } from "@/lib/trendEngine/types";
import { resolveIndicatorValue, SCORE_DECIMALS, scoreIndicator } from "./indicators";
import { buildNarrative, DIMENSION_LABELS, selectOutlook } from "./narrative";
import type {
  DimensionScore,
  HealthAssessment,
  HealthOutlook,
  IndicatorScore,
  UnavailableIndicator,
} from "./types";

const WEIGHT_DECIMALS = 4;
const PERCENT_WEIGHT_DECIMALS = 2;
const CONTRIBUTION_DECIMALS = 2;

// ---------------------------------------------------------------------------
// Risk tier
// ---------------------------------------------------------------------------

/**
 * First tier whose inclusive lower bound the score reaches. Tiers must be
 * sorted highest first, as loadScoringRubric returns them.
 */
export function resolveRiskLevel(score: number, tiers: readonly RiskTierRule[]): RiskLevel {
  const tier = tiers.find((t) => score >= t.minScore);
  return (tier ?? tiers[tiers.length - 1]).level;
}

// ---------------------------------------------------------------------------
// Dimension scoring
// ---------------------------------------------------------------------------

type ScoredDimension = Omit<DimensionScore, "effectiveWeight" | "contribution">;

function mapDimensions<T>(fn: (dimension: HealthDimension) => T): Record<HealthDimension, T> {
  return {
    profitability: fn("profitability"),
    solvency: fn("solvency"),
    efficiency: fn("efficiency"),
    growth: fn("growth"),
    cashFlowQuality: fn("cashFlowQuality"),
  };
}

function weightedAverage(items: ReadonlyArray<{ score: number; weight: number }>): number | null {
  const totalWeight = items.reduce((sum, item) => sum + item.weight, 0);
  if (totalWeight <= 0) return null;
  return items.reduce((sum, item) => sum + item.score * item.weight, 0) / totalWeight;
}

function scoreDimension(
  dimension: HealthDimension,
  rubric: ScoringRubric,
  ratios: RatioSet,
  trends: TrendSet,
): ScoredDimension {
  const rules = rubric.indicators.filter((rule) => rule.dimension === dimension);

  const scored = rules.map((rule) => {
    const value = resolveIndicatorValue(rule.source, ratios, trends);
    const score: MetricValue = isAvailable(value)
      ? available(scoreIndicator(value.value, rule))
      : unavailable(value.reason, value.detail);
    return { rule, value, score };
  });

  const availableWeight = scored.reduce(
    (sum, s) => (isAvailable(s.score) ? sum + s.rule.weight : sum),
    0,
  );

  const indicators: IndicatorScore[] = scored.map(({ rule, value, score }) => ({
    id: rule.id,
    label: rule.label,
    dimension,
    source: rule.source,
    weight: rule.weight,
    effectiveWeight:
      isAvailable(score) && availableWeight > 0
        ? roundTo(rule.weight / availableWeight, WEIGHT_DECIMALS)
        : 0,
    value,
    score,
  }));

  const average = weightedAverage(
    scored.flatMap((s) => (isAvailable(s.score) ? [{ score: s.score.value, weight: s.rule.weight }] : [])),
  );

  return {
    dimension,
    label: DIMENSION_LABELS[dimension],
    configuredWeight: rubric.dimensionWeights[dimension],
    score:
      average === null
        ? unavailable("no_available_indicators", `no ${dimension} indicator could be computed`)
        : available(roundTo(average, SCORE_DECIMALS)),
    indicators,
  };
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

/**
 * Score financial health from a ratio set and trend set under a validated
 * rubric.
 *
 * Pure function — deterministic, no side effects.
 */
export function scoreFinancialHealth(
  ratios: RatioSet,
  trends: TrendSet,
  rubric: ScoringRubric,
): HealthAssessment {
  const scored = mapDimensions((d) => scoreDimension(d, rubric, ratios, trends));
  const scoredList = HEALTH_DIMENSIONS.map((d) => scored[d]);

  const availableWeight = scoredList.reduce(
    (sum, d) => (isAvailable(d.score) ? sum + d.configuredWeight : sum),
    0,
  );

  const dimensions = mapDimensions((dimension): DimensionScore => {
    const d = scored[dimension];
    if (!isAvailable(d.score)) {
      return {
        ...d,
        effectiveWeight: 0,
        contribution: unavailable(d.score.reason, d.score.detail),
      };
    }
    if (availableWeight <= 0) {
      return {
        ...d,
        effectiveWeight: 0,
        contribution: unavailable("no_available_dimensions", "no available dimension carries weight"),
      };
    }
    const share = d.configuredWeight / availableWeight;
    return {
      ...d,
      effectiveWeight: roundTo(share * 100, PERCENT_WEIGHT_DECIMALS),
      contribution: available(roundTo(d.score.value * share, CONTRIBUTION_DECIMALS)),
    };
  });

  const overall = weightedAverage(
    scoredList.flatMap((d) =>
      isAvailable(d.score) ? [{ score: d.score.value, weight: d.configuredWeight }] : [],
    ),
  );

  let overallScore: MetricValue;
  let riskLevel: MetricValue<RiskLevel>;
  let outlook: MetricValue<HealthOutlook>;
  if (overall === null) {
    const detail = "no health dimension could be scored";
    overallScore = unavailable("no_available_dimensions", detail);
    riskLevel = unavailable<RiskLevel>("no_available_dimensions", detail);
    outlook = unavailable<HealthOutlook>("no_available_dimensions", detail);
  } else {
    const score = roundTo(overall, SCORE_DECIMALS);
    overallScore = available(score);
    riskLevel = available(resolveRiskLevel(score, rubric.riskTiers));
    outlook = available(selectOutlook(score));
  }

  const unavailableIndicators: UnavailableIndicator[] = scoredList.flatMap((d) =>
    d.indicators.flatMap((indicator) =>
      indicator.score.status === "unavailable"
        ? [
            {
              id: indicator.id,
              dimension: d.dimension,
              reason: indicator.score.reason,
              detail: indicator.score.detail,
            },
          ]
        : [],
    ),
  );

  return {
    overallScore,
    riskLevel,
    dimensions,
    ...buildNarrative(dimensions, rubric.narrative),
    outlook,
    unavailableIndicators,
  };
}
