/**
 * Industry Benchmarks — Comparison
 *
 * Scores each benchmarked ratio against its industry anchor, folds the
 * scores into one weight-renormalised industry-adjusted score, applies the
 * industry's special rules and derives industry-aware recommendations.
 *
 * Pure function — deterministic, no side effects.
 */

import type { RiskLevel } from "@/lib/configEngine/types";
import {
  available,
  isAvailable,
  roundTo,
  unavailable,
  type MetricValue,
} from "@/lib/metricValue";
import { RATIO_KEYS, type RatioKey, type RatioResult, type RatioSet } from "@/lib/ratioEngine/types";
import type {
  BenchmarkAnchor,
  BenchmarkedMetric,
  BenchmarkRating,
  BenchmarkStatus,
  IndustryClassification,
  IndustryComparison,
  IndustryProfile,
} from "./types";

const BENCHMARK_SCORE_DECIMALS = 2;
/** Score for an in-range value that misses the ideal of a degenerate anchor (min = max). */
const DEGENERATE_MISS_SCORE = 50;
/** |differencePct| at or below this counts as level with the industry. */
const AT_IDEAL_BAND_PCT = 10;

const HIGH_DEBT_NOTE_THRESHOLD = 70;
const WEAK_CASH_CONVERSION_PCT = 50;
const WEAK_CASH_CONVERSION_FACTOR = 0.8;
const WEAK_METRIC_SCORE = 40;
const MAX_WEAK_METRICS_NAMED = 3;
const MAX_GUIDANCE = 2;

export const BENCHMARK_LABELS: Record<RatioKey, string> = {
  netProfitMargin: "净利率",
  roe: "净资产收益率(ROE)",
  roa: "总资产收益率(ROA)",
  grossMargin: "毛利率",
  operatingMargin: "营业利润率",
  debtRatio: "资产负债率",
  currentRatio: "流动比率",
  quickRatio: "速动比率",
  equityMultiplier: "权益乘数",
  assetTurnover: "总资产周转率",
  ocfToNetProfit: "现金流/净利润比",
  freeCashFlow: "自由现金流",
};

const RATING_BANDS: ReadonlyArray<{ minScore: number; rating: BenchmarkRating }> = [
  { minScore: 80, rating: "优秀" },
  { minScore: 60, rating: "良好" },
  { minScore: 40, rating: "一般" },
  { minScore: 20, rating: "较差" },
  { minScore: 0, rating: "差" },
];

const RISK_BANDS: ReadonlyArray<{ minScore: number; level: RiskLevel; advice: string }> = [
  { minScore: 80, level: "低风险", advice: "财务状况优秀，行业竞争力强，可考虑配置" },
  { minScore: 60, level: "中低风险", advice: "财务状况良好，部分指标需关注" },
  { minScore: 40, level: "中等风险", advice: "财务状况一般，建议深入分析薄弱环节" },
  { minScore: 20, level: "中高风险", advice: "财务状况需警惕，存在明显风险点" },
  { minScore: 0, level: "高风险", advice: "财务状况高风险，建议回避" },
];

export function rateBenchmarkScore(score: number): BenchmarkRating {
  const band = RATING_BANDS.find((b) => score >= b.minScore);
  return band ? band.rating : "差";
}

function riskBand(score: number): { level: RiskLevel; advice: string } {
  return RISK_BANDS.find((b) => score >= b.minScore) ?? RISK_BANDS[RISK_BANDS.length - 1];
}

function rawScore(value: number, anchor: BenchmarkAnchor): number {
  const { min, max, ideal } = anchor;
  if (value < min) return min > 0 ? (100 * value) / min : 0;
  if (value > max) return value > 0 ? (100 * max) / value : 0;
  if (min === max) return value === ideal ? 100 : DEGENERATE_MISS_SCORE;
  return 100 * (1 - Math.abs(value - ideal) / ((max - min) / 2));
}

/**
 * 0–100 closeness of a ratio to its industry anchor: linear fall-off from
 * the ideal inside the range, proportional outside it.
 */
export function scoreAgainstBenchmark(value: number, anchor: BenchmarkAnchor): number {
  const score = Math.min(100, Math.max(0, rawScore(value, anchor)));
  return roundTo(score, BENCHMARK_SCORE_DECIMALS);
}

function plainValue(ratio: RatioResult): MetricValue {
  return ratio.status === "available"
    ? available(ratio.value)
    : unavailable(ratio.reason, ratio.detail);
}

function benchmarkMetric(key: RatioKey, anchor: BenchmarkAnchor, ratio: RatioResult): BenchmarkedMetric {
  const value = plainValue(ratio);
  const label = BENCHMARK_LABELS[key];
  if (!isAvailable(value)) {
    return {
      ratio: key,
      label,
      anchor,
      value,
      score: unavailable(value.reason, value.detail),
      rating: null,
      difference: null,
      differencePct: null,
      status: null,
    };
  }

  const score = scoreAgainstBenchmark(value.value, anchor);
  const difference = value.value - anchor.ideal;
  const differencePct = anchor.ideal === 0 ? null : (difference / anchor.ideal) * 100;
  let status: BenchmarkStatus | null = null;
  if (differencePct !== null) {
    if (Math.abs(differencePct) <= AT_IDEAL_BAND_PCT) status = "at";
    else status = difference > 0 ? "above" : "below";
  }

  return {
    ratio: key,
    label,
    anchor,
    value,
    score: available(score),
    rating: rateBenchmarkScore(score),
    difference: roundTo(difference, BENCHMARK_SCORE_DECIMALS),
    differencePct: differencePct === null ? null : roundTo(differencePct, BENCHMARK_SCORE_DECIMALS),
    status,
  };
}

function availableValue(metrics: readonly BenchmarkedMetric[], key: RatioKey): number | null {
  const metric = metrics.find((m) => m.ratio === key);
  return metric && isAvailable(metric.value) ? metric.value.value : null;
}

// ---------------------------------------------------------------------------
// Special rules
// ---------------------------------------------------------------------------

function applySpecialRules(
  profile: IndustryProfile,
  metrics: readonly BenchmarkedMetric[],
): { factor: number; notes: string[] } {
  let factor = 1;
  const notes: string[] = [];

  const debtRatio = availableValue(metrics, "debtRatio");
  if (profile.specialRules.debtTolerance === "high" && debtRatio !== null && debtRatio > HIGH_DEBT_NOTE_THRESHOLD) {
    notes.push(`${profile.name}行业高负债为常态`);
  }

  const cashConversion = availableValue(metrics, "ocfToNetProfit");
  if (profile.specialRules.cashflowCritical && cashConversion !== null && cashConversion < WEAK_CASH_CONVERSION_PCT) {
    factor *= WEAK_CASH_CONVERSION_FACTOR;
    notes.push("现金流严重恶化，扣减评分");
  }

  return { factor, notes };
}

// ---------------------------------------------------------------------------
// Recommendations
// ---------------------------------------------------------------------------

function buildRecommendations(
  profile: IndustryProfile,
  metrics: readonly BenchmarkedMetric[],
  adjustedScore: MetricValue,
): string[] {
  const recommendations: string[] = [];

  if (isAvailable(adjustedScore)) {
    recommendations.push(riskBand(adjustedScore.value).advice);
  }

  if (profile.specialRules.cashflowCritical) {
    const cash = metrics.find((m) => m.ratio === "ocfToNetProfit");
    // uncomputable cash conversion counts as weak here
    if (cash && (!isAvailable(cash.score) || cash.score.value < WEAK_METRIC_SCORE)) {
      recommendations.push("现金流状况需重点关注");
    }
  }

  if (profile.specialRules.debtTolerance === "high") {
    recommendations.push("行业高负债为常态，需关注有息负债成本");
  }

  const weak = metrics.filter((m) => isAvailable(m.score) && m.score.value < WEAK_METRIC_SCORE);
  if (weak.length > 0) {
    const names = weak.slice(0, MAX_WEAK_METRICS_NAMED).map((m) => m.label);
    recommendations.push(`需关注: ${names.join(", ")}`);
  }

  recommendations.push(...profile.guidance.slice(0, MAX_GUIDANCE));
  return recommendations;
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

export function compareWithIndustry(
  ratios: RatioSet,
  classification: IndustryClassification,
): IndustryComparison {
  const { profile, matchedBy } = classification;

  const metrics = RATIO_KEYS.flatMap((key): BenchmarkedMetric[] => {
    const anchor = profile.metrics[key];
    return anchor ? [benchmarkMetric(key, anchor, ratios.ratios[key])] : [];
  });

  let weightSum = 0;
  let weighted = 0;
  for (const metric of metrics) {
    if (isAvailable(metric.score)) {
      weightSum += metric.anchor.weight;
      weighted += metric.score.value * metric.anchor.weight;
    }
  }

  const { factor, notes } = applySpecialRules(profile, metrics);

  const adjustedScore: MetricValue =
    weightSum > 0
      ? available(roundTo((weighted / weightSum) * factor, BENCHMARK_SCORE_DECIMALS))
      : unavailable("no_available_indicators", `no ${profile.id} benchmark ratio could be computed`);

  return {
    industryId: profile.id,
    industryName: profile.name,
    matchedBy,
    metrics,
    adjustmentFactor: factor,
    adjustmentNotes: notes,
    adjustedScore,
    adjustedRating: isAvailable(adjustedScore) ? rateBenchmarkScore(adjustedScore.value) : null,
    riskLevel: isAvailable(adjustedScore) ? riskBand(adjustedScore.value).level : null,
    recommendations: buildRecommendations(profile, metrics, adjustedScore),
  };
}
