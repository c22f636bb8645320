/**
 * Config Engine — Default Rubric
 *
 * The canonical scoring rubric. Validated once at module load; a broken
 * default fails on import rather than on first analysis.
 */

import { DEFAULT_DEAD_BAND_PCT, DEFAULT_TREND_WINDOW } from "@/lib/trendEngine/trends";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import { loadScoringRubric } from "./schema";
import type { IndicatorRule, ScoringRubric } from "./types";

// ---------------------------------------------------------------------------
// Dimension weights (percent)
// ---------------------------------------------------------------------------

export const DEFAULT_DIMENSION_WEIGHTS: ScoringRubric["dimensionWeights"] = {
  profitability: 25,
  solvency: 25,
  efficiency: 20,
  growth: 15,
  cashFlowQuality: 15,
};

// ---------------------------------------------------------------------------
// Indicator rules
// ---------------------------------------------------------------------------

export const DEFAULT_INDICATORS: IndicatorRule[] = [
  {
    id: "roe",
    label: "净资产收益率(ROE)",
    dimension: "profitability",
    source: { kind: "ratio", ratio: "roe" },
    weight: 0.6,
    zeroAt: 0,
    fullAt: 15,
  },
  {
    id: "netProfitMargin",
    label: "净利率",
    dimension: "profitability",
    source: { kind: "ratio", ratio: "netProfitMargin" },
    weight: 0.4,
    zeroAt: 0,
    fullAt: 20,
  },
  {
    id: "debtRatio",
    label: "资产负债率",
    dimension: "solvency",
    source: { kind: "ratio", ratio: "debtRatio" },
    weight: 0.7,
    zeroAt: 80,
    fullAt: 40,
  },
  {
    id: "currentRatio",
    label: "流动比率",
    dimension: "solvency",
    source: { kind: "ratio", ratio: "currentRatio" },
    weight: 0.3,
    zeroAt: 0.5,
    fullAt: 2,
  },
  {
    id: "assetTurnover",
    label: "总资产周转率",
    dimension: "efficiency",
    source: { kind: "ratio", ratio: "assetTurnover" },
    weight: 1,
    zeroAt: 0.2,
    fullAt: 1,
  },
  {
    id: "revenueCagr",
    label: "营业收入复合增长率",
    dimension: "growth",
    source: { kind: "cagr", quantity: "revenue" },
    weight: 0.5,
    zeroAt: -10,
    fullAt: 15,
  },
  {
    id: "netProfitCagr",
    label: "净利润复合增长率",
    dimension: "growth",
    source: { kind: "cagr", quantity: "netProfit" },
    weight: 0.5,
    zeroAt: -10,
    fullAt: 15,
  },
  {
    id: "ocfToNetProfit",
    label: "经营现金流/净利润",
    dimension: "cashFlowQuality",
    source: { kind: "ratio", ratio: "ocfToNetProfit" },
    weight: 1,
    zeroAt: 0,
    fullAt: 120,
  },
];

// ---------------------------------------------------------------------------
// Tiers and thresholds
// ---------------------------------------------------------------------------

export const DEFAULT_RISK_TIERS: ScoringRubric["riskTiers"] = [
  { level: "低风险", minScore: 80 },
  { level: "中低风险", minScore: 60 },
  { level: "中等风险", minScore: 40 },
  { level: "中高风险", minScore: 20 },
  { level: "高风险", minScore: 0 },
];

/** Design constant, not derived from data. */
export const DEFAULT_TREND_DEAD_BAND_PCT = DEFAULT_DEAD_BAND_PCT;

export const DEFAULT_NARRATIVE_THRESHOLDS: ScoringRubric["narrative"] = {
  strengthAt: 90,
  weaknessBelow: 40,
};

export const DEFAULT_LOOKBACK_WINDOW = DEFAULT_TREND_WINDOW;

export const DEFAULT_SCORING_RUBRIC: ScoringRubric = deepFreeze(
  loadScoringRubric({
    dimensionWeights: DEFAULT_DIMENSION_WEIGHTS,
    indicators: DEFAULT_INDICATORS,
    riskTiers: DEFAULT_RISK_TIERS,
    trendDeadBandPct: DEFAULT_TREND_DEAD_BAND_PCT,
    narrative: DEFAULT_NARRATIVE_THRESHOLDS,
    lookbackWindow: DEFAULT_LOOKBACK_WINDOW,
  }),
);
