/**
 * Ratio Engine — Types
 *
 * Point-in-time ratios for the latest reporting period, each tagged with the
 * health dimension it feeds and a full audit trail of inputs and formula.
 */

import type { MetricValue } from "@/lib/metricValue/types";

export type RatioDimension = "profitability" | "solvency" | "efficiency" | "cashFlowQuality";

export type RatioUnit = "percent" | "times" | "amount";

export const RATIO_KEYS = [
  "netProfitMargin",
  "roe",
  "roa",
  "grossMargin",
  "operatingMargin",
  "debtRatio",
  "currentRatio",
  "quickRatio",
  "equityMultiplier",
  "assetTurnover",
  "ocfToNetProfit",
  "freeCashFlow",
] as const;

export type RatioKey = (typeof RATIO_KEYS)[number];

export type RatioResult = MetricValue & {
  key: RatioKey;
  dimension: RatioDimension;
  unit: RatioUnit;
  formula: string;
  inputs: Record<string, number | null>;
};

export interface RatioSet {
  periodId: string;
  ratios: Record<RatioKey, RatioResult>;
}

export interface RatioOptions {
  /** Denominators with magnitude below this are treated as zero. Default 1e-6. */
  epsilon?: number;
}

// ---------------------------------------------------------------------------
// DuPont
// ---------------------------------------------------------------------------

export type DupontDriver = "netProfitMargin" | "assetTurnover" | "equityMultiplier";

export interface DupontDecomposition {
  periodId: string;
  /** netProfit / totalEquity × 100 */
  roe: MetricValue;
  /** netProfit / revenue × 100 */
  netProfitMargin: MetricValue;
  /** revenue / period-end totalAssets, so the identity closes exactly */
  assetTurnover: MetricValue;
  /** totalAssets / totalEquity */
  equityMultiplier: MetricValue;
  /** netProfitMargin/100 × assetTurnover × equityMultiplier × 100, from the reported factors */
  impliedRoe: MetricValue;
  /** roe − impliedRoe, in percentage points */
  residual: MetricValue;
  /** Maximum |residual| for the identity to hold, in percentage points */
  tolerance: number;
  /** null when ROE or any factor is unavailable */
  identityHolds: boolean | null;
  primaryDriver: DupontDriver | null;
}
