/**
 * Trend Engine — Types
 *
 * Multi-period growth statistics for the quantities the health scorer tracks.
 */

import type { MetricValue } from "@/lib/metricValue/types";

export const TREND_QUANTITIES = ["revenue", "netProfit", "operatingCashFlow"] as const;

export type TrendQuantity = (typeof TREND_QUANTITIES)[number];

export type TrendDirection = "rising" | "falling" | "flat";

export interface TrendPoint {
  periodId: string;
  value: number | null;
}

export interface YearOverYearChange {
  fromPeriodId: string;
  toPeriodId: string;
  absoluteChange: MetricValue;
  /** (current − previous) / |previous| × 100 */
  percentChange: MetricValue;
}

export interface TrendMetric {
  quantity: TrendQuantity;
  requestedWindow: number;
  windowUsed: number;
  /** true when the series held fewer periods than requested */
  truncated: boolean;
  startPeriodId: string;
  endPeriodId: string;
  startValue: number | null;
  endValue: number | null;
  /** Compound annual growth rate in percent, over windowUsed − 1 periods */
  cagr: MetricValue;
  absoluteChange: MetricValue;
  direction: MetricValue<TrendDirection>;
  yearOverYear: YearOverYearChange[];
}

export type TrendSet = Record<TrendQuantity, TrendMetric>;

export interface TrendOptions {
  /** Number of most recent periods to use. Integer ≥ 1, default 4. */
  window?: number;
  /** CAGR band (percentage points) classified as flat. Default 2. */
  deadBandPct?: number;
}
