/**
 * Trend Engine — Growth Primitives
 *
 * CAGR and direction classification. CAGR is rounded to six decimals before
 * it is classified so boundary values land on the side a reader expects
 * (100 → 102 over one period is exactly 2.0, not 2.0000000000000018).
 */

import { ComputationError } from "@/lib/analysisErrors";
import { attempt, available, isAvailable, unavailable, type MetricValue } from "@/lib/metricValue";
import type { TrendDirection } from "./types";

export const CAGR_DECIMALS = 6;

/**
 * CAGR = (end / start)^(1 / periods) − 1, as a percentage.
 *
 * Pure function — deterministic, no side effects.
 */
export function computeCagr(
  start: number | null,
  end: number | null,
  periods: number,
): MetricValue {
  return attempt(() => {
    if (periods < 1) {
      throw new ComputationError("insufficient_periods", "CAGR needs at least two periods");
    }
    if (start === null || end === null) {
      throw new ComputationError(
        "missing_input",
        `${start === null ? "start" : "end"} value unavailable`,
      );
    }
    if (start <= 0) {
      throw new ComputationError("non_positive_base", `start value must be positive (got ${start})`);
    }
    if (end < 0) {
      throw new ComputationError("negative_end_value", `end value is negative (got ${end})`);
    }
    return ((end / start) ** (1 / periods) - 1) * 100;
  }, CAGR_DECIMALS);
}

export function classifyDirection(cagrPct: number, deadBandPct: number): TrendDirection {
  if (cagrPct > deadBandPct) return "rising";
  if (cagrPct < -deadBandPct) return "falling";
  return "flat";
}

export function classifyTrend(cagr: MetricValue, deadBandPct: number): MetricValue<TrendDirection> {
  if (!isAvailable(cagr)) {
    return unavailable<TrendDirection>(cagr.reason, cagr.detail);
  }
  return available(classifyDirection(cagr.value, deadBandPct));
}
