/**
 * Health Scoring — Indicator Rules
 *
 * Resolve an indicator's value from the ratio or trend set, then score it
 * linearly between its anchors.
 */

import { available, roundTo, unavailable, type MetricValue } from "@/lib/metricValue";
import type { IndicatorRule, IndicatorSource } from "@/lib/configEngine/types";
import type { RatioSet } from "@/lib/ratioEngine/types";
import type { TrendSet } from "@/lib/trendEngine/types";

export const SCORE_DECIMALS = 1;

function plain(metric: MetricValue): MetricValue {
  return metric.status === "available"
    ? available(metric.value)
    : unavailable(metric.reason, metric.detail);
}

export function resolveIndicatorValue(
  source: IndicatorSource,
  ratios: RatioSet,
  trends: TrendSet,
): MetricValue {
  switch (source.kind) {
    case "ratio":
      return plain(ratios.ratios[source.ratio]);
    case "cagr":
      return plain(trends[source.quantity].cagr);
  }
}

/**
 * clamp((value − zeroAt) / (fullAt − zeroAt), 0, 1) × 100.
 *
 * Pure function — deterministic, no side effects.
 */
export function scoreIndicator(
  value: number,
  rule: Pick<IndicatorRule, "zeroAt" | "fullAt">,
): number {
  const fraction = (value - rule.zeroAt) / (rule.fullAt - rule.zeroAt);
  const clamped = Math.min(1, Math.max(0, fraction));
  return roundTo(clamped * 100, SCORE_DECIMALS);
}
