/**
 * Trend Engine — Trend Metrics
 *
 * One TrendMetric per tracked quantity over the most recent W periods.
 * Each quantity is analyzed independently; nothing is shared between calls.
 */

import { ValidationError } from "@/lib/analysisErrors";
import { attempt, requireInput } from "@/lib/metricValue";
import { guardedDivide } from "@/lib/ratioEngine/explain";
import type { FinancialSeries } from "@/lib/statementNormalizer/types";
import { classifyTrend, computeCagr } from "./cagr";
import type {
  TrendMetric,
  TrendOptions,
  TrendPoint,
  TrendQuantity,
  TrendSet,
  YearOverYearChange,
} from "./types";

export const DEFAULT_TREND_WINDOW = 4;
export const DEFAULT_DEAD_BAND_PCT = 2;

const CHANGE_DECIMALS = 2;
const ZERO_EPSILON = 1e-6;

function resolveTrendOptions(options: TrendOptions): { window: number; deadBandPct: number } {
  const window = options.window ?? DEFAULT_TREND_WINDOW;
  if (!Number.isInteger(window) || window < 1) {
    throw new ValidationError("invalid_window", "Trend window must be an integer of at least 1", {
      window,
    });
  }
  const deadBandPct = options.deadBandPct ?? DEFAULT_DEAD_BAND_PCT;
  if (!Number.isFinite(deadBandPct) || deadBandPct < 0) {
    throw new ValidationError("invalid_option", "deadBandPct must be a non-negative number", {
      deadBandPct,
    });
  }
  return { window, deadBandPct };
}

function yearOverYear(points: readonly TrendPoint[]): YearOverYearChange[] {
  const changes: YearOverYearChange[] = [];
  for (let i = 1; i < points.length; i++) {
    const previous = points[i - 1];
    const current = points[i];
    changes.push({
      fromPeriodId: previous.periodId,
      toPeriodId: current.periodId,
      absoluteChange: attempt(
        () => requireInput("current", current.value) - requireInput("previous", previous.value),
        CHANGE_DECIMALS,
      ),
      percentChange: attempt(() => {
        const prev = requireInput("previous", previous.value);
        const delta = requireInput("current", current.value) - prev;
        return guardedDivide(delta, "previous", Math.abs(prev), { epsilon: ZERO_EPSILON }) * 100;
      }, CHANGE_DECIMALS),
    });
  }
  return changes;
}

/**
 * Trend statistics for one quantity. `points` must be ascending by period.
 *
 * Pure function — deterministic, no side effects.
 */
export function analyzeTrend(
  quantity: TrendQuantity,
  points: readonly TrendPoint[],
  options: TrendOptions = {},
): TrendMetric {
  const { window, deadBandPct } = resolveTrendOptions(options);
  if (points.length === 0) {
    throw new ValidationError("empty_series", `No periods supplied for ${quantity}`);
  }

  const used = points.slice(-window);
  const start = used[0];
  const end = used[used.length - 1];

  const cagr = computeCagr(start.value, end.value, used.length - 1);

  return {
    quantity,
    requestedWindow: window,
    windowUsed: used.length,
    truncated: used.length < window,
    startPeriodId: start.periodId,
    endPeriodId: end.periodId,
    startValue: start.value,
    endValue: end.value,
    cagr,
    absoluteChange: attempt(
      () => requireInput("end", end.value) - requireInput("start", start.value),
      CHANGE_DECIMALS,
    ),
    direction: classifyTrend(cagr, deadBandPct),
    yearOverYear: yearOverYear(used),
  };
}

export function extractTrendPoints(
  series: FinancialSeries,
  quantity: TrendQuantity,
): TrendPoint[] {
  return series.periods.map((period) => ({ periodId: period.periodId, value: period[quantity] }));
}

/**
 * Trend statistics for every tracked quantity of a series.
 */
export function analyzeTrends(series: FinancialSeries, options: TrendOptions = {}): TrendSet {
  const analyze = (quantity: TrendQuantity) =>
    analyzeTrend(quantity, extractTrendPoints(series, quantity), options);

  return {
    revenue: analyze("revenue"),
    netProfit: analyze("netProfit"),
    operatingCashFlow: analyze("operatingCashFlow"),
  };
}
