/**
 * Trend Engine — Public API
 */

export type {
  TrendDirection,
  TrendMetric,
  TrendOptions,
  TrendPoint,
  TrendQuantity,
  TrendSet,
  YearOverYearChange,
} from "./types";

export { TREND_QUANTITIES } from "./types";
export { CAGR_DECIMALS, classifyDirection, classifyTrend, computeCagr } from "./cagr";
export {
  analyzeTrend,
  analyzeTrends,
  DEFAULT_DEAD_BAND_PCT,
  DEFAULT_TREND_WINDOW,
  extractTrendPoints,
} from "./trends";
