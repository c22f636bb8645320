/**
 * Ratio Engine — DuPont Decomposition
 *
 * ROE = net profit margin × asset turnover × equity multiplier.
 *
 * Turnover here uses period-end total assets, not the two-period average the
 * RatioSet reports, so the three factors multiply back to ROE. Implied ROE
 * and the residual come from the unrounded quotients; only the reported
 * factors are rounded.
 */

import {
  attempt,
  available,
  isAvailable,
  roundTo,
  unavailable,
  type MetricValue,
} from "@/lib/metricValue";
import type { FinancialSeries } from "@/lib/statementNormalizer/types";
import type { DupontDecomposition, DupontDriver, RatioOptions } from "./types";
import { buildRatio, guardedDivide, UNIT_DECIMALS } from "./explain";
import {
  computeEquityMultiplier,
  computeNetProfitMargin,
  computeRoe,
  resolveGuard,
} from "./ratios";

/** Maximum |ROE − implied ROE| in percentage points. */
export const DUPONT_TOLERANCE_PP = 0.5;

const MARGIN_DRIVER_THRESHOLD = 15;
const TURNOVER_DRIVER_THRESHOLD = 0.8;
const LEVERAGE_DRIVER_THRESHOLD = 2;

function stripAudit(metric: MetricValue): MetricValue {
  return isAvailable(metric)
    ? available(metric.value)
    : unavailable(metric.reason, metric.detail);
}

function selectPrimaryDriver(
  netProfitMargin: MetricValue,
  assetTurnover: MetricValue,
  equityMultiplier: MetricValue,
): DupontDriver | null {
  if (isAvailable(netProfitMargin) && netProfitMargin.value > MARGIN_DRIVER_THRESHOLD) {
    return "netProfitMargin";
  }
  if (isAvailable(assetTurnover) && assetTurnover.value > TURNOVER_DRIVER_THRESHOLD) {
    return "assetTurnover";
  }
  if (isAvailable(equityMultiplier) && equityMultiplier.value > LEVERAGE_DRIVER_THRESHOLD) {
    return "equityMultiplier";
  }
  return null;
}

/**
 * Decompose the latest period's ROE.
 *
 * Pure function — deterministic, no side effects.
 */
export function computeDupontDecomposition(
  series: FinancialSeries,
  options: RatioOptions = {},
): DupontDecomposition {
  const guard = resolveGuard(options);
  const latest = series.latest;

  const roe = stripAudit(computeRoe(latest, guard));
  const netProfitMargin = stripAudit(computeNetProfitMargin(latest, guard));
  const equityMultiplier = stripAudit(computeEquityMultiplier(latest, guard));
  const assetTurnover = stripAudit(
    buildRatio(
      {
        key: "assetTurnover",
        dimension: "efficiency",
        unit: "times",
        formula: "Revenue / TotalAssets",
        inputs: { revenue: latest.revenue, totalAssets: latest.totalAssets },
      },
      () => guardedDivide(latest.revenue, "totalAssets", latest.totalAssets, guard),
    ),
  );

  const positive = { ...guard, requirePositive: true };
  const exactRoe = attempt(
    () => guardedDivide(latest.netProfit, "totalEquity", latest.totalEquity, positive) * 100,
  );
  const exactImplied = attempt(
    () =>
      guardedDivide(latest.netProfit, "revenue", latest.revenue, guard) *
      100 *
      guardedDivide(latest.revenue, "totalAssets", latest.totalAssets, guard) *
      guardedDivide(latest.totalAssets, "totalEquity", latest.totalEquity, positive),
  );

  const impliedRoe: MetricValue = isAvailable(exactImplied)
    ? available(roundTo(exactImplied.value, UNIT_DECIMALS.percent))
    : unavailable("missing_input", "one or more DuPont factors unavailable");

  let residual: MetricValue;
  let identityHolds: boolean | null = null;
  if (isAvailable(exactRoe) && isAvailable(exactImplied)) {
    const diff = exactRoe.value - exactImplied.value;
    residual = available(roundTo(diff, UNIT_DECIMALS.percent));
    identityHolds = Math.abs(diff) <= DUPONT_TOLERANCE_PP;
  } else {
    residual = unavailable("missing_input", "ROE or implied ROE unavailable");
  }

  return {
    periodId: latest.periodId,
    roe,
    netProfitMargin,
    assetTurnover,
    equityMultiplier,
    impliedRoe,
    residual,
    tolerance: DUPONT_TOLERANCE_PP,
    identityHolds,
    primaryDriver: selectPrimaryDriver(netProfitMargin, assetTurnover, equityMultiplier),
  };
}
