/**
 * Ratio Engine — Point-in-Time Ratios
 *
 * Every ratio reads the latest period only, except asset turnover which
 * averages latest and prior total assets when the prior period reports them.
 */

import { ValidationError } from "@/lib/analysisErrors";
import { requireInput } from "@/lib/metricValue";
import type { FinancialPeriod, FinancialSeries, LatestPeriod } from "@/lib/statementNormalizer/types";
import type { RatioOptions, RatioResult, RatioSet } from "./types";
import { buildRatio, DEFAULT_EPSILON, guardedDivide, type DivideGuard } from "./explain";

// ---------------------------------------------------------------------------
// Profitability
// ---------------------------------------------------------------------------

export function computeNetProfitMargin(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "netProfitMargin",
      dimension: "profitability",
      unit: "percent",
      formula: "NetProfit / Revenue × 100",
      inputs: { netProfit: p.netProfit, revenue: p.revenue },
    },
    () => guardedDivide(p.netProfit, "revenue", p.revenue, guard) * 100,
  );
}

export function computeRoe(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "roe",
      dimension: "profitability",
      unit: "percent",
      formula: "NetProfit / TotalEquity × 100",
      inputs: { netProfit: p.netProfit, totalEquity: p.totalEquity },
    },
    () =>
      guardedDivide(p.netProfit, "totalEquity", p.totalEquity, { ...guard, requirePositive: true }) *
      100,
  );
}

function computeRoa(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "roa",
      dimension: "profitability",
      unit: "percent",
      formula: "NetProfit / TotalAssets × 100",
      inputs: { netProfit: p.netProfit, totalAssets: p.totalAssets },
    },
    () => guardedDivide(p.netProfit, "totalAssets", p.totalAssets, guard) * 100,
  );
}

function computeGrossMargin(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "grossMargin",
      dimension: "profitability",
      unit: "percent",
      formula: "(Revenue − OperatingCost) / Revenue × 100",
      inputs: { revenue: p.revenue, operatingCost: p.operatingCost },
    },
    () => {
      const cost = requireInput("operatingCost", p.operatingCost);
      return guardedDivide(p.revenue - cost, "revenue", p.revenue, guard) * 100;
    },
  );
}

function computeOperatingMargin(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "operatingMargin",
      dimension: "profitability",
      unit: "percent",
      formula: "OperatingProfit / Revenue × 100",
      inputs: { operatingProfit: p.operatingProfit, revenue: p.revenue },
    },
    () => {
      const operatingProfit = requireInput("operatingProfit", p.operatingProfit);
      return guardedDivide(operatingProfit, "revenue", p.revenue, guard) * 100;
    },
  );
}

// ---------------------------------------------------------------------------
// Solvency
// ---------------------------------------------------------------------------

function computeDebtRatio(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "debtRatio",
      dimension: "solvency",
      unit: "percent",
      formula: "TotalLiabilities / TotalAssets × 100",
      inputs: { totalLiabilities: p.totalLiabilities, totalAssets: p.totalAssets },
    },
    () => guardedDivide(p.totalLiabilities, "totalAssets", p.totalAssets, guard) * 100,
  );
}

function computeCurrentRatio(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "currentRatio",
      dimension: "solvency",
      unit: "times",
      formula: "CurrentAssets / CurrentLiabilities",
      inputs: { currentAssets: p.currentAssets, currentLiabilities: p.currentLiabilities },
    },
    () =>
      guardedDivide(
        requireInput("currentAssets", p.currentAssets),
        "currentLiabilities",
        requireInput("currentLiabilities", p.currentLiabilities),
        guard,
      ),
  );
}

function computeQuickRatio(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "quickRatio",
      dimension: "solvency",
      unit: "times",
      formula: "(CurrentAssets − Inventory) / CurrentLiabilities",
      inputs: {
        currentAssets: p.currentAssets,
        inventory: p.inventory,
        currentLiabilities: p.currentLiabilities,
      },
    },
    () => {
      const quickAssets =
        requireInput("currentAssets", p.currentAssets) - requireInput("inventory", p.inventory);
      return guardedDivide(
        quickAssets,
        "currentLiabilities",
        requireInput("currentLiabilities", p.currentLiabilities),
        guard,
      );
    },
  );
}

export function computeEquityMultiplier(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "equityMultiplier",
      dimension: "solvency",
      unit: "times",
      formula: "TotalAssets / TotalEquity",
      inputs: { totalAssets: p.totalAssets, totalEquity: p.totalEquity },
    },
    () =>
      guardedDivide(p.totalAssets, "totalEquity", p.totalEquity, { ...guard, requirePositive: true }),
  );
}

// ---------------------------------------------------------------------------
// Efficiency
// ---------------------------------------------------------------------------

function computeAssetTurnover(
  p: LatestPeriod,
  prior: FinancialPeriod | null,
  guard: DivideGuard,
): RatioResult {
  const priorTotalAssets = prior?.totalAssets ?? null;
  const averageTotalAssets =
    priorTotalAssets === null ? p.totalAssets : (p.totalAssets + priorTotalAssets) / 2;

  return buildRatio(
    {
      key: "assetTurnover",
      dimension: "efficiency",
      unit: "times",
      formula:
        priorTotalAssets === null
          ? "Revenue / TotalAssets"
          : "Revenue / ((TotalAssets + PriorTotalAssets) / 2)",
      inputs: {
        revenue: p.revenue,
        totalAssets: p.totalAssets,
        priorTotalAssets,
        averageTotalAssets,
      },
    },
    () => guardedDivide(p.revenue, "averageTotalAssets", averageTotalAssets, guard),
  );
}

// ---------------------------------------------------------------------------
// Cash-flow quality
// ---------------------------------------------------------------------------

function computeOcfToNetProfit(p: LatestPeriod, guard: DivideGuard): RatioResult {
  return buildRatio(
    {
      key: "ocfToNetProfit",
      dimension: "cashFlowQuality",
      unit: "percent",
      formula: "OperatingCashFlow / NetProfit × 100",
      inputs: { operatingCashFlow: p.operatingCashFlow, netProfit: p.netProfit },
    },
    () =>
      guardedDivide(
        requireInput("operatingCashFlow", p.operatingCashFlow),
        "netProfit",
        p.netProfit,
        { ...guard, requirePositive: true },
      ) * 100,
  );
}

function computeFreeCashFlow(p: LatestPeriod): RatioResult {
  return buildRatio(
    {
      key: "freeCashFlow",
      dimension: "cashFlowQuality",
      unit: "amount",
      formula: "OperatingCashFlow − CapitalExpenditure",
      inputs: { operatingCashFlow: p.operatingCashFlow, capitalExpenditure: p.capitalExpenditure },
    },
    () =>
      requireInput("operatingCashFlow", p.operatingCashFlow) -
      requireInput("capitalExpenditure", p.capitalExpenditure),
  );
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

export function resolveGuard(options: RatioOptions = {}): DivideGuard {
  const epsilon = options.epsilon ?? DEFAULT_EPSILON;
  if (!Number.isFinite(epsilon) || epsilon <= 0) {
    throw new ValidationError("invalid_option", "epsilon must be a positive finite number", {
      epsilon,
    });
  }
  return { epsilon };
}

/**
 * Compute every ratio for the latest period of a series.
 *
 * Pure function — deterministic, no side effects. Unavailable ratios stay in
 * the set with a reason; nothing is dropped.
 */
export function computeRatioSet(series: FinancialSeries, options: RatioOptions = {}): RatioSet {
  const guard = resolveGuard(options);
  const latest = series.latest;
  const prior = series.periods.length > 1 ? series.periods[series.periods.length - 2] : null;

  return {
    periodId: latest.periodId,
    ratios: {
      netProfitMargin: computeNetProfitMargin(latest, guard),
      roe: computeRoe(latest, guard),
      roa: computeRoa(latest, guard),
      grossMargin: computeGrossMargin(latest, guard),
      operatingMargin: computeOperatingMargin(latest, guard),
      debtRatio: computeDebtRatio(latest, guard),
      currentRatio: computeCurrentRatio(latest, guard),
      quickRatio: computeQuickRatio(latest, guard),
      equityMultiplier: computeEquityMultiplier(latest, guard),
      assetTurnover: computeAssetTurnover(latest, prior, guard),
      ocfToNetProfit: computeOcfToNetProfit(latest, guard),
      freeCashFlow: computeFreeCashFlow(latest),
    },
  };
}
