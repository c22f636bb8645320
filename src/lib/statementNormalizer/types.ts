/**
 * Statement Normalizer — Types
 *
 * Uniform per-period schema the ratio and trend engines consume.
 * Every figure is number | null; null means the source did not report it.
 */

export const MONETARY_FIELDS = [
  "revenue",
  "netProfit",
  "totalAssets",
  "totalEquity",
  "totalLiabilities",
  "currentAssets",
  "currentLiabilities",
  "operatingCashFlow",
  "operatingCost",
  "operatingProfit",
  "inventory",
  "capitalExpenditure",
] as const;

export type MonetaryField = (typeof MONETARY_FIELDS)[number];

export type PeriodFigures = Record<MonetaryField, number | null>;

export interface FinancialPeriod extends PeriodFigures {
  periodId: string;
  currency: string;
  unit: string;
  /** Balance-sheet fields computed from the accounting identity rather than reported */
  derivedFields: Array<"totalEquity" | "totalLiabilities">;
}

/** The latest period, narrowed so the input-contract fields are present. */
export type LatestPeriod = FinancialPeriod & {
  revenue: number;
  netProfit: number;
  totalAssets: number;
  totalEquity: number;
  totalLiabilities: number;
};

export interface ReconciliationDiscrepancy {
  periodId: string;
  totalAssets: number;
  equityPlusLiabilities: number;
  /** totalAssets − (totalEquity + totalLiabilities) */
  difference: number;
  /** difference / totalAssets, null when totalAssets is 0 */
  relativeDifference: number | null;
}

export interface FinancialSeries {
  /** Ascending by period id, unique ids, length ≥ 1 */
  periods: FinancialPeriod[];
  latest: LatestPeriod;
  currency: string;
  unit: string;
  discrepancies: ReconciliationDiscrepancy[];
}

export interface NormalizeOptions {
  /** Divisor applied to every monetary figure (e.g. 1e8 for 亿元). Default 1. */
  unitScale?: number;
  /** Label for the resulting unit. Defaults from unitScale. */
  unit?: string;
  /** Currency used when a record carries none. Default "CNY". */
  currency?: string;
  /** Relative tolerance for the assets = equity + liabilities check. Default 0.01. */
  reconciliationTolerance?: number;
}
