/**
 * Statement Normalizer — Core Transform
 *
 * Raw period records (or separate income / balance / cash-flow tables) →
 * FinancialSeries sorted oldest → newest.
 *
 * Pure transform: no I/O, no logging. Structural problems raise
 * ValidationError; balance-sheet mismatches are reported, never fatal.
 */

import { z } from "zod";
import { ValidationError } from "@/lib/analysisErrors";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import fieldAliasesJson from "./fieldAliases.json";
import { parseFigure, parsePeriodId } from "./parseFigure";
import type {
  FinancialPeriod,
  FinancialSeries,
  LatestPeriod,
  MonetaryField,
  NormalizeOptions,
  PeriodFigures,
  ReconciliationDiscrepancy,
} from "./types";

type RawRecord = Record<string, unknown>;

const FIELD_ALIASES: Record<MonetaryField | "periodId" | "currency", readonly string[]> =
  fieldAliasesJson;

const UNIT_LABELS: Record<number, string> = {
  1: "元",
  1e4: "万元",
  1e8: "亿元",
};

const DEFAULT_CURRENCY = "CNY";
const DEFAULT_RECONCILIATION_TOLERANCE = 0.01;

const PERIOD_COLLATOR = new Intl.Collator("en", { numeric: true });

// ---------------------------------------------------------------------------
// Input shape
// ---------------------------------------------------------------------------

const RawRecordSchema = z.record(z.string(), z.unknown());
const RawRecordListSchema = z.array(RawRecordSchema);

const StatementBundleSchema = z.object({
  income: RawRecordListSchema.default([]),
  balance: RawRecordListSchema.default([]),
  cashflow: RawRecordListSchema.default([]),
});

const RawInputSchema = z.union([RawRecordListSchema, StatementBundleSchema]);

function parseRawInput(raw: unknown): RawRecord[] {
  const parsed = RawInputSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ValidationError(
      "invalid_record",
      `Statement input must be an array of period records or an income/balance/cashflow bundle${where}`,
    );
  }
  return Array.isArray(parsed.data) ? parsed.data : mergeStatementTables(parsed.data);
}

/**
 * Merge separate statement tables into one record per period. Each table may
 * list a period at most once.
 */
function mergeStatementTables(bundle: z.infer<typeof StatementBundleSchema>): RawRecord[] {
  const merged = new Map<string, RawRecord>();

  for (const [table, rows] of Object.entries(bundle)) {
    const seen = new Set<string>();
    for (const row of rows) {
      const periodId = resolvePeriodId(row);
      if (seen.has(periodId)) {
        throw new ValidationError(
          "duplicate_period",
          `Period ${periodId} appears more than once in the ${table} table`,
          { periodId, table },
        );
      }
      seen.add(periodId);
      merged.set(periodId, { ...merged.get(periodId), ...row });
    }
  }

  return [...merged.values()];
}

// ---------------------------------------------------------------------------
// Field resolution
// ---------------------------------------------------------------------------

function resolvePeriodId(record: RawRecord): string {
  for (const alias of FIELD_ALIASES.periodId) {
    const id = parsePeriodId(record[alias]);
    if (id !== null) return id;
  }
  throw new ValidationError("invalid_record", "Period record has no period identifier");
}

function resolveFigure(record: RawRecord, field: MonetaryField, periodId: string): number | null {
  for (const alias of FIELD_ALIASES[field]) {
    if (!(alias in record)) continue;
    const value = parseFigure(field, record[alias], periodId);
    if (value !== null) return value;
  }
  return null;
}

function resolveCurrency(record: RawRecord): string | null {
  for (const alias of FIELD_ALIASES.currency) {
    const value = record[alias];
    if (typeof value === "string" && value.trim().length > 0) return value.trim();
  }
  return null;
}

// ---------------------------------------------------------------------------
// Balance-sheet identity
// ---------------------------------------------------------------------------

function applyBalanceIdentity(figures: PeriodFigures): FinancialPeriod["derivedFields"] {
  const { totalAssets, totalEquity, totalLiabilities } = figures;
  if (totalAssets === null) return [];

  if (totalEquity === null && totalLiabilities !== null) {
    figures.totalEquity = totalAssets - totalLiabilities;
    return ["totalEquity"];
  }
  if (totalLiabilities === null && totalEquity !== null) {
    figures.totalLiabilities = totalAssets - totalEquity;
    return ["totalLiabilities"];
  }
  return [];
}

function checkReconciliation(
  period: FinancialPeriod,
  tolerance: number,
): ReconciliationDiscrepancy | null {
  const { totalAssets, totalEquity, totalLiabilities } = period;
  if (totalAssets === null || totalEquity === null || totalLiabilities === null) return null;
  if (period.derivedFields.length > 0) return null;

  const equityPlusLiabilities = totalEquity + totalLiabilities;
  const difference = totalAssets - equityPlusLiabilities;
  if (Math.abs(difference) <= tolerance * Math.abs(totalAssets)) return null;

  return {
    periodId: period.periodId,
    totalAssets,
    equityPlusLiabilities,
    difference,
    relativeDifference: totalAssets === 0 ? null : difference / totalAssets,
  };
}

// ---------------------------------------------------------------------------
// Period construction
// ---------------------------------------------------------------------------

function buildPeriod(
  record: RawRecord,
  unitScale: number,
  unit: string,
  defaultCurrency: string,
): FinancialPeriod {
  const periodId = resolvePeriodId(record);
  const read = (field: MonetaryField): number | null => {
    const value = resolveFigure(record, field, periodId);
    return value === null ? null : value / unitScale;
  };

  const figures: PeriodFigures = {
    revenue: read("revenue"),
    netProfit: read("netProfit"),
    totalAssets: read("totalAssets"),
    totalEquity: read("totalEquity"),
    totalLiabilities: read("totalLiabilities"),
    currentAssets: read("currentAssets"),
    currentLiabilities: read("currentLiabilities"),
    operatingCashFlow: read("operatingCashFlow"),
    operatingCost: read("operatingCost"),
    operatingProfit: read("operatingProfit"),
    inventory: read("inventory"),
    capitalExpenditure: read("capitalExpenditure"),
  };

  if (figures.totalAssets !== null && figures.totalAssets < 0) {
    throw new ValidationError(
      "negative_total_assets",
      `Total assets for period ${periodId} is negative`,
      { periodId, totalAssets: figures.totalAssets },
    );
  }

  const derivedFields = applyBalanceIdentity(figures);

  return {
    periodId,
    ...figures,
    currency: resolveCurrency(record) ?? defaultCurrency,
    unit,
    derivedFields,
  };
}

function requireLatestFigure(period: FinancialPeriod, field: MonetaryField): number {
  const value = period[field];
  if (value === null) {
    throw new ValidationError(
      "missing_required_field",
      `Latest period ${period.periodId} is missing ${field}`,
      { periodId: period.periodId, field },
    );
  }
  return value;
}

function toLatestPeriod(period: FinancialPeriod): LatestPeriod {
  const revenue = requireLatestFigure(period, "revenue");
  const netProfit = requireLatestFigure(period, "netProfit");
  const totalAssets = requireLatestFigure(period, "totalAssets");

  if (period.totalEquity === null && period.totalLiabilities === null) {
    throw new ValidationError(
      "missing_required_field",
      `Latest period ${period.periodId} reports neither totalEquity nor totalLiabilities`,
      { periodId: period.periodId, field: "totalEquity" },
    );
  }
  const totalEquity = requireLatestFigure(period, "totalEquity");
  const totalLiabilities = requireLatestFigure(period, "totalLiabilities");

  return { ...period, revenue, netProfit, totalAssets, totalEquity, totalLiabilities };
}

/** Defaults applied and validated; throws ValidationError invalid_option. */
export function resolveNormalizeOptions(options: NormalizeOptions) {
  const unitScale = options.unitScale ?? 1;
  if (!Number.isFinite(unitScale) || unitScale <= 0) {
    throw new ValidationError("invalid_option", "unitScale must be a positive finite number", {
      unitScale,
    });
  }

  const tolerance = options.reconciliationTolerance ?? DEFAULT_RECONCILIATION_TOLERANCE;
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new ValidationError(
      "invalid_option",
      "reconciliationTolerance must be a non-negative number",
      { reconciliationTolerance: tolerance },
    );
  }

  return {
    unitScale,
    unit: options.unit ?? UNIT_LABELS[unitScale] ?? `×${unitScale}`,
    currency: options.currency ?? DEFAULT_CURRENCY,
    tolerance,
  };
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

/**
 * Normalize raw statement records into a FinancialSeries.
 *
 * Accepts either an array of per-period records or a bundle of
 * `{ income, balance, cashflow }` tables keyed by the same period id.
 */
export function normalizeStatements(
  raw: unknown,
  options: NormalizeOptions = {},
): FinancialSeries {
  const { unitScale, unit, currency, tolerance } = resolveNormalizeOptions(options);
  const records = parseRawInput(raw);

  if (records.length === 0) {
    throw new ValidationError("empty_series", "At least one reporting period is required");
  }

  const periods = records.map((record) => buildPeriod(record, unitScale, unit, currency));

  const ids = new Set<string>();
  for (const period of periods) {
    if (ids.has(period.periodId)) {
      throw new ValidationError(
        "duplicate_period",
        `Period ${period.periodId} appears more than once`,
        { periodId: period.periodId },
      );
    }
    ids.add(period.periodId);
  }

  periods.sort((a, b) => PERIOD_COLLATOR.compare(a.periodId, b.periodId));

  const currencies = new Set(periods.map((p) => p.currency));
  if (currencies.size > 1) {
    throw new ValidationError(
      "mixed_currency",
      `Periods report different currencies: ${[...currencies].join(", ")}`,
    );
  }

  const latest = toLatestPeriod(periods[periods.length - 1]);

  const discrepancies: ReconciliationDiscrepancy[] = [];
  for (const period of periods) {
    const found = checkReconciliation(period, tolerance);
    if (found) discrepancies.push(found);
  }

  return deepFreeze({
    periods,
    latest,
    currency: latest.currency,
    unit,
    discrepancies,
  });
}
