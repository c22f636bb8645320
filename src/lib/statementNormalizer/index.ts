/**
 * Statement Normalizer — Public API
 */

export type {
  FinancialPeriod,
  FinancialSeries,
  LatestPeriod,
  MonetaryField,
  NormalizeOptions,
  PeriodFigures,
  ReconciliationDiscrepancy,
} from "./types";

export { MONETARY_FIELDS } from "./types";
export { normalizeStatements, resolveNormalizeOptions } from "./normalize";
export { parseFigure, parsePeriodId } from "./parseFigure";
