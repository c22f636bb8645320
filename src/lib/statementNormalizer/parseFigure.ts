/**
 * Statement Normalizer — Figure Parsing
 *
 * Source exports mix numbers, numeric strings with thousands separators,
 * 万/亿 magnitude suffixes and placeholder dashes. Placeholders mean "not reported"; anything else that is
 * not a finite number is rejected.
 */

import { ValidationError } from "@/lib/analysisErrors";

const MISSING_TOKENS = new Set(["", "-", "--", "—", "N/A", "n/a", "NA", "None", "null"]);

const NUMERIC_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

const MAGNITUDE_SUFFIXES: Record<string, number> = { 万: 1e4, 亿: 1e8 };
const SUFFIX_PATTERN = /^(.+?)(万|亿)?元?$/;

export function parseFigure(field: string, raw: unknown, periodId: string): number | null {
  if (raw === null || raw === undefined) return null;

  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) {
      throw new ValidationError(
        "non_numeric_value",
        `${field} for period ${periodId} is not a finite number`,
        { field, periodId },
      );
    }
    return raw;
  }

  if (typeof raw === "string") {
    const trimmed = raw.trim();
    if (MISSING_TOKENS.has(trimmed)) return null;
    const compact = trimmed.replace(/[,，\s]/g, "");
    const match = SUFFIX_PATTERN.exec(compact);
    if (match && NUMERIC_PATTERN.test(match[1])) {
      const magnitude = match[2] === undefined ? 1 : MAGNITUDE_SUFFIXES[match[2]];
      return Number(match[1]) * magnitude;
    }
  }

  throw new ValidationError(
    "non_numeric_value",
    `${field} for period ${periodId} is not numeric: ${JSON.stringify(raw)}`,
    { field, periodId },
  );
}

/**
 * Period identifiers arrive as strings, numeric years, or timestamps with a
 * trailing midnight time.
 */
export function parsePeriodId(raw: unknown): string | null {
  if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim().replace(/\s00:00:00(\.0+)?$/, "");
  return trimmed.length > 0 ? trimmed : null;
}
