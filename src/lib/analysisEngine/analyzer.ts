/**
 * Analysis Engine — Orchestrator
 *
 * normalize → ratios → DuPont → trends → health score → industry comparison.
 * No new logic; pure composition of the engines.
 */

import { ConfigError, ValidationError } from "@/lib/analysisErrors";
import { DEFAULT_SCORING_RUBRIC } from "@/lib/configEngine/defaults";
import { mergeRubric } from "@/lib/configEngine/merge";
import { computeRubricVersion } from "@/lib/configEngine/version";
import { scoreFinancialHealth } from "@/lib/healthScoring";
import { classifyIndustry, compareWithIndustry } from "@/lib/industryBenchmarks";
import { computeDupontDecomposition, computeRatioSet, resolveGuard } from "@/lib/ratioEngine";
import { normalizeStatements, resolveNormalizeOptions } from "@/lib/statementNormalizer";
import type { FinancialSeries } from "@/lib/statementNormalizer/types";
import { analyzeTrends } from "@/lib/trendEngine";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import type {
  AnalyzeOptions,
  AnalyzerConfig,
  FinancialAnalysisResult,
  FinancialAnalyzer,
} from "./types";

function warnOnDiscrepancies(series: FinancialSeries): void {
  if (series.discrepancies.length === 0) return;
  console.warn("[financialAnalysis] balance sheet does not reconcile", {
    periods: series.discrepancies.map((d) => d.periodId),
    largestDifference: Math.max(...series.discrepancies.map((d) => Math.abs(d.difference))),
  });
}

function checkAnalyzerOptions(config: AnalyzerConfig): void {
  try {
    resolveGuard({ epsilon: config.epsilon });
    resolveNormalizeOptions(config.normalize ?? {});
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new ConfigError("Invalid analyzer configuration", [err.message]);
    }
    throw err;
  }
}

/**
 * Build an analyzer bound to one validated rubric. A bad rubric throws
 * ConfigError here, before any analysis runs, as do bad default options.
 */
export function createFinancialAnalyzer(config: AnalyzerConfig = {}): FinancialAnalyzer {
  checkAnalyzerOptions(config);
  const rubric = deepFreeze(mergeRubric(DEFAULT_SCORING_RUBRIC, config.rubric ?? {}));
  const rubricVersion = computeRubricVersion(rubric);
  const ratioOptions = config.epsilon === undefined ? {} : { epsilon: config.epsilon };

  function analyze(raw: unknown, options: AnalyzeOptions = {}): FinancialAnalysisResult {
    const series = normalizeStatements(raw, { ...config.normalize, ...options.normalize });
    warnOnDiscrepancies(series);

    const ratios = computeRatioSet(series, ratioOptions);
    const dupont = computeDupontDecomposition(series, ratioOptions);
    const trends = analyzeTrends(series, {
      window: options.window ?? rubric.lookbackWindow,
      deadBandPct: rubric.trendDeadBandPct,
    });
    const health = scoreFinancialHealth(ratios, trends, rubric);

    const classification = options.industry ? classifyIndustry(options.industry) : null;
    const industry = classification ? compareWithIndustry(ratios, classification) : null;

    return deepFreeze({
      series,
      ratios,
      dupont,
      trends,
      health,
      industry,
      meta: {
        rubricVersion,
        periodCount: series.periods.length,
        latestPeriodId: series.latest.periodId,
      },
    });
  }

  return { rubric, rubricVersion, analyze };
}

let defaultAnalyzer: FinancialAnalyzer | null = null;

/**
 * Analyze raw statements under the default rubric.
 *
 * Pure function — deterministic, no side effects beyond the reconciliation
 * warning.
 */
export function runFinancialAnalysis(
  raw: unknown,
  options: AnalyzeOptions = {},
): FinancialAnalysisResult {
  defaultAnalyzer ??= createFinancialAnalyzer();
  return defaultAnalyzer.analyze(raw, options);
}
