/**
 * Analysis Engine — Types
 */

import type { ScoringRubric, ScoringRubricOverride } from "@/lib/configEngine/types";
import type { HealthAssessment } from "@/lib/healthScoring/types";
import type { IndustryComparison, IndustryHint } from "@/lib/industryBenchmarks/types";
import type { DupontDecomposition, RatioSet } from "@/lib/ratioEngine/types";
import type { FinancialSeries, NormalizeOptions } from "@/lib/statementNormalizer/types";
import type { TrendSet } from "@/lib/trendEngine/types";

export interface AnalyzerConfig {
  /** Merged onto the default rubric and validated once. */
  rubric?: ScoringRubricOverride;
  /** Defaults for every analysis; per-call normalize options win key by key. */
  normalize?: NormalizeOptions;
  /** Near-zero denominator threshold for the ratio engine. */
  epsilon?: number;
}

export interface AnalyzeOptions {
  normalize?: NormalizeOptions;
  /** Trend window in periods. Defaults to the rubric's lookback window. */
  window?: number;
  /** When present, the ratios are also compared with the matched industry. */
  industry?: IndustryHint;
}

export interface AnalysisMeta {
  rubricVersion: string;
  periodCount: number;
  latestPeriodId: string;
}

export interface FinancialAnalysisResult {
  series: FinancialSeries;
  ratios: RatioSet;
  dupont: DupontDecomposition;
  trends: TrendSet;
  health: HealthAssessment;
  /** null when no industry hint was given or none matched */
  industry: IndustryComparison | null;
  meta: AnalysisMeta;
}

export interface FinancialAnalyzer {
  rubric: ScoringRubric;
  rubricVersion: string;
  analyze(raw: unknown, options?: AnalyzeOptions): FinancialAnalysisResult;
}
