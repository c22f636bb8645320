/**
 * Analysis Engine — Public API
 */

export type {
  AnalysisMeta,
  AnalyzeOptions,
  AnalyzerConfig,
  FinancialAnalysisResult,
  FinancialAnalyzer,
} from "./types";
export { createFinancialAnalyzer, runFinancialAnalysis } from "./analyzer";
export { createFinancialAnalyzerFromEnv } from "./fromEnv";
