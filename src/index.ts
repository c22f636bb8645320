/**
 * Financial Health Engine — Public API
 */

export { ComputationError, ConfigError, ValidationError } from "@/lib/analysisErrors";
export type { ComputationErrorCode, ValidationErrorCode } from "@/lib/analysisErrors";

export * from "@/lib/metricValue";
export * from "@/lib/statementNormalizer";
export * from "@/lib/ratioEngine";
export * from "@/lib/trendEngine";
export * from "@/lib/configEngine";
export * from "@/lib/healthScoring";
export * from "@/lib/industryBenchmarks";
export * from "@/lib/analysisEngine";
export { analysisEnv } from "@/lib/env/analysisEnv";
export type { AnalysisEnv } from "@/lib/env/analysisEnv";
