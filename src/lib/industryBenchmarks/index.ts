/**
 * Industry Benchmarks
 *
 * Classifies a company into a benchmark industry and scores its ratios
 * against that industry's anchors.
 */

export type {
  BenchmarkAnchor,
  BenchmarkCatalog,
  BenchmarkedMetric,
  BenchmarkRating,
  BenchmarkStatus,
  BoardPrefix,
  IndustryClassification,
  IndustryComparison,
  IndustryHint,
  IndustryMatch,
  IndustryProfile,
  SpecialRules,
} from "./types";
export { BENCHMARK_RATINGS } from "./types";
export { BENCHMARK_CATALOG, findIndustry, listIndustries, loadBenchmarkCatalog } from "./catalog";
export { classifyIndustry, keywordScore } from "./classify";
export { compareWithIndustry, rateBenchmarkScore, scoreAgainstBenchmark } from "./compare";
