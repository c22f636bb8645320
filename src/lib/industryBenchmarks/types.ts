/**
 * Industry Benchmarks — Types
 */

import type { RiskLevel } from "@/lib/configEngine/types";
import type { MetricValue } from "@/lib/metricValue/types";
import type { RatioKey } from "@/lib/ratioEngine/types";

export interface BenchmarkAnchor {
  min: number;
  max: number;
  ideal: number;
  weight: number;
}

export interface SpecialRules {
  /** "high": leverage above the debt-note threshold is normal for the industry */
  debtTolerance?: "normal" | "high";
  /** Weak cash conversion discounts the adjusted score */
  cashflowCritical?: boolean;
}

export interface IndustryProfile {
  id: string;
  name: string;
  nameEn: string;
  description: string;
  keywords: string[];
  stockExamples: string[];
  metrics: Partial<Record<RatioKey, BenchmarkAnchor>>;
  specialRules: SpecialRules;
  /** Industry-specific advice appended to the recommendations */
  guidance: string[];
}

export interface BoardPrefix {
  prefix: string;
  industry: string;
}

export interface BenchmarkCatalog {
  boardPrefixes: BoardPrefix[];
  /** Sector name → industry id */
  industryNameMapping: Record<string, string>;
  industries: IndustryProfile[];
}

export interface IndustryHint {
  industryId?: string;
  stockCode?: string;
  companyName?: string;
  industryName?: string;
}

export type IndustryMatch = "industryId" | "industryName" | "stockCode" | "keyword";

export interface IndustryClassification {
  profile: IndustryProfile;
  matchedBy: IndustryMatch;
}

export const BENCHMARK_RATINGS = ["优秀", "良好", "一般", "较差", "差"] as const;
export type BenchmarkRating = (typeof BENCHMARK_RATINGS)[number];

/** Position relative to the industry ideal; "at" within ±10%. */
export type BenchmarkStatus = "at" | "above" | "below";

export interface BenchmarkedMetric {
  ratio: RatioKey;
  label: string;
  anchor: BenchmarkAnchor;
  value: MetricValue;
  score: MetricValue;
  rating: BenchmarkRating | null;
  /** value − ideal; null when the value is unavailable */
  difference: number | null;
  /** difference / ideal × 100; null when unavailable or the ideal is 0 */
  differencePct: number | null;
  status: BenchmarkStatus | null;
}

export interface IndustryComparison {
  industryId: string;
  industryName: string;
  matchedBy: IndustryMatch;
  metrics: BenchmarkedMetric[];
  /** Product of the special-rule factors applied to the adjusted score */
  adjustmentFactor: number;
  adjustmentNotes: string[];
  /** Weight-renormalised mean of the available metric scores, times the adjustment factor */
  adjustedScore: MetricValue;
  adjustedRating: BenchmarkRating | null;
  riskLevel: RiskLevel | null;
  recommendations: string[];
}
