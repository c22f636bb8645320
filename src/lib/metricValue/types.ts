/**
 * Metric Value — Types
 *
 * One explicit representation of "could not be computed" shared by every
 * ratio, trend statistic and score. Unavailable values are never omitted and
 * never coerced to 0.
 */

import type { ComputationErrorCode } from "@/lib/analysisErrors";

export type UnavailableReason =
  | ComputationErrorCode
  | "no_available_indicators"
  | "no_available_dimensions";

export interface AvailableMetric<T> {
  status: "available";
  value: T;
}

export interface UnavailableMetric {
  status: "unavailable";
  reason: UnavailableReason;
  detail: string;
}

export type MetricValue<T = number> = AvailableMetric<T> | UnavailableMetric;
