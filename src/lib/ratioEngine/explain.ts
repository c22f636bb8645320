/**
 * Ratio Engine — Explainability Helpers
 *
 * Guarded division and the RatioResult builder. Guards throw
 * ComputationError; buildRatio converts that into an unavailable value so a
 * single bad ratio never aborts the set.
 */

import { ComputationError } from "@/lib/analysisErrors";
import { attempt } from "@/lib/metricValue";
import type { RatioDimension, RatioKey, RatioResult, RatioUnit } from "./types";

export const DEFAULT_EPSILON = 1e-6;

export const UNIT_DECIMALS: Record<RatioUnit, number> = {
  percent: 2,
  times: 4,
  amount: 2,
};

export interface DivideGuard {
  epsilon: number;
  /** Reject zero and negative denominators (equity-based ratios). */
  requirePositive?: boolean;
}

/**
 * numerator / denominator, throwing ComputationError when the denominator is
 * effectively zero (or not positive, when required).
 */
export function guardedDivide(
  numerator: number,
  denominatorKey: string,
  denominator: number,
  guard: DivideGuard,
): number {
  if (guard.requirePositive && denominator <= guard.epsilon) {
    throw new ComputationError(
      "non_positive_denominator",
      `${denominatorKey} must be positive (got ${denominator})`,
    );
  }
  if (Math.abs(denominator) < guard.epsilon) {
    throw new ComputationError("division_by_zero", `${denominatorKey} is zero`);
  }
  return numerator / denominator;
}

export interface RatioDefinition {
  key: RatioKey;
  dimension: RatioDimension;
  unit: RatioUnit;
  formula: string;
  inputs: Record<string, number | null>;
}

export function buildRatio(definition: RatioDefinition, compute: () => number): RatioResult {
  return {
    ...attempt(compute, UNIT_DECIMALS[definition.unit]),
    ...definition,
  };
}
