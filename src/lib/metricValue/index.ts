/**
 * Metric Value — Helpers
 *
 * Constructors, guards and the ComputationError → unavailable boundary.
 */

import { ComputationError } from "@/lib/analysisErrors";
import type {
  AvailableMetric,
  MetricValue,
  UnavailableMetric,
  UnavailableReason,
} from "./types";

export type { AvailableMetric, MetricValue, UnavailableMetric, UnavailableReason } from "./types";

export function available<T>(value: T): MetricValue<T> {
  return { status: "available", value };
}

export function unavailable<T = number>(
  reason: UnavailableReason,
  detail: string,
): MetricValue<T> {
  return { status: "unavailable", reason, detail };
}

export function isAvailable<T>(metric: MetricValue<T>): metric is AvailableMetric<T> {
  return metric.status === "available";
}

export function isUnavailable<T>(metric: MetricValue<T>): metric is UnavailableMetric {
  return metric.status === "unavailable";
}

export function valueOrNull<T>(metric: MetricValue<T>): T | null {
  return metric.status === "available" ? metric.value : null;
}

/**
 * Round half away from zero on the scaled value. Negative zero collapses to 0
 * so serialized output and strict equality agree.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Run a computation that signals arithmetic edge cases by throwing
 * ComputationError, and convert those into an unavailable metric.
 *
 * Any other error is a programming fault and propagates unchanged.
 */
export function attempt(compute: () => number, decimals?: number): MetricValue {
  try {
    const value = compute();
    if (!Number.isFinite(value)) {
      return unavailable("non_finite_result", `result is ${String(value)}`);
    }
    return available(decimals === undefined ? value : roundTo(value, decimals));
  } catch (err) {
    if (err instanceof ComputationError) {
      return unavailable(err.code, err.message);
    }
    throw err;
  }
}

/**
 * Require an input to be present, for use inside attempt().
 */
export function requireInput(name: string, value: number | null | undefined): number {
  if (value === null || value === undefined) {
    throw new ComputationError("missing_input", `${name} unavailable`);
  }
  return value;
}
