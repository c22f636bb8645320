/**
 * Analysis Errors
 *
 * Three failure classes for the financial health engine:
 * - ValidationError: malformed or insufficient input, fatal to the call
 * - ComputationError: arithmetic edge case, internal only, always converted
 *   to an unavailable metric
 * - ConfigError: invalid rubric or environment, fatal at initialization
 */

export type ValidationErrorCode =
  | "empty_series"
  | "invalid_record"
  | "duplicate_period"
  | "missing_required_field"
  | "non_numeric_value"
  | "negative_total_assets"
  | "mixed_currency"
  | "invalid_option"
  | "invalid_window";

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;
  readonly details: Record<string, string | number>;

  constructor(
    code: ValidationErrorCode,
    message: string,
    details: Record<string, string | number> = {},
  ) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
    this.details = details;
  }
}

export type ComputationErrorCode =
  | "division_by_zero"
  | "non_positive_denominator"
  | "missing_input"
  | "non_positive_base"
  | "negative_end_value"
  | "insufficient_periods"
  | "non_finite_result";

export class ComputationError extends Error {
  readonly code: ComputationErrorCode;

  constructor(code: ComputationErrorCode, message: string) {
    super(message);
    this.name = "ComputationError";
    this.code = code;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
