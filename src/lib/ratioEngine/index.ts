/**
 * Ratio Engine — Public API
 *
 * Latest-period ratios and the DuPont decomposition of ROE.
 */

export type {
  DupontDecomposition,
  DupontDriver,
  RatioDimension,
  RatioKey,
  RatioOptions,
  RatioResult,
  RatioSet,
  RatioUnit,
} from "./types";

export { RATIO_KEYS } from "./types";
export { computeRatioSet, resolveGuard } from "./ratios";
export { computeDupontDecomposition, DUPONT_TOLERANCE_PP } from "./dupont";
export { DEFAULT_EPSILON, guardedDivide } from "./explain";
