/**
 * Config Engine — Override Merging
 *
 * Missing override fields fall back to the base rubric. The merged result is
 * revalidated as a whole, so an override that breaks the weight sum fails
 * here even though each field passed on its own.
 */

import { loadScoringRubric } from "./schema";
import type { ScoringRubric, ScoringRubricOverride } from "./types";

export function mergeRubric(base: ScoringRubric, override: ScoringRubricOverride): ScoringRubric {
  return loadScoringRubric({
    dimensionWeights: { ...base.dimensionWeights, ...override.dimensionWeights },
    indicators: override.indicators ?? base.indicators,
    riskTiers: override.riskTiers ?? base.riskTiers,
    trendDeadBandPct: override.trendDeadBandPct ?? base.trendDeadBandPct,
    narrative: { ...base.narrative, ...override.narrative },
    lookbackWindow: override.lookbackWindow ?? base.lookbackWindow,
  });
}
