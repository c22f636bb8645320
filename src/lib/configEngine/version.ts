/**
 * Config Engine — Deterministic Rubric Version
 *
 * Content hash of a rubric, carried in every analysis result so two results
 * can be compared knowing whether they were scored under the same rules.
 */

import { createHash } from "node:crypto";
import type { ScoringRubric } from "./types";

export function computeRubricVersion(rubric: ScoringRubric): string {
  return createHash("sha256")
    .update(JSON.stringify(rubric), "utf8")
    .digest("hex")
    .slice(0, 16);
}
