/**
 * Config Engine — Rubric File Loader
 *
 * Reads a JSON rubric override from disk and merges it onto a base rubric.
 * Runs at initialization only; the analysis path never touches the file
 * system.
 */

import { readFileSync } from "node:fs";
import { ConfigError } from "@/lib/analysisErrors";
import { DEFAULT_SCORING_RUBRIC } from "./defaults";
import { mergeRubric } from "./merge";
import { parseRubricOverride } from "./schema";
import type { ScoringRubric } from "./types";

function readJson(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read scoring rubric ${path}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Scoring rubric ${path} is not valid JSON`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
}

/**
 * Load a rubric file. The file may hold a complete rubric or any subset of
 * its fields.
 */
export function loadScoringRubricFromFile(
  path: string,
  base: ScoringRubric = DEFAULT_SCORING_RUBRIC,
): ScoringRubric {
  return mergeRubric(base, parseRubricOverride(readJson(path)));
}
