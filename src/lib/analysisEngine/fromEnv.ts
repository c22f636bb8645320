/**
 * Analysis Engine — Environment Wiring
 *
 * Reads the rubric file, lookback window and unit scale from the
 * environment at initialization.
 */

import { loadScoringRubricFromFile } from "@/lib/configEngine/loadConfig";
import type { ScoringRubricOverride } from "@/lib/configEngine/types";
import { analysisEnv } from "@/lib/env/analysisEnv";
import { createFinancialAnalyzer } from "./analyzer";
import type { FinancialAnalyzer } from "./types";

export function createFinancialAnalyzerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): FinancialAnalyzer {
  const parsed = analysisEnv(env);

  let rubric: ScoringRubricOverride = parsed.FIN_HEALTH_RUBRIC_PATH
    ? loadScoringRubricFromFile(parsed.FIN_HEALTH_RUBRIC_PATH)
    : {};
  if (parsed.FIN_HEALTH_LOOKBACK_WINDOW !== undefined) {
    rubric = { ...rubric, lookbackWindow: parsed.FIN_HEALTH_LOOKBACK_WINDOW };
  }

  return createFinancialAnalyzer({
    rubric,
    normalize:
      parsed.FIN_HEALTH_UNIT_SCALE === undefined ? {} : { unitScale: parsed.FIN_HEALTH_UNIT_SCALE },
  });
}
