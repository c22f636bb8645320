import { z } from "zod";
import { ConfigError } from "@/lib/analysisErrors";
import { formatIssues } from "@/lib/configEngine/schema";

const AnalysisEnvSchema = z.object({
  // Partial rubric JSON merged onto the defaults
  FIN_HEALTH_RUBRIC_PATH: z.string().min(1).optional(),

  // Overrides the rubric's trend lookback window
  FIN_HEALTH_LOOKBACK_WINDOW: z.coerce.number().int().positive().optional(),

  // Divisor for raw monetary figures (e.g. 100000000 for 亿元)
  FIN_HEALTH_UNIT_SCALE: z.coerce.number().finite().positive().optional(),
});

export type AnalysisEnv = z.infer<typeof AnalysisEnvSchema>;

export function analysisEnv(env: NodeJS.ProcessEnv = process.env): AnalysisEnv {
  const parsed = AnalysisEnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid analysis env:", parsed.error.flatten().fieldErrors);
    throw new ConfigError("Invalid analysis environment variables", formatIssues(parsed.error));
  }
  return parsed.data;
}
