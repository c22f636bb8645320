/**
 * Config Engine — Rubric Schema
 *
 * zod shape checks plus the cross-field rules a shape cannot express. Every
 * violation is collected into one ConfigError.
 */

import { z } from "zod";
import { ConfigError } from "@/lib/analysisErrors";
import { RATIO_KEYS } from "@/lib/ratioEngine/types";
import { TREND_QUANTITIES } from "@/lib/trendEngine/types";
import {
  HEALTH_DIMENSIONS,
  RISK_LEVELS,
  type ScoringRubric,
  type ScoringRubricOverride,
} from "./types";

const WEIGHT_SUM = 100;
const WEIGHT_SUM_TOLERANCE = 1e-6;

const DimensionSchema = z.enum(HEALTH_DIMENSIONS);
const RiskLevelSchema = z.enum(RISK_LEVELS);

const IndicatorSourceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ratio"), ratio: z.enum(RATIO_KEYS) }),
  z.object({ kind: z.literal("cagr"), quantity: z.enum(TREND_QUANTITIES) }),
]);

const IndicatorRuleSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  dimension: DimensionSchema,
  source: IndicatorSourceSchema,
  weight: z.number().positive(),
  zeroAt: z.number().finite(),
  fullAt: z.number().finite(),
});

const RiskTierRuleSchema = z.object({
  level: RiskLevelSchema,
  minScore: z.number().min(0).max(100),
});

const Score = z.number().min(0).max(100);

const DimensionWeightsSchema = z.object({
  profitability: z.number().min(0),
  solvency: z.number().min(0),
  efficiency: z.number().min(0),
  growth: z.number().min(0),
  cashFlowQuality: z.number().min(0),
});

export const ScoringRubricSchema = z
  .object({
    dimensionWeights: DimensionWeightsSchema,
    indicators: z.array(IndicatorRuleSchema),
    riskTiers: z.array(RiskTierRuleSchema),
    trendDeadBandPct: z.number().finite().min(0),
    narrative: z.object({ strengthAt: Score, weaknessBelow: Score }),
    lookbackWindow: z.number().int().min(1),
  })
  .superRefine((rubric, ctx) => {
    const weightSum = HEALTH_DIMENSIONS.reduce((sum, d) => sum + rubric.dimensionWeights[d], 0);
    if (Math.abs(weightSum - WEIGHT_SUM) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["dimensionWeights"],
        message: `dimension weights must sum to ${WEIGHT_SUM} (got ${weightSum})`,
      });
    }

    for (const dimension of HEALTH_DIMENSIONS) {
      if (!rubric.indicators.some((rule) => rule.dimension === dimension)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["indicators"],
          message: `dimension ${dimension} has no indicator rule`,
        });
      }
    }

    const ids = new Set<string>();
    rubric.indicators.forEach((rule, index) => {
      if (ids.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["indicators", index, "id"],
          message: `duplicate indicator id ${rule.id}`,
        });
      }
      ids.add(rule.id);
      if (rule.zeroAt === rule.fullAt) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["indicators", index],
          message: `indicator ${rule.id} has zeroAt equal to fullAt`,
        });
      }
    });

    for (const level of RISK_LEVELS) {
      const count = rubric.riskTiers.filter((tier) => tier.level === level).length;
      if (count !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["riskTiers"],
          message: `risk level ${level} must appear exactly once (found ${count})`,
        });
      }
    }
    const minScores = rubric.riskTiers.map((tier) => tier.minScore);
    if (new Set(minScores).size !== minScores.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["riskTiers"],
        message: "risk tiers must have distinct minimum scores",
      });
    }
    if (!minScores.includes(0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["riskTiers"],
        message: "one risk tier must start at 0",
      });
    }
    const ordered = [...rubric.riskTiers].sort((a, b) => b.minScore - a.minScore);
    if (
      ordered.length === RISK_LEVELS.length &&
      ordered.some((tier, index) => tier.level !== RISK_LEVELS[index])
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["riskTiers"],
        message: `risk tiers must rank ${RISK_LEVELS.join(" > ")} by minimum score`,
      });
    }

    if (rubric.narrative.weaknessBelow >= rubric.narrative.strengthAt) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["narrative"],
        message: "weaknessBelow must be lower than strengthAt",
      });
    }
  });

export const ScoringRubricOverrideSchema = z
  .object({
    dimensionWeights: DimensionWeightsSchema.partial(),
    indicators: z.array(IndicatorRuleSchema),
    riskTiers: z.array(RiskTierRuleSchema),
    trendDeadBandPct: z.number(),
    narrative: z.object({ strengthAt: z.number(), weaknessBelow: z.number() }).partial(),
    lookbackWindow: z.number(),
  })
  .partial()
  .strict();

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate a complete rubric. Returns a fresh rubric with tiers sorted
 * highest first.
 */
export function loadScoringRubric(input: unknown): ScoringRubric {
  const parsed = ScoringRubricSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("Invalid scoring rubric", formatIssues(parsed.error));
  }
  const rubric: ScoringRubric = parsed.data;
  return {
    ...rubric,
    riskTiers: [...rubric.riskTiers].sort((a, b) => b.minScore - a.minScore),
  };
}

/** Shape-check a partial rubric. Cross-field rules run after merging. */
export function parseRubricOverride(input: unknown): ScoringRubricOverride {
  const parsed = ScoringRubricOverrideSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("Invalid scoring rubric override", formatIssues(parsed.error));
  }
  return parsed.data;
}
