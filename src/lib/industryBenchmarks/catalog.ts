/**
 * Industry Benchmarks — Catalog
 *
 * Loads the benchmark data file through a zod schema once at module load.
 */

import { z } from "zod";
import { ConfigError } from "@/lib/analysisErrors";
import { formatIssues } from "@/lib/configEngine/schema";
import { RATIO_KEYS } from "@/lib/ratioEngine/types";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import benchmarksJson from "./benchmarks.json";
import type { BenchmarkCatalog, IndustryProfile } from "./types";

const BenchmarkAnchorSchema = z
  .object({
    min: z.number().finite(),
    max: z.number().finite(),
    ideal: z.number().finite(),
    weight: z.number().positive(),
  })
  .refine((a) => a.min <= a.ideal && a.ideal <= a.max, {
    message: "ideal must lie within [min, max]",
  });

const IndustryProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  nameEn: z.string(),
  description: z.string(),
  keywords: z.array(z.string().min(1)),
  stockExamples: z.array(z.string()),
  metrics: z.record(z.enum(RATIO_KEYS), BenchmarkAnchorSchema),
  specialRules: z
    .object({
      debtTolerance: z.enum(["normal", "high"]).optional(),
      cashflowCritical: z.boolean().optional(),
    })
    .strict()
    .default({}),
  guidance: z.array(z.string().min(1)).default([]),
});

export const BenchmarkCatalogSchema = z
  .object({
    boardPrefixes: z.array(z.object({ prefix: z.string().min(1), industry: z.string() })),
    industryNameMapping: z.record(z.string(), z.string()),
    industries: z.array(IndustryProfileSchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const ids = new Set<string>();
    catalog.industries.forEach((industry, index) => {
      if (ids.has(industry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["industries", index, "id"],
          message: `duplicate industry id ${industry.id}`,
        });
      }
      ids.add(industry.id);
    });

    catalog.boardPrefixes.forEach((board, index) => {
      if (!ids.has(board.industry)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["boardPrefixes", index, "industry"],
          message: `unknown industry ${board.industry}`,
        });
      }
    });

    for (const [sector, industry] of Object.entries(catalog.industryNameMapping)) {
      if (!ids.has(industry)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["industryNameMapping", sector],
          message: `unknown industry ${industry}`,
        });
      }
    }
  });

export function loadBenchmarkCatalog(input: unknown): BenchmarkCatalog {
  const parsed = BenchmarkCatalogSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("Invalid benchmark catalog", formatIssues(parsed.error));
  }
  return parsed.data;
}

export const BENCHMARK_CATALOG: BenchmarkCatalog = deepFreeze(loadBenchmarkCatalog(benchmarksJson));

export function listIndustries(catalog: BenchmarkCatalog = BENCHMARK_CATALOG): IndustryProfile[] {
  return catalog.industries;
}

export function findIndustry(
  id: string,
  catalog: BenchmarkCatalog = BENCHMARK_CATALOG,
): IndustryProfile | null {
  return catalog.industries.find((industry) => industry.id === id) ?? null;
}
