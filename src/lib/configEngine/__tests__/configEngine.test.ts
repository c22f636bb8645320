/**
 * Config Engine — Tests
 *
 * Rubric validation, override merging, file loading and versioning.
 * Uses node:test + node:assert/strict.
 */

import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ConfigError } from "@/lib/analysisErrors";
import { DEFAULT_SCORING_RUBRIC } from "../defaults";
import { loadScoringRubricFromFile } from "../loadConfig";
import { mergeRubric } from "../merge";
import { loadScoringRubric, parseRubricOverride } from "../schema";
import { computeRubricVersion } from "../version";
import type { ScoringRubric } from "../types";

function withRubric(patch: Partial<ScoringRubric>): unknown {
  return { ...DEFAULT_SCORING_RUBRIC, ...patch };
}

function configIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  assert.fail("expected ConfigError");
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

describe("DEFAULT_SCORING_RUBRIC", () => {
  it("uses the canonical dimension weights", () => {
    assert.deepEqual(DEFAULT_SCORING_RUBRIC.dimensionWeights, {
      profitability: 25,
      solvency: 25,
      efficiency: 20,
      growth: 15,
      cashFlowQuality: 15,
    });
  });

  it("orders risk tiers highest first", () => {
    assert.deepEqual(
      DEFAULT_SCORING_RUBRIC.riskTiers.map((t) => [t.level, t.minScore]),
      [
        ["低风险", 80],
        ["中低风险", 60],
        ["中等风险", 40],
        ["中高风险", 20],
        ["高风险", 0],
      ],
    );
  });

  it("carries the trend dead-band and lookback window", () => {
    assert.equal(DEFAULT_SCORING_RUBRIC.trendDeadBandPct, 2);
    assert.equal(DEFAULT_SCORING_RUBRIC.lookbackWindow, 4);
  });

  it("is frozen", () => {
    assert.ok(Object.isFrozen(DEFAULT_SCORING_RUBRIC.indicators[0]));
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("loadScoringRubric", () => {
  it("rejects weights that do not sum to 100", () => {
    const issues = configIssues(() =>
      loadScoringRubric(
        withRubric({
          dimensionWeights: {
            profitability: 30,
            solvency: 30,
            efficiency: 20,
            growth: 20,
            cashFlowQuality: 20,
          },
        }),
      ),
    );
    assert.deepEqual(issues, ["dimensionWeights: dimension weights must sum to 100 (got 120)"]);
  });

  it("rejects a dimension without indicator rules", () => {
    const issues = configIssues(() =>
      loadScoringRubric(
        withRubric({
          indicators: DEFAULT_SCORING_RUBRIC.indicators.filter((r) => r.dimension !== "efficiency"),
        }),
      ),
    );
    assert.deepEqual(issues, ["indicators: dimension efficiency has no indicator rule"]);
  });

  it("rejects a flat indicator rule", () => {
    const indicators = DEFAULT_SCORING_RUBRIC.indicators.map((rule) =>
      rule.id === "roe" ? { ...rule, fullAt: rule.zeroAt } : rule,
    );
    const issues = configIssues(() => loadScoringRubric(withRubric({ indicators })));
    assert.deepEqual(issues, ["indicators.0: indicator roe has zeroAt equal to fullAt"]);
  });

  it("rejects incomplete risk tiers", () => {
    const issues = configIssues(() =>
      loadScoringRubric(withRubric({ riskTiers: DEFAULT_SCORING_RUBRIC.riskTiers.slice(0, 4) })),
    );
    assert.deepEqual(issues, [
      "riskTiers: risk level 高风险 must appear exactly once (found 0)",
      "riskTiers: one risk tier must start at 0",
    ]);
  });

  it("rejects inverted narrative thresholds", () => {
    const issues = configIssues(() =>
      loadScoringRubric(withRubric({ narrative: { strengthAt: 40, weaknessBelow: 60 } })),
    );
    assert.deepEqual(issues, ["narrative: weaknessBelow must be lower than strengthAt"]);
  });

  it("rejects a fractional lookback window", () => {
    const issues = configIssues(() => loadScoringRubric(withRubric({ lookbackWindow: 2.5 })));
    assert.equal(issues.length, 1);
    assert.match(issues[0], /^lookbackWindow: /);
  });

  it("rejects an unknown ratio source", () => {
    const issues = configIssues(() =>
      loadScoringRubric({
        ...DEFAULT_SCORING_RUBRIC,
        indicators: [
          ...DEFAULT_SCORING_RUBRIC.indicators,
          {
            id: "ebitdaMargin",
            label: "EBITDA",
            dimension: "profitability",
            source: { kind: "ratio", ratio: "ebitdaMargin" },
            weight: 1,
            zeroAt: 0,
            fullAt: 30,
          },
        ],
      }),
    );
    assert.equal(issues.length, 1);
    assert.match(issues[0], /^indicators\.8\.source\.ratio: /);
  });

  it("names every failing rule in the error message", () => {
    assert.throws(
      () => loadScoringRubric(withRubric({ trendDeadBandPct: -1, lookbackWindow: 0 })),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.message.startsWith("Invalid scoring rubric: ") &&
        err.issues.length === 2,
    );
  });
});

// ---------------------------------------------------------------------------
// Overrides
// ---------------------------------------------------------------------------

describe("mergeRubric", () => {
  it("merges weights key by key", () => {
    const merged = mergeRubric(DEFAULT_SCORING_RUBRIC, {
      dimensionWeights: { profitability: 30, growth: 10 },
    });
    assert.deepEqual(merged.dimensionWeights, {
      profitability: 30,
      solvency: 25,
      efficiency: 20,
      growth: 10,
      cashFlowQuality: 15,
    });
    assert.deepEqual(merged.indicators, DEFAULT_SCORING_RUBRIC.indicators);
  });

  it("merges narrative thresholds and scalar fields", () => {
    const merged = mergeRubric(DEFAULT_SCORING_RUBRIC, {
      narrative: { strengthAt: 85 },
      trendDeadBandPct: 1,
      lookbackWindow: 3,
    });
    assert.deepEqual(merged.narrative, { strengthAt: 85, weaknessBelow: 40 });
    assert.equal(merged.trendDeadBandPct, 1);
    assert.equal(merged.lookbackWindow, 3);
  });

  it("revalidates the merged rubric", () => {
    const issues = configIssues(() =>
      mergeRubric(DEFAULT_SCORING_RUBRIC, { dimensionWeights: { profitability: 35 } }),
    );
    assert.deepEqual(issues, ["dimensionWeights: dimension weights must sum to 100 (got 110)"]);
  });

  it("sorts replacement tiers highest first", () => {
    const merged = mergeRubric(DEFAULT_SCORING_RUBRIC, {
      riskTiers: [
        { level: "高风险", minScore: 0 },
        { level: "中高风险", minScore: 30 },
        { level: "中等风险", minScore: 50 },
        { level: "中低风险", minScore: 70 },
        { level: "低风险", minScore: 85 },
      ],
    });
    assert.deepEqual(
      merged.riskTiers.map((t) => t.minScore),
      [85, 70, 50, 30, 0],
    );
  });
});

describe("parseRubricOverride", () => {
  it("rejects unknown keys", () => {
    const issues = configIssues(() => parseRubricOverride({ weights: {} }));
    assert.equal(issues.length, 1);
    assert.match(issues[0], /weights/);
  });
});

// ---------------------------------------------------------------------------
// File loading
// ---------------------------------------------------------------------------

describe("loadScoringRubricFromFile", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "rubric-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("merges a partial rubric file onto the defaults", () => {
    const path = join(dir, "rubric.json");
    writeFileSync(path, JSON.stringify({ lookbackWindow: 3, narrative: { weaknessBelow: 30 } }));
    const rubric = loadScoringRubricFromFile(path);
    assert.equal(rubric.lookbackWindow, 3);
    assert.deepEqual(rubric.narrative, { strengthAt: 90, weaknessBelow: 30 });
    assert.deepEqual(rubric.dimensionWeights, DEFAULT_SCORING_RUBRIC.dimensionWeights);
  });

  it("reports a missing file", () => {
    assert.throws(
      () => loadScoringRubricFromFile(join(dir, "absent.json")),
      (err: unknown) => err instanceof ConfigError && err.message.startsWith("Cannot read scoring rubric"),
    );
  });

  it("reports malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ lookbackWindow: ");
    assert.throws(
      () => loadScoringRubricFromFile(path),
      (err: unknown) => err instanceof ConfigError && err.message.includes("is not valid JSON"),
    );
  });
});

// ---------------------------------------------------------------------------
// Versioning
// ---------------------------------------------------------------------------

describe("computeRubricVersion", () => {
  it("is a 16-character hex digest", () => {
    assert.match(computeRubricVersion(DEFAULT_SCORING_RUBRIC), /^[0-9a-f]{16}$/);
  });

  it("is stable for equal rubrics and changes with content", () => {
    const copy = mergeRubric(DEFAULT_SCORING_RUBRIC, {});
    assert.equal(computeRubricVersion(copy), computeRubricVersion(DEFAULT_SCORING_RUBRIC));
    const changed = mergeRubric(DEFAULT_SCORING_RUBRIC, { trendDeadBandPct: 3 });
    assert.notEqual(computeRubricVersion(changed), computeRubricVersion(DEFAULT_SCORING_RUBRIC));
  });
});
