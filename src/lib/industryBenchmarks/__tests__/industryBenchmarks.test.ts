/**
 * Industry Benchmarks Tests
 *
 * Catalog validation, classification order, anchor scoring and the
 * industry-adjusted score.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ConfigError, ValidationError } from "@/lib/analysisErrors";
import type { MetricValue } from "@/lib/metricValue";
import { computeRatioSet } from "@/lib/ratioEngine";
import { normalizeStatements } from "@/lib/statementNormalizer";
import { BENCHMARK_CATALOG, findIndustry, loadBenchmarkCatalog } from "../catalog";
import { classifyIndustry, keywordScore } from "../classify";
import { compareWithIndustry, rateBenchmarkScore, scoreAgainstBenchmark } from "../compare";
import type { IndustryClassification, IndustryProfile } from "../types";

function valueOf(metric: MetricValue): number {
  assert.equal(metric.status, "available");
  if (metric.status !== "available") throw new Error("unreachable");
  return metric.value;
}

function reasonOf(metric: MetricValue): string {
  assert.equal(metric.status, "unavailable");
  if (metric.status !== "unavailable") throw new Error("unreachable");
  return metric.reason;
}

function profileOf(id: string): IndustryProfile {
  const profile = findIndustry(id);
  assert.ok(profile, `missing industry ${id}`);
  return profile;
}

function classified(id: string): IndustryClassification {
  return { profile: profileOf(id), matchedBy: "industryId" };
}

function catalogIssues(input: unknown): string[] {
  try {
    loadBenchmarkCatalog(input);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  assert.fail("expected ConfigError");
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

describe("BENCHMARK_CATALOG", () => {
  it("loads every industry profile", () => {
    assert.equal(BENCHMARK_CATALOG.industries.length, 12);
    assert.deepEqual(profileOf("manufacturing").metrics.roe, {
      min: 6,
      max: 20,
      ideal: 12,
      weight: 0.25,
    });
  });

  it("expresses cash conversion anchors in percent", () => {
    assert.deepEqual(profileOf("construction").metrics.ocfToNetProfit, {
      min: 50,
      max: 150,
      ideal: 90,
      weight: 0.1,
    });
  });

  it("returns null for an unknown id", () => {
    assert.equal(findIndustry("shipbuilding"), null);
  });
});

describe("loadBenchmarkCatalog", () => {
  const base = {
    boardPrefixes: [{ prefix: "9", industry: "alpha" }],
    industryNameMapping: { 阿尔法: "alpha" },
    industries: [
      {
        id: "alpha",
        name: "阿尔法",
        nameEn: "Alpha",
        description: "",
        keywords: ["阿尔法"],
        stockExamples: [],
        metrics: { roe: { min: 5, max: 15, ideal: 10, weight: 1 } },
      },
    ],
  };

  it("accepts a well-formed catalog", () => {
    assert.equal(loadBenchmarkCatalog(base).industries[0].id, "alpha");
  });

  it("rejects an ideal outside its range", () => {
    const issues = catalogIssues({
      ...base,
      industries: [
        { ...base.industries[0], metrics: { roe: { min: 5, max: 15, ideal: 20, weight: 1 } } },
      ],
    });
    assert.deepEqual(issues, ["industries.0.metrics.roe: ideal must lie within [min, max]"]);
  });

  it("rejects references to unknown industries", () => {
    const issues = catalogIssues({
      ...base,
      boardPrefixes: [{ prefix: "9", industry: "beta" }],
      industryNameMapping: { 贝塔: "beta" },
    });
    assert.deepEqual(issues, [
      "boardPrefixes.0.industry: unknown industry beta",
      "industryNameMapping.贝塔: unknown industry beta",
    ]);
  });

  it("rejects a metric that is not a ratio key", () => {
    const issues = catalogIssues({
      ...base,
      industries: [
        { ...base.industries[0], metrics: { rdRatio: { min: 1, max: 5, ideal: 3, weight: 1 } } },
      ],
    });
    assert.equal(issues.length, 1);
    assert.match(issues[0], /^industries\.0\.metrics\.rdRatio: /);
  });
});

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

describe("classifyIndustry", () => {
  it("honours an explicit industry id", () => {
    const result = classifyIndustry({ industryId: "finance", companyName: "星河软件" });
    assert.equal(result?.profile.id, "finance");
    assert.equal(result?.matchedBy, "industryId");
  });

  it("rejects an unknown explicit industry id", () => {
    assert.throws(
      () => classifyIndustry({ industryId: "shipbuilding" }),
      (err: unknown) => err instanceof ValidationError && err.code === "invalid_option",
    );
  });

  it("maps sector names exactly and by containment", () => {
    assert.equal(classifyIndustry({ industryName: "银行" })?.profile.id, "finance");
    const result = classifyIndustry({ industryName: "基础化工制品" });
    assert.equal(result?.profile.id, "materials");
    assert.equal(result?.matchedBy, "industryName");
  });

  it("prefers the sector name over the stock code", () => {
    assert.equal(classifyIndustry({ industryName: "银行", stockCode: "688111" })?.profile.id, "finance");
  });

  it("matches listed stock codes before board prefixes", () => {
    const listed = classifyIndustry({ stockCode: "600519.SH" });
    assert.equal(listed?.profile.id, "consumer");
    assert.equal(listed?.matchedBy, "stockCode");
    assert.equal(classifyIndustry({ stockCode: "688111" })?.profile.id, "technology");
    assert.equal(classifyIndustry({ stockCode: "300999" })?.profile.id, "technology");
    assert.equal(classifyIndustry({ stockCode: "830001" })?.profile.id, "manufacturing");
  });

  it("falls back to company-name keywords", () => {
    const result = classifyIndustry({ stockCode: "600123", companyName: "星河软件股份有限公司" });
    assert.equal(result?.profile.id, "technology");
    assert.equal(result?.matchedBy, "keyword");
  });

  it("rewards a name that opens with a keyword", () => {
    assert.equal(classifyIndustry({ companyName: "电子商务零售连锁" })?.profile.id, "technology");
    assert.equal(keywordScore("建筑工程", profileOf("construction").keywords), 2.25);
  });

  it("returns null when nothing matches", () => {
    assert.equal(classifyIndustry({}), null);
    assert.equal(classifyIndustry({ stockCode: "600123", companyName: "星河" }), null);
  });
});

// ---------------------------------------------------------------------------
// Anchor scoring
// ---------------------------------------------------------------------------

describe("scoreAgainstBenchmark", () => {
  const anchor = { min: 10, max: 30, ideal: 20, weight: 1 };

  it("falls off linearly from the ideal inside the range", () => {
    assert.equal(scoreAgainstBenchmark(20, anchor), 100);
    assert.equal(scoreAgainstBenchmark(25, anchor), 50);
    assert.equal(scoreAgainstBenchmark(30, anchor), 0);
  });

  it("scales proportionally outside the range", () => {
    assert.equal(scoreAgainstBenchmark(5, anchor), 50);
    assert.equal(scoreAgainstBenchmark(60, anchor), 50);
  });

  it("floors at zero", () => {
    assert.equal(scoreAgainstBenchmark(-5, anchor), 0);
    assert.equal(scoreAgainstBenchmark(30, { min: 10, max: 30, ideal: 12, weight: 1 }), 0);
    assert.equal(scoreAgainstBenchmark(-1, { min: 0, max: 10, ideal: 5, weight: 1 }), 0);
  });

  it("handles a degenerate anchor", () => {
    const point = { min: 5, max: 5, ideal: 5, weight: 1 };
    assert.equal(scoreAgainstBenchmark(5, point), 100);
    assert.equal(scoreAgainstBenchmark(6, point), 83.33);
    assert.equal(scoreAgainstBenchmark(4, point), 80);
  });
});

describe("rateBenchmarkScore", () => {
  it("uses inclusive lower bounds", () => {
    assert.equal(rateBenchmarkScore(80), "优秀");
    assert.equal(rateBenchmarkScore(79.99), "良好");
    assert.equal(rateBenchmarkScore(40), "一般");
    assert.equal(rateBenchmarkScore(20), "较差");
    assert.equal(rateBenchmarkScore(19.99), "差");
  });
});

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

describe("compareWithIndustry", () => {
  const FULL_PERIOD = computeRatioSet(
    normalizeStatements([
      {
        periodId: "2024",
        revenue: 1000,
        operatingCost: 600,
        operatingProfit: 150,
        netProfit: 120,
        totalAssets: 3000,
        totalEquity: 1000,
        totalLiabilities: 2000,
        currentAssets: 900,
        currentLiabilities: 600,
        inventory: 300,
        operatingCashFlow: 180,
        capitalExpenditure: 50,
      },
    ]),
  );

  const TWO_YEAR = computeRatioSet(
    normalizeStatements([
      { period: "Y1", revenue: 1000, net_profit: 100, total_assets: 2000, total_equity: 1000, total_liabilities: 1000 },
      { period: "Y2", revenue: 1200, net_profit: 150, total_assets: 2400, total_equity: 1200, total_liabilities: 1200 },
    ]),
  );

  it("scores every benchmarked ratio of a complete period", () => {
    const comparison = compareWithIndustry(FULL_PERIOD, classified("manufacturing"));
    assert.equal(comparison.industryId, "manufacturing");
    assert.equal(comparison.industryName, "制造业");
    assert.deepEqual(
      comparison.metrics.map((m) => [m.ratio, valueOf(m.score), m.rating]),
      [
        ["netProfitMargin", 27.27, "较差"],
        ["roe", 100, "优秀"],
        ["roa", 33.33, "较差"],
        ["grossMargin", 87.5, "优秀"],
        ["debtRatio", 97.5, "优秀"],
        ["assetTurnover", 66.66, "良好"],
      ],
    );
    assert.equal(valueOf(comparison.adjustedScore), 72.58);
    assert.equal(comparison.adjustedRating, "良好");
  });

  it("lists unavailable ratios and renormalises over the rest", () => {
    const comparison = compareWithIndustry(TWO_YEAR, classified("construction"));
    assert.deepEqual(
      comparison.metrics.map((m) => [m.ratio, m.score.status, m.rating]),
      [
        ["netProfitMargin", "available", "一般"],
        ["roe", "available", "优秀"],
        ["roa", "available", "优秀"],
        ["grossMargin", "unavailable", null],
        ["debtRatio", "available", "良好"],
        ["assetTurnover", "available", "一般"],
        ["ocfToNetProfit", "unavailable", null],
      ],
    );
    assert.equal(reasonOf(comparison.metrics[3].value), "missing_input");
    assert.equal(valueOf(comparison.metrics[1].score), 91.67);
    assert.equal(valueOf(comparison.metrics[5].score), 57.56);
    assert.equal(valueOf(comparison.adjustedScore), 69.82);
    assert.equal(comparison.adjustmentFactor, 1);
    assert.deepEqual(comparison.adjustmentNotes, []);
    assert.equal(comparison.riskLevel, "中低风险");
    assert.deepEqual(comparison.recommendations, [
      "财务状况良好，部分指标需关注",
      "现金流状况需重点关注",
      "行业高负债为常态，需关注有息负债成本",
      "建筑行业高负债属于常态，但需重点关注经营现金流对债务的覆盖。",
      "建议监控：(1) 应收账款周转天数 (2) 经营现金流/利息支出 (3) 新签合同额",
    ]);
  });

  it("applies the construction special rules", () => {
    const leveraged = computeRatioSet(
      normalizeStatements([
        {
          periodId: "2024",
          revenue: 1000,
          operatingCost: 900,
          netProfit: 30,
          totalAssets: 2000,
          totalEquity: 400,
          totalLiabilities: 1600,
          operatingCashFlow: 9,
        },
      ]),
    );
    const comparison = compareWithIndustry(leveraged, classified("construction"));
    assert.deepEqual(
      comparison.metrics.map((m) => [m.ratio, valueOf(m.score)]),
      [
        ["netProfitMargin", 100],
        ["roe", 25],
        ["roa", 50],
        ["grossMargin", 100],
        ["debtRatio", 50],
        ["assetTurnover", 77.78],
        ["ocfToNetProfit", 60],
      ],
    );
    assert.equal(comparison.adjustmentFactor, 0.8);
    assert.deepEqual(comparison.adjustmentNotes, ["建筑行业高负债为常态", "现金流严重恶化，扣减评分"]);
    assert.equal(valueOf(comparison.adjustedScore), 52.02);
    assert.equal(comparison.adjustedRating, "一般");
    assert.equal(comparison.riskLevel, "中等风险");
    assert.deepEqual(comparison.recommendations, [
      "财务状况一般，建议深入分析薄弱环节",
      "行业高负债为常态，需关注有息负债成本",
      "需关注: 净资产收益率(ROE)",
      "建筑行业高负债属于常态，但需重点关注经营现金流对债务的覆盖。",
      "建议监控：(1) 应收账款周转天数 (2) 经营现金流/利息支出 (3) 新签合同额",
    ]);
  });

  it("places each ratio relative to the industry ideal", () => {
    const comparison = compareWithIndustry(FULL_PERIOD, classified("manufacturing"));
    const roe = comparison.metrics[1];
    assert.equal(roe.label, "净资产收益率(ROE)");
    assert.equal(roe.difference, 0);
    assert.equal(roe.differencePct, 0);
    assert.equal(roe.status, "at");
    const margin = comparison.metrics[0];
    assert.equal(margin.difference, 4);
    assert.equal(margin.differencePct, 50);
    assert.equal(margin.status, "above");
    const turnover = comparison.metrics[5];
    assert.equal(turnover.difference, -0.67);
    assert.equal(turnover.differencePct, -66.67);
    assert.equal(turnover.status, "below");
    assert.equal(comparison.adjustmentFactor, 1);
    assert.deepEqual(comparison.adjustmentNotes, []);
  });

  it("leaves the position empty for an unavailable ratio", () => {
    const gross = compareWithIndustry(TWO_YEAR, classified("construction")).metrics[3];
    assert.equal(gross.status, null);
    assert.equal(gross.difference, null);
    assert.equal(gross.differencePct, null);
  });

  it("is unavailable when no benchmarked ratio can be computed", () => {
    const profile: IndustryProfile = {
      ...profileOf("retail"),
      metrics: { currentRatio: { min: 1, max: 2, ideal: 1.5, weight: 1 } },
    };
    const comparison = compareWithIndustry(TWO_YEAR, { profile, matchedBy: "keyword" });
    assert.equal(reasonOf(comparison.adjustedScore), "no_available_indicators");
    assert.equal(comparison.adjustedRating, null);
    assert.equal(comparison.riskLevel, null);
    assert.deepEqual(comparison.recommendations, []);
  });
});
