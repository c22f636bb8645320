/**
 * Industry Benchmarks — Classifier
 *
 * Resolution order: explicit id, sector name, stock code, name keywords.
 *
 * Pure function — deterministic, no side effects.
 */

import { ValidationError } from "@/lib/analysisErrors";
import { BENCHMARK_CATALOG, findIndustry } from "./catalog";
import type {
  BenchmarkCatalog,
  IndustryClassification,
  IndustryHint,
  IndustryProfile,
} from "./types";

const LEADING_KEYWORD_BONUS = 2;

function stripExchangeSuffix(stockCode: string): string {
  return stockCode.trim().replace(/\.(SH|SZ|BJ)$/i, "");
}

function bySectorName(sector: string, catalog: BenchmarkCatalog): IndustryProfile | null {
  const name = sector.trim();
  if (name === "") return null;
  const exact = catalog.industryNameMapping[name];
  if (exact !== undefined) return findIndustry(exact, catalog);

  // Longest contained sector wins so "基础化工制品" maps through 基础化工.
  let best: { sector: string; industry: string } | null = null;
  for (const [mapped, industry] of Object.entries(catalog.industryNameMapping)) {
    if (name.includes(mapped) && (best === null || mapped.length > best.sector.length)) {
      best = { sector: mapped, industry };
    }
  }
  return best === null ? null : findIndustry(best.industry, catalog);
}

function byStockCode(stockCode: string, catalog: BenchmarkCatalog): IndustryProfile | null {
  const code = stripExchangeSuffix(stockCode);
  if (code === "") return null;
  const listed = catalog.industries.find((industry) => industry.stockExamples.includes(code));
  if (listed) return listed;
  const board = catalog.boardPrefixes.find((b) => code.startsWith(b.prefix));
  return board ? findIndustry(board.industry, catalog) : null;
}

/**
 * Share of an industry's keywords found in the text, plus a bonus when the
 * text opens with one of them.
 */
export function keywordScore(text: string, keywords: readonly string[]): number {
  if (keywords.length === 0) return 0;
  const hits = keywords.filter((keyword) => text.includes(keyword)).length;
  const leading = keywords.some((keyword) => text.startsWith(keyword)) ? LEADING_KEYWORD_BONUS : 0;
  return hits / keywords.length + leading;
}

function byKeywords(texts: readonly string[], catalog: BenchmarkCatalog): IndustryProfile | null {
  let best: { profile: IndustryProfile; score: number } | null = null;
  for (const profile of catalog.industries) {
    const score = texts.reduce((sum, text) => sum + keywordScore(text, profile.keywords), 0);
    if (score > 0 && (best === null || score > best.score)) {
      best = { profile, score };
    }
  }
  return best === null ? null : best.profile;
}

/**
 * Classify a company into a benchmark industry. Returns null when no hint
 * matches. An explicit but unknown industryId is a caller error.
 */
export function classifyIndustry(
  hint: IndustryHint,
  catalog: BenchmarkCatalog = BENCHMARK_CATALOG,
): IndustryClassification | null {
  if (hint.industryId !== undefined) {
    const profile = findIndustry(hint.industryId, catalog);
    if (!profile) {
      throw new ValidationError("invalid_option", `Unknown industry ${hint.industryId}`, {
        industryId: hint.industryId,
      });
    }
    return { profile, matchedBy: "industryId" };
  }

  if (hint.industryName !== undefined) {
    const profile = bySectorName(hint.industryName, catalog);
    if (profile) return { profile, matchedBy: "industryName" };
  }

  if (hint.stockCode !== undefined) {
    const profile = byStockCode(hint.stockCode, catalog);
    if (profile) return { profile, matchedBy: "stockCode" };
  }

  const texts = [hint.companyName, hint.industryName]
    .map((text) => (text ?? "").trim())
    .filter((text) => text !== "");
  const profile = byKeywords(texts, catalog);
  return profile ? { profile, matchedBy: "keyword" } : null;
}
