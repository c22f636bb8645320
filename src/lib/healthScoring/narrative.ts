/**
 * Health Scoring — Narrative Rules
 *
 * Fixed template tables keyed by dimension and score band. Walks dimensions
 * in declaration order and indicators in rubric order, so identical input
 * always yields identical text in identical order.
 */

import {
  HEALTH_DIMENSIONS,
  type HealthDimension,
  type NarrativeThresholds,
} from "@/lib/configEngine/types";
import type {
  DimensionScore,
  HealthOutlook,
  NarrativeEntry,
  Recommendation,
} from "./types";

export const DIMENSION_LABELS: Record<HealthDimension, string> = {
  profitability: "盈利能力",
  solvency: "偿债能力",
  efficiency: "运营效率",
  growth: "成长能力",
  cashFlowQuality: "现金流质量",
};

const RECOMMENDATION_TEMPLATES: Record<HealthDimension, string> = {
  profitability: "盈利能力偏弱，建议关注成本控制和产品定价能力。",
  solvency: "负债水平偏高，建议优化资本结构，降低财务风险。",
  efficiency: "资产周转偏慢，建议优化资产结构，提高资产使用效率。",
  growth: "增长动力不足，建议分析原因并制定应对策略。",
  cashFlowQuality: "现金流偏弱，建议加强应收账款管理，改善现金回收。",
};

/** Lower bound inclusive, highest band first. */
const OUTLOOK_BANDS: ReadonlyArray<{ minScore: number; outlook: HealthOutlook }> = [
  {
    minScore: 80,
    outlook: {
      title: "财务状况优异",
      detail: "公司各项财务指标表现优秀，具有较强的抗风险能力和持续发展潜力。",
      shortTerm: "短期业绩稳健，预期保持平稳发展。",
      longTerm: "长期发展前景良好，具备持续竞争优势。",
    },
  },
  {
    minScore: 60,
    outlook: {
      title: "财务状况良好",
      detail: "公司财务状况整体健康，但存在部分需要关注的指标。",
      shortTerm: "短期业绩基本稳定，需关注市场变化。",
      longTerm: "长期发展取决于各项指标的改善情况。",
    },
  },
  {
    minScore: 40,
    outlook: {
      title: "存在改善空间",
      detail: "公司财务状况一般，部分指标表现欠佳。",
      shortTerm: "短期面临一定压力，需谨慎观察。",
      longTerm: "长期发展存在不确定性，需关注应对策略。",
    },
  },
  {
    minScore: 0,
    outlook: {
      title: "存在财务风险",
      detail: "公司多项财务指标表现不佳，存在一定的财务风险。",
      shortTerm: "短期存在较大不确定性，建议谨慎对待。",
      longTerm: "长期面临挑战，需要密切关注改善措施。",
    },
  },
];

export function selectOutlook(overallScore: number): HealthOutlook {
  const band = OUTLOOK_BANDS.find((b) => overallScore >= b.minScore);
  return { ...(band ?? OUTLOOK_BANDS[OUTLOOK_BANDS.length - 1]).outlook };
}

export interface Narrative {
  strengths: NarrativeEntry[];
  weaknesses: NarrativeEntry[];
  recommendations: Recommendation[];
}

export function buildNarrative(
  dimensions: Record<HealthDimension, DimensionScore>,
  thresholds: NarrativeThresholds,
): Narrative {
  const strengths: NarrativeEntry[] = [];
  const weaknesses: NarrativeEntry[] = [];
  const weakDimensions = new Set<HealthDimension>();

  for (const dimension of HEALTH_DIMENSIONS) {
    const label = DIMENSION_LABELS[dimension];
    for (const indicator of dimensions[dimension].indicators) {
      if (indicator.score.status !== "available") continue;
      const score = indicator.score.value;
      const scoreText = score.toFixed(1);

      if (score >= thresholds.strengthAt) {
        strengths.push({
          dimension,
          indicatorId: indicator.id,
          text: `${label}：${indicator.label}得分${scoreText}，表现优秀`,
        });
      } else if (score < thresholds.weaknessBelow) {
        weaknesses.push({
          dimension,
          indicatorId: indicator.id,
          text: `${label}：${indicator.label}得分${scoreText}，表现偏弱`,
        });
        weakDimensions.add(dimension);
      }
    }
  }

  const recommendations = HEALTH_DIMENSIONS.filter((d) => weakDimensions.has(d)).map(
    (dimension) => ({ dimension, text: RECOMMENDATION_TEMPLATES[dimension] }),
  );

  return { strengths, weaknesses, recommendations };
}
