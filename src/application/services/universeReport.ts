import { z } from "zod";
import {
  universeCategories,
  type CandidateEntry,
  type UniverseCategory,
} from "../../core/entities/candidate";
import type {
  UniverseSummary,
  UniverseSummaryDelta,
} from "../../core/entities/scan";

const count = z.number().int();

const categoryCountsSchema = z.object({
  ai_chip: count,
  ai_software: count,
  ai_cloud: count,
  ai_infrastructure: count,
  ai_beneficiary: count,
  none: count,
}) satisfies z.ZodType<Record<UniverseCategory, number>>;

export const universeSummarySchema = z.object({
  generatedAt: z.string(),
  activeCount: z.number().int().min(0),
  inactiveCount: z.number().int().min(0),
  countByCategory: categoryCountsSchema,
  averageScore: z.number(),
  maxScore: z.number(),
});

const emptyCounts = (): Record<UniverseCategory, number> => ({
  ai_chip: 0,
  ai_software: 0,
  ai_cloud: 0,
  ai_infrastructure: 0,
  ai_beneficiary: 0,
  none: 0,
});

const roundTo2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Category counts and score statistics cover active entries only.
 */
export const summarizeUniverse = (
  entries: CandidateEntry[],
  generatedAt: Date,
): UniverseSummary => {
  const active = entries.filter((entry) => entry.isActive);
  const countByCategory = emptyCounts();
  active.forEach((entry) => {
    countByCategory[entry.category] += 1;
  });

  const total = active.reduce((sum, entry) => sum + entry.score, 0);

  return {
    generatedAt: generatedAt.toISOString(),
    activeCount: active.length,
    inactiveCount: entries.length - active.length,
    countByCategory,
    averageScore: active.length === 0 ? 0 : roundTo2(total / active.length),
    maxScore: active.reduce((max, entry) => Math.max(max, entry.score), 0),
  };
};

export const diffSummaries = (
  current: UniverseSummary,
  previous: UniverseSummary,
): UniverseSummaryDelta => {
  const countByCategory = emptyCounts();
  universeCategories.forEach((category) => {
    countByCategory[category] =
      current.countByCategory[category] - previous.countByCategory[category];
  });

  return {
    activeCount: current.activeCount - previous.activeCount,
    averageScore: roundTo2(current.averageScore - previous.averageScore),
    maxScore: current.maxScore - previous.maxScore,
    countByCategory,
  };
};

const signed = (value: number): string => (value > 0 ? `+${value}` : `${value}`);

export const formatSummary = (
  summary: UniverseSummary,
  delta: UniverseSummaryDelta | null,
): string => {
  const categories = universeCategories
    .map((category) => {
      const count = summary.countByCategory[category];
      return delta
        ? `${category}=${count} (${signed(delta.countByCategory[category])})`
        : `${category}=${count}`;
    })
    .join(", ");

  const headline = delta
    ? `active=${summary.activeCount} (${signed(delta.activeCount)}), inactive=${summary.inactiveCount}, avg=${summary.averageScore} (${signed(delta.averageScore)}), max=${summary.maxScore} (${signed(delta.maxScore)})`
    : `active=${summary.activeCount}, inactive=${summary.inactiveCount}, avg=${summary.averageScore}, max=${summary.maxScore}`;

  return `Universe summary: ${headline}; ${categories}`;
};
