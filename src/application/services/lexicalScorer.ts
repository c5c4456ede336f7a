import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  aiCategories,
  type UniverseCategory,
} from "../../core/entities/candidate";
import type { KeywordMatch } from "../../core/entities/scan";

const MAX_SCORE = 100;

const taxonomySchema = z
  .object({
    tiers: z
      .array(
        z.object({
          name: z.string().min(1),
          weight: z.number().int().positive(),
          keywords: z.array(
            z.object({
              term: z.string().min(1),
              category: z.enum(aiCategories).optional(),
            }),
          ),
        }),
      )
      .min(1),
  })
  .superRefine((taxonomy, ctx) => {
    // A term carries one weight; matching is case-insensitive.
    const seenIn = new Map<string, string>();
    taxonomy.tiers.forEach((tier, tierIndex) => {
      tier.keywords.forEach((keyword, keywordIndex) => {
        const term = keyword.term.toLowerCase();
        const firstTier = seenIn.get(term);
        if (firstTier !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["tiers", tierIndex, "keywords", keywordIndex, "term"],
            message: `Duplicate term '${keyword.term}' (already in tier '${firstTier}')`,
          });
          return;
        }
        seenIn.set(term, tier.name);
      });
    });
  });

export type KeywordTaxonomy = z.infer<typeof taxonomySchema>;

export type LexicalScore = {
  score: number;
  category: UniverseCategory;
  /** Unclipped keyword sum; any value above zero counts as a positive mention. */
  rawScore: number;
  matches: KeywordMatch[];
};

type CompiledKeyword = {
  term: string;
  tier: string;
  weight: number;
  category: UniverseCategory | null;
  pattern: RegExp;
};

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const parseKeywordTaxonomy = (raw: unknown): KeywordTaxonomy =>
  taxonomySchema.parse(raw);

export const loadDefaultTaxonomy = (): KeywordTaxonomy =>
  parseKeywordTaxonomy(
    JSON.parse(
      readFileSync(
        new URL("./lexicon/aiKeywordTaxonomy.json", import.meta.url),
        "utf8",
      ),
    ),
  );

/**
 * Tier-weighted keyword scorer. Pure: identical input always yields identical output.
 *
 * Keywords match case-insensitively from a word start, every occurrence counts,
 * and the description and each headline are scored independently with the same weights.
 */
export class LexicalScorer {
  private readonly keywords: CompiledKeyword[];

  constructor(taxonomy: KeywordTaxonomy = loadDefaultTaxonomy()) {
    this.keywords = taxonomy.tiers.flatMap((tier) =>
      tier.keywords.map((keyword) => ({
        term: keyword.term.toLowerCase(),
        tier: tier.name,
        weight: tier.weight,
        category: keyword.category ?? null,
        pattern: new RegExp(`\\b${escapeRegExp(keyword.term)}`, "gi"),
      })),
    );
  }

  score(text: string, recentHeadlines: readonly string[]): LexicalScore {
    const occurrences = new Map<string, number>();

    for (const document of [text, ...recentHeadlines]) {
      if (!document) {
        continue;
      }

      for (const keyword of this.keywords) {
        const count = this.countOccurrences(keyword.pattern, document);
        if (count > 0) {
          occurrences.set(
            keyword.term,
            (occurrences.get(keyword.term) ?? 0) + count,
          );
        }
      }
    }

    const matches: KeywordMatch[] = this.keywords
      .filter((keyword) => occurrences.has(keyword.term))
      .map((keyword) => ({
        term: keyword.term,
        tier: keyword.tier,
        weight: keyword.weight,
        occurrences: occurrences.get(keyword.term) ?? 0,
        category: keyword.category,
      }));

    const rawScore = matches.reduce(
      (sum, match) => sum + match.weight * match.occurrences,
      0,
    );

    return {
      score: Math.min(MAX_SCORE, rawScore),
      category: this.resolveCategory(matches),
      rawScore,
      matches,
    };
  }

  private countOccurrences(pattern: RegExp, document: string): number {
    pattern.lastIndex = 0;
    let count = 0;
    while (pattern.exec(document) !== null) {
      count += 1;
    }
    return count;
  }

  /**
   * Highest cumulative contribution wins; ties resolve in category declaration order.
   */
  private resolveCategory(matches: KeywordMatch[]): UniverseCategory {
    const contribution = new Map<UniverseCategory, number>();
    matches.forEach((match) => {
      if (match.category) {
        contribution.set(
          match.category,
          (contribution.get(match.category) ?? 0) +
            match.weight * match.occurrences,
        );
      }
    });

    let best: UniverseCategory = "none";
    let bestContribution = 0;
    for (const category of aiCategories) {
      const value = contribution.get(category) ?? 0;
      if (value > bestContribution) {
        best = category;
        bestContribution = value;
      }
    }

    return best;
  }
}

/**
 * Renders matches for the candidate's notes column, strongest first.
 */
export const describeMatches = (matches: KeywordMatch[], limit = 5): string =>
  [...matches]
    .sort(
      (left, right) =>
        right.weight * right.occurrences - left.weight * left.occurrences ||
        left.term.localeCompare(right.term),
    )
    .slice(0, limit)
    .map((match) =>
      match.occurrences > 1
        ? `'${match.term}' x${match.occurrences}`
        : `'${match.term}'`,
    )
    .join(", ");
