import { z } from "zod";
import type { AdjudicationDegraded } from "../../core/entities/appError";
import {
  universeCategories,
  type UniverseCategory,
} from "../../core/entities/candidate";
import type { Evidence } from "../../core/entities/scan";
import type { ClassifierPort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

export type AdjudicationPolicy = {
  bandLow: number;
  bandHigh: number;
  maxAdjustment: number;
};

export type AdjudicationRequest = {
  ticker: string;
  stage1Score: number;
  stage1Category: UniverseCategory;
  evidence: Evidence;
};

const buildVerdictSchema = (maxAdjustment: number) =>
  z.object({
    isGenuine: z.boolean(),
    category: z.enum(universeCategories).nullable().optional(),
    confidence: z.number().int().min(0).max(100),
    adjustment: z.number().int().min(-maxAdjustment).max(maxAdjustment),
    reasoning: z.string().optional(),
  });

export type ClassifierVerdict = z.infer<ReturnType<typeof buildVerdictSchema>>;

export type AdjudicationResult = {
  finalScore: number;
  finalCategory: UniverseCategory;
  adjudication: "skipped" | "applied" | "degraded";
  verdict?: ClassifierVerdict;
  degraded?: AdjudicationDegraded;
};

const MAX_EVIDENCE_LINES = 12;
const MAX_DESCRIPTION_CHARS = 600;

const clipScore = (value: number): number => Math.max(0, Math.min(100, value));

/**
 * Second-stage refinement for scores inside the ambiguous band.
 *
 * Classifier output is untrusted: it is schema-checked against the policy before any
 * adjustment is applied, and every failure falls back to the stage-1 values.
 */
export class Adjudicator {
  private readonly verdictSchema: ReturnType<typeof buildVerdictSchema>;

  constructor(
    private readonly classifier: ClassifierPort,
    private readonly policy: AdjudicationPolicy,
  ) {
    if (policy.bandLow > policy.bandHigh) {
      throw new Error(
        `Adjudication band is empty: ${policy.bandLow} > ${policy.bandHigh}.`,
      );
    }
    this.verdictSchema = buildVerdictSchema(policy.maxAdjustment);
  }

  requiresCall(stage1Score: number): boolean {
    return (
      stage1Score >= this.policy.bandLow && stage1Score <= this.policy.bandHigh
    );
  }

  async adjudicate(request: AdjudicationRequest): Promise<AdjudicationResult> {
    const passThrough = {
      finalScore: request.stage1Score,
      finalCategory: request.stage1Category,
    };

    if (!this.requiresCall(request.stage1Score)) {
      return { ...passThrough, adjudication: "skipped" };
    }

    let raw: unknown;
    try {
      const result = await this.classifier.classify({
        ticker: request.ticker,
        companyName: request.evidence.companyName,
        sector: request.evidence.sector,
        stage1Score: request.stage1Score,
        stage1Category: request.stage1Category,
        minScore: clipScore(request.stage1Score - this.policy.maxAdjustment),
        maxScore: clipScore(request.stage1Score + this.policy.maxAdjustment),
        evidenceLines: this.toEvidenceLines(request.evidence),
      });

      if (result.isErr()) {
        return this.degrade(
          request,
          `${result.error.provider} ${result.error.code}: ${result.error.message}`,
          result.error,
        );
      }
      raw = result.value;
    } catch (error) {
      return this.degrade(
        request,
        error instanceof Error ? error.message : "Classifier call failed.",
      );
    }

    const parsed = this.verdictSchema.safeParse(raw);
    if (!parsed.success) {
      return this.degrade(
        request,
        `Classifier verdict rejected: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "verdict"} ${issue.message}`)
          .join("; ")}`,
      );
    }

    const verdict = parsed.data;
    return {
      finalScore: clipScore(request.stage1Score + verdict.adjustment),
      finalCategory: verdict.category ?? request.stage1Category,
      adjudication: "applied",
      verdict,
    };
  }

  private toEvidenceLines(evidence: Evidence): string[] {
    const description = evidence.description.trim();
    return [
      ...(description ? [description.slice(0, MAX_DESCRIPTION_CHARS)] : []),
      ...evidence.headlines,
      ...evidence.filingSnippets,
    ].slice(0, MAX_EVIDENCE_LINES);
  }

  private degrade(
    request: AdjudicationRequest,
    reason: string,
    boundary?: AdjudicationDegraded["boundary"],
  ): AdjudicationResult {
    logger.warn(
      { ticker: request.ticker, stage1Score: request.stage1Score, reason },
      "Adjudication degraded; keeping stage-1 score",
    );

    return {
      finalScore: request.stage1Score,
      finalCategory: request.stage1Category,
      adjudication: "degraded",
      degraded: {
        kind: "adjudication_degraded",
        ticker: request.ticker,
        reason,
        boundary,
      },
    };
  }
}
