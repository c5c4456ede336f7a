import type { StoreWriteFailure } from "../../core/entities/appError";
import type { CandidateEntry } from "../../core/entities/candidate";
import type { KeywordMatch, TickerOutcome } from "../../core/entities/scan";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { AdjudicationResult, Adjudicator } from "./adjudicator";
import type { CallBudget } from "./callBudget";
import type { DecisionJournal } from "./decisionJournal";
import type { EvidenceGatherer } from "./evidenceGatherer";
import { describeMatches, type LexicalScorer } from "./lexicalScorer";
import type { PromotionEngine } from "./promotionEngine";
import type { UniverseStore } from "./universeStore";

export type PipelineRun = {
  lookbackDays: number;
  includeFilings: boolean;
  filingsLookbackDays?: number;
  budget: CallBudget;
};

export type CurationPipelineDeps = {
  gatherer: EvidenceGatherer;
  scorer: LexicalScorer;
  adjudicator: Adjudicator;
  store: UniverseStore;
  promotion: PromotionEngine;
  journal: DecisionJournal;
  clock: ClockPort;
};

/**
 * gather → score → adjudicate → persist → sync for a single ticker.
 *
 * Budget units are reserved before each external call. When a unit is refused the
 * ticker comes back `deferred` and nothing has been written for it.
 */
export class CurationPipeline {
  constructor(private readonly deps: CurationPipelineDeps) {}

  async process(ticker: string, run: PipelineRun): Promise<TickerOutcome> {
    const { gatherer, scorer, adjudicator, store, promotion, journal, clock } =
      this.deps;
    const symbol = ticker.trim().toUpperCase();

    if (!(await run.budget.reserve())) {
      return {
        status: "deferred",
        ticker: symbol,
        failure: run.budget.exceededFor(symbol),
      };
    }

    const existing = await store.get(symbol);
    const evidence = await gatherer.gather(symbol, {
      lookbackDays: run.lookbackDays,
      includeFilings: run.includeFilings,
      filingsLookbackDays: run.filingsLookbackDays,
      companyName: existing?.companyName ?? null,
    });

    if (evidence.isErr()) {
      logger.warn(
        { ticker: symbol, reason: evidence.error.reason },
        "Evidence unavailable; ticker left for the next cadence",
      );
      return { status: "skipped", ticker: symbol, failure: evidence.error };
    }

    const lexical = scorer.score(evidence.value.description, [
      ...evidence.value.headlines,
      ...evidence.value.filingSnippets,
    ]);

    if (
      adjudicator.requiresCall(lexical.score) &&
      !(await run.budget.reserve())
    ) {
      return {
        status: "deferred",
        ticker: symbol,
        failure: run.budget.exceededFor(symbol),
      };
    }

    const adjudication = await adjudicator.adjudicate({
      ticker: symbol,
      stage1Score: lexical.score,
      stage1Category: lexical.category,
      evidence: evidence.value,
    });

    if (adjudication.degraded) {
      await journal.record(
        "Degraded",
        `${symbol}: adjudication degraded (${adjudication.degraded.reason}); kept stage-1 score ${lexical.score}`,
      );
    }

    const now = clock.now();
    const candidate: CandidateEntry = {
      ticker: symbol,
      companyName: evidence.value.companyName ?? existing?.companyName ?? null,
      sector: evidence.value.sector ?? existing?.sector ?? null,
      category: adjudication.finalCategory,
      score: adjudication.finalScore,
      isActive: promotion.isActiveFor(adjudication.finalScore),
      lastScanned: now,
      lastMention: lexical.rawScore > 0 ? now : (existing?.lastMention ?? null),
      notes: this.buildNotes(lexical.score, lexical.matches, adjudication),
      createdAt: existing?.createdAt ?? now,
      deactivatedAt: existing?.deactivatedAt ?? null,
    };

    const saved = await store.upsert(candidate);
    if (saved.isErr()) {
      return this.fail(symbol, saved.error);
    }

    const synced = await promotion.sync(saved.value);
    if (synced.isErr()) {
      return this.fail(symbol, synced.error);
    }

    const deactivated =
      synced.value.deactivated ||
      (existing?.isActive === true && !saved.value.isActive);
    const score = saved.value.score;

    if (synced.value.action === "promoted") {
      await journal.record(
        "Promotion",
        `${symbol} promoted to watchlist at score ${score} (${saved.value.category})`,
      );
    } else if (synced.value.action === "demoted") {
      await journal.record(
        "Demotion",
        `${symbol} removed from watchlist at score ${score}`,
      );
    }

    if (deactivated) {
      await journal.record(
        "Deactivation",
        `${symbol} deactivated at score ${score}`,
      );
    }

    return {
      status: "scored",
      ticker: symbol,
      stage1Score: lexical.score,
      score,
      category: saved.value.category,
      isActive: saved.value.isActive && !synced.value.deactivated,
      deactivated,
      watchlistAction: synced.value.action,
      adjudication: adjudication.adjudication,
    };
  }

  private buildNotes(
    stage1Score: number,
    matches: KeywordMatch[],
    adjudication: AdjudicationResult,
  ): string {
    const parts = [`stage1=${stage1Score}`];

    if (adjudication.adjudication === "applied" && adjudication.verdict) {
      const { adjustment, confidence, isGenuine, reasoning } =
        adjudication.verdict;
      parts.push(
        `adjudicated ${adjustment >= 0 ? "+" : ""}${adjustment} (confidence ${confidence}, genuine=${isGenuine})`,
      );
      if (reasoning) {
        parts.push(reasoning);
      }
    } else if (adjudication.adjudication === "degraded") {
      parts.push("adjudication degraded");
    }

    const keywords = describeMatches(matches);
    parts.push(keywords ? `keywords: ${keywords}` : "no AI keywords");

    return parts.join("; ");
  }

  private async fail(
    ticker: string,
    failure: StoreWriteFailure,
  ): Promise<TickerOutcome> {
    logger.error({ ticker, failure }, "Curation write failed");
    await this.deps.journal.record(
      "Error",
      `${ticker}: store write failed (${failure.reason})`,
    );
    return { status: "failed", ticker, failure };
  }
}
