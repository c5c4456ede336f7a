import { z } from "zod";
import {
  aiCategories,
  type AiCategory,
  type CandidateEntry,
} from "../../core/entities/candidate";
import {
  scanCadences,
  type ScanCadence,
  type ScanConfig,
  type ScanReport,
  type TickerOutcome,
  type UniverseSummary,
  type UniverseSummaryDelta,
} from "../../core/entities/scan";
import type {
  ClockPort,
  SchedulerStateRepositoryPort,
  SleepPort,
  WatchlistRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { daysBefore, isoWeekNumber } from "../../shared/time/dateUtils";
import { CallBudget } from "./callBudget";
import type { CurationPipeline, PipelineRun } from "./curationPipeline";
import type { DecisionJournal } from "./decisionJournal";
import {
  diffSummaries,
  formatSummary,
  summarizeUniverse,
  universeSummarySchema,
} from "./universeReport";
import type { UniverseStore } from "./universeStore";

export const PROGRESSIVE_CURSOR_KEY = "weekly-progressive-cursor";
export const MONTHLY_SUMMARY_KEY = "monthly-summary";

const RECENT_NEWS_DAYS = 7;
const CLEANUP_NEWS_DAYS = 30;

export const scanConfigSchema = z
  .object({
    cadence: z.enum(scanCadences),
    batchSize: z.number().int().positive(),
    scoreFloorForInclusion: z.number().int().min(0).max(100),
    callBudget: z.number().int().positive().optional(),
  })
  .strict();

const cursorSchema = z.object({ offset: z.number().int().min(0) });

export type ScanSchedulerSettings = {
  minCallIntervalMs: number;
  staleAfterDays: number;
  defaultCallBudget: (cadence: ScanCadence) => number;
};

export type ScanSchedulerDeps = {
  store: UniverseStore;
  watchlist: WatchlistRepositoryPort;
  state: SchedulerStateRepositoryPort;
  pipeline: CurationPipeline;
  journal: DecisionJournal;
  clock: ClockPort;
  sleeper: SleepPort;
  settings: ScanSchedulerSettings;
};

type ScanPlan = {
  tickers: string[];
  lookbackDays: number;
  includeFilings: boolean;
  filingsLookbackDays?: number;
  focusCategory?: AiCategory;
  slice?: { from: number; total: number; tickers: string[] };
};

/**
 * Weekly focus category for a date: the five AI categories rotate by ISO week number.
 */
export const focusCategoryFor = (date: Date): AiCategory =>
  aiCategories[isoWeekNumber(date) % aiCategories.length];

const uniqueInOrder = (tickers: string[]): string[] => [...new Set(tickers)];

/**
 * Selects a bounded batch per cadence and drives it through the curation pipeline
 * sequentially under one call budget. Progressive-scan position and the previous
 * monthly summary live in scheduler state so restarts resume where they left off.
 */
export class ScanScheduler {
  constructor(private readonly deps: ScanSchedulerDeps) {}

  parseConfig(raw: unknown): ScanConfig {
    return scanConfigSchema.parse(raw);
  }

  async run(rawConfig: unknown): Promise<ScanReport> {
    const config = this.parseConfig(rawConfig);
    const { clock, sleeper, settings, journal } = this.deps;
    const startedAt = clock.now();
    const budget = new CallBudget(
      config.callBudget ?? settings.defaultCallBudget(config.cadence),
      settings.minCallIntervalMs,
      clock,
      sleeper,
    );

    const plan = await this.plan(config, startedAt);
    logger.info(
      {
        cadence: config.cadence,
        selected: plan.tickers.length,
        callBudget: budget.ceiling,
        focusCategory: plan.focusCategory,
      },
      "Scan started",
    );

    const outcomes = await this.processAll(plan.tickers, {
      lookbackDays: plan.lookbackDays,
      includeFilings: plan.includeFilings,
      filingsLookbackDays: plan.filingsLookbackDays,
      budget,
    });

    const progressiveCursor = plan.slice
      ? await this.advanceCursor(plan.slice, outcomes)
      : undefined;

    const summary =
      config.cadence === "monthly" ? await this.writeSummary() : undefined;

    const report: ScanReport = {
      cadence: config.cadence,
      startedAt,
      finishedAt: clock.now(),
      selected: plan.tickers.length,
      processed: outcomes.filter((outcome) => outcome.status === "scored").length,
      skipped: outcomes.filter((outcome) => outcome.status === "skipped").length,
      failed: outcomes.filter((outcome) => outcome.status === "failed").length,
      deferred: outcomes.filter((outcome) => outcome.status === "deferred").length,
      callsUsed: budget.callsUsed,
      callBudget: budget.ceiling,
      budgetExhausted: outcomes.some((outcome) => outcome.status === "deferred"),
      promoted: this.tickersWhere(outcomes, (o) => o.watchlistAction === "promoted"),
      demoted: this.tickersWhere(outcomes, (o) => o.watchlistAction === "demoted"),
      deactivated: this.tickersWhere(outcomes, (o) => o.deactivated),
      focusCategory: plan.focusCategory,
      progressiveCursor,
      summary,
      outcomes,
    };

    await journal.record(
      "Scan",
      `${report.cadence} scan: selected=${report.selected} processed=${report.processed} skipped=${report.skipped} failed=${report.failed} deferred=${report.deferred} calls=${report.callsUsed}/${report.callBudget}`,
    );
    logger.info(
      {
        cadence: report.cadence,
        processed: report.processed,
        skipped: report.skipped,
        failed: report.failed,
        deferred: report.deferred,
        callsUsed: report.callsUsed,
      },
      "Scan finished",
    );

    return report;
  }

  private async plan(config: ScanConfig, now: Date): Promise<ScanPlan> {
    switch (config.cadence) {
      case "daily":
        return this.planDaily(config);
      case "weekly":
        return this.planWeekly(config, now);
      case "monthly":
        return this.planMonthly(config, now);
    }
  }

  /**
   * Top active scorers plus everything currently on the watchlist.
   */
  private async planDaily(config: ScanConfig): Promise<ScanPlan> {
    const [top, watched] = await Promise.all([
      this.deps.store.query({
        isActive: true,
        minScore: config.scoreFloorForInclusion,
        limit: config.batchSize,
      }),
      this.deps.watchlist.list(),
    ]);

    return {
      tickers: uniqueInOrder([
        ...top.map((entry) => entry.ticker),
        ...watched.map((entry) => entry.ticker),
      ]),
      lookbackDays: RECENT_NEWS_DAYS,
      includeFilings: false,
    };
  }

  /**
   * The next progressive slice of the whole universe, then the focus-category rescan.
   * The slice goes first so a large focus category cannot stall the cursor.
   */
  private async planWeekly(config: ScanConfig, now: Date): Promise<ScanPlan> {
    const { store } = this.deps;
    const focusCategory = focusCategoryFor(now);
    const focus = await store.query({
      isActive: true,
      minScore: config.scoreFloorForInclusion,
      category: focusCategory,
    });

    const total = await store.count();
    const from = total === 0 ? 0 : (await this.readCursor()) % total;
    const sliceSize = Math.min(config.batchSize, total);
    const head = sliceSize > 0 ? await store.page(from, sliceSize) : [];
    const wrapped =
      head.length < sliceSize ? await store.page(0, sliceSize - head.length) : [];
    const slice = [...head, ...wrapped].map((entry) => entry.ticker);

    return {
      tickers: uniqueInOrder([...slice, ...focus.map((entry) => entry.ticker)]),
      lookbackDays: RECENT_NEWS_DAYS,
      includeFilings: true,
      focusCategory,
      slice: { from, total, tickers: slice },
    };
  }

  /**
   * Active entries without a positive mention inside the stale window, oldest first.
   * Filing search shares the cleanup window so an old annual report cannot keep an entry alive.
   */
  private async planMonthly(config: ScanConfig, now: Date): Promise<ScanPlan> {
    const cutoff = daysBefore(now, this.deps.settings.staleAfterDays).getTime();
    const reference = (entry: CandidateEntry): number =>
      (entry.lastMention ?? entry.createdAt).getTime();

    const stale = (
      await this.deps.store.query({
        isActive: true,
        minScore: config.scoreFloorForInclusion,
      })
    )
      .filter((entry) => reference(entry) < cutoff)
      .sort(
        (left, right) =>
          reference(left) - reference(right) ||
          left.ticker.localeCompare(right.ticker),
      )
      .slice(0, config.batchSize);

    return {
      tickers: stale.map((entry) => entry.ticker),
      lookbackDays: CLEANUP_NEWS_DAYS,
      includeFilings: true,
      filingsLookbackDays: CLEANUP_NEWS_DAYS,
    };
  }

  /**
   * Strictly sequential. After the first refused budget unit every remaining ticker is deferred.
   */
  private async processAll(
    tickers: string[],
    run: PipelineRun,
  ): Promise<TickerOutcome[]> {
    const outcomes: TickerOutcome[] = [];
    let exhausted = false;

    for (const ticker of tickers) {
      if (exhausted) {
        outcomes.push({
          status: "deferred",
          ticker,
          failure: run.budget.exceededFor(ticker),
        });
        continue;
      }

      const outcome = await this.processOne(ticker, run);
      if (outcome.status === "deferred") {
        exhausted = true;
      }
      outcomes.push(outcome);
    }

    return outcomes;
  }

  private async processOne(
    ticker: string,
    run: PipelineRun,
  ): Promise<TickerOutcome> {
    try {
      return await this.deps.pipeline.process(ticker, run);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ ticker, reason }, "Ticker pass failed");
      await this.deps.journal.record("Error", `${ticker}: ${reason}`);
      return {
        status: "failed",
        ticker,
        failure: { kind: "store_write_failure", ticker, reason, cause: error },
      };
    }
  }

  private async readCursor(): Promise<number> {
    const raw = await this.deps.state.read(PROGRESSIVE_CURSOR_KEY);
    if (raw === null) {
      return 0;
    }

    const parsed = cursorSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(
        { key: PROGRESSIVE_CURSOR_KEY },
        "Ignoring malformed progressive cursor; restarting from the first ticker",
      );
      return 0;
    }

    return parsed.data.offset;
  }

  /**
   * Moves the cursor past the slice tickers actually attempted, wrapping at the universe size.
   */
  private async advanceCursor(
    slice: NonNullable<ScanPlan["slice"]>,
    outcomes: TickerOutcome[],
  ): Promise<{ from: number; to: number; total: number }> {
    const byTicker = new Map(outcomes.map((outcome) => [outcome.ticker, outcome]));
    let attempted = 0;
    for (const ticker of slice.tickers) {
      const outcome = byTicker.get(ticker);
      if (!outcome || outcome.status === "deferred") {
        break;
      }
      attempted += 1;
    }

    const to = slice.total === 0 ? 0 : (slice.from + attempted) % slice.total;
    await this.deps.state.write(PROGRESSIVE_CURSOR_KEY, { offset: to });
    return { from: slice.from, to, total: slice.total };
  }

  private async writeSummary(): Promise<{
    current: UniverseSummary;
    delta: UniverseSummaryDelta | null;
  }> {
    const { store, state, journal, clock } = this.deps;
    const current = summarizeUniverse(await store.query(), clock.now());

    const previousRaw = await state.read(MONTHLY_SUMMARY_KEY);
    const previous =
      previousRaw === null ? null : universeSummarySchema.safeParse(previousRaw);
    const delta =
      previous && previous.success ? diffSummaries(current, previous.data) : null;

    await journal.record("Summary", formatSummary(current, delta));
    await state.write(MONTHLY_SUMMARY_KEY, current);

    return { current, delta };
  }

  private tickersWhere(
    outcomes: TickerOutcome[],
    predicate: (outcome: Extract<TickerOutcome, { status: "scored" }>) => boolean,
  ): string[] {
    return outcomes
      .filter(
        (outcome): outcome is Extract<TickerOutcome, { status: "scored" }> =>
          outcome.status === "scored",
      )
      .filter(predicate)
      .map((outcome) => outcome.ticker);
  }
}
