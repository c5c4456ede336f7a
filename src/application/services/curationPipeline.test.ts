import { describe, expect, it } from "vitest";
import { err, ok } from "neverthrow";
import type { CandidateEntry } from "../../core/entities/candidate";
import type {
  ClassifierPort,
  MarketDataProviderPort,
} from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import {
  InMemoryDecisionLogRepository,
  InMemoryUniverseRepository,
  InMemoryWatchlistRepository,
} from "../../infra/db/inMemoryRepositories";
import { Adjudicator } from "./adjudicator";
import { CallBudget } from "./callBudget";
import { CurationPipeline } from "./curationPipeline";
import { DecisionJournal } from "./decisionJournal";
import { EvidenceGatherer } from "./evidenceGatherer";
import { LexicalScorer } from "./lexicalScorer";
import { PromotionEngine } from "./promotionEngine";
import { UniverseStore } from "./universeStore";

const now = new Date("2026-10-19T12:00:00.000Z");
const created = new Date("2026-02-01T00:00:00.000Z");
const clock: ClockPort = { now: () => now };
const noSleep = { sleep: async () => undefined };

// Five tier-1 hits: exactly 50, tagged ai_software through "llm".
const BORDERLINE_TEXT =
  "Artificial intelligence, machine learning, deep learning, neural network and LLM research";

const marketDataFor = (
  descriptions: Record<string, string>,
): MarketDataProviderPort => ({
  getProfile: async (ticker) => {
    const description = descriptions[ticker];
    if (description === undefined) {
      return err({
        source: "market-data",
        code: "not_found",
        provider: "fake",
        message: `No profile for ${ticker}.`,
        retryable: false,
      });
    }
    return ok({ ticker, name: `${ticker} Corp`, sector: "Technology", description });
  },
  getRecentNews: async () => ok([]),
});

const classifierAdjusting = (adjustment: number): ClassifierPort => ({
  classify: async (request) =>
    ok({
      isGenuine: true,
      category: request.stage1Category,
      confidence: 75,
      adjustment,
      reasoning: "Core AI product line",
    }),
});

const seeded = (
  ticker: string,
  overrides: Partial<CandidateEntry> = {},
): CandidateEntry => ({
  ticker,
  companyName: null,
  sector: null,
  category: "none",
  score: 0,
  isActive: true,
  lastScanned: null,
  lastMention: null,
  notes: null,
  createdAt: created,
  deactivatedAt: null,
  ...overrides,
});

const setup = (options: {
  descriptions: Record<string, string>;
  classifier?: ClassifierPort;
  universe?: InMemoryUniverseRepository;
}) => {
  const universe = options.universe ?? new InMemoryUniverseRepository();
  const watchlist = new InMemoryWatchlistRepository();
  const log = new InMemoryDecisionLogRepository();
  let sequence = 0;
  const journal = new DecisionJournal(
    log,
    { next: () => `log-${++sequence}` },
    clock,
  );
  const store = new UniverseStore(universe, clock);
  const promotion = new PromotionEngine(watchlist, store, clock, {
    promote: 70,
    demote: 50,
    deactivate: 30,
  });
  const pipeline = new CurationPipeline({
    gatherer: new EvidenceGatherer(marketDataFor(options.descriptions), clock),
    scorer: new LexicalScorer(),
    adjudicator: new Adjudicator(options.classifier ?? classifierAdjusting(0), {
      bandLow: 30,
      bandHigh: 70,
      maxAdjustment: 20,
    }),
    store,
    promotion,
    journal,
    clock,
  });
  const budget = (ceiling: number) => new CallBudget(ceiling, 0, clock, noSleep);

  return { universe, watchlist, log, store, pipeline, budget };
};

describe("CurationPipeline", () => {
  it("promotes a borderline 50 lifted to 70 by adjudication in the same pass", async () => {
    const { pipeline, watchlist, store, log, budget } = setup({
      descriptions: { PATH: BORDERLINE_TEXT },
      classifier: classifierAdjusting(20),
    });
    const run = { lookbackDays: 7, includeFilings: false, budget: budget(5) };

    const outcome = await pipeline.process("path", run);

    expect(outcome).toEqual({
      status: "scored",
      ticker: "PATH",
      stage1Score: 50,
      score: 70,
      category: "ai_software",
      isActive: true,
      deactivated: false,
      watchlistAction: "promoted",
      adjudication: "applied",
    });
    expect(run.budget.callsUsed).toBe(2);
    expect(await watchlist.findByTicker("PATH")).toMatchObject({
      score: 70,
      status: "Watching",
    });
    expect(await store.get("PATH")).toMatchObject({
      score: 70,
      category: "ai_software",
      lastScanned: now,
      lastMention: now,
      companyName: "PATH Corp",
      notes:
        "stage1=50; adjudicated +20 (confidence 75, genuine=true); Core AI product line; keywords: 'artificial intelligence', 'deep learning', 'llm', 'machine learning', 'neural network'",
    });
    expect(log.records.map((record) => record.category)).toEqual(["Promotion"]);
  });

  it("scores unrelated businesses to zero and deactivates them", async () => {
    const { pipeline, store, log, budget } = setup({
      descriptions: { MCD: "We sell hamburgers and fries" },
      universe: new InMemoryUniverseRepository([seeded("MCD", { score: 40 })]),
    });

    const outcome = await pipeline.process("MCD", {
      lookbackDays: 7,
      includeFilings: false,
      budget: budget(5),
    });

    expect(outcome).toMatchObject({
      status: "scored",
      score: 0,
      category: "none",
      isActive: false,
      deactivated: true,
      adjudication: "skipped",
    });
    expect(await store.get("MCD")).toMatchObject({
      isActive: false,
      deactivatedAt: now,
      lastMention: null,
      createdAt: created,
      notes: "stage1=0; no AI keywords",
    });
    expect(log.records.map((record) => record.content)).toEqual([
      "MCD deactivated at score 0",
    ]);
  });

  it("reactivates an inactive entry whose score recovers", async () => {
    const { pipeline, store, budget } = setup({
      descriptions: {
        NVDA: "AI chip and GPU inference leader, AI accelerator, TPU rival, neural processor maker, nvidia gpu",
      },
      universe: new InMemoryUniverseRepository([
        seeded("NVDA", { isActive: false, deactivatedAt: created }),
      ]),
    });

    const outcome = await pipeline.process("NVDA", {
      lookbackDays: 7,
      includeFilings: false,
      budget: budget(5),
    });

    expect(outcome).toMatchObject({ status: "scored", isActive: true });
    expect(await store.get("NVDA")).toMatchObject({
      isActive: true,
      deactivatedAt: null,
      category: "ai_chip",
    });
  });

  it("skips a ticker whose evidence is unavailable without writing", async () => {
    const { pipeline, universe, budget } = setup({ descriptions: {} });

    const outcome = await pipeline.process("ZZZZ", {
      lookbackDays: 7,
      includeFilings: false,
      budget: budget(5),
    });

    expect(outcome.status).toBe("skipped");
    if (outcome.status === "skipped") {
      expect(outcome.failure.kind).toBe("evidence_unavailable");
    }
    expect(await universe.count()).toBe(0);
  });

  it("defers without writing when the adjudication unit is refused", async () => {
    const { pipeline, store, budget } = setup({
      descriptions: { PATH: BORDERLINE_TEXT },
      universe: new InMemoryUniverseRepository([seeded("PATH", { score: 12 })]),
    });
    const run = { lookbackDays: 7, includeFilings: false, budget: budget(1) };

    const outcome = await pipeline.process("PATH", run);

    expect(outcome).toEqual({
      status: "deferred",
      ticker: "PATH",
      failure: { kind: "budget_exceeded", ticker: "PATH", ceiling: 1, used: 1 },
    });
    expect(run.budget.exhausted).toBe(true);
    expect(await store.get("PATH")).toMatchObject({
      score: 12,
      lastScanned: null,
    });
  });

  it("keeps stage-1 values and journals a degraded adjudication", async () => {
    const { pipeline, log, budget } = setup({
      descriptions: { PATH: BORDERLINE_TEXT },
      classifier: {
        classify: async () => ok({ verdict: "yes" }),
      },
    });

    const outcome = await pipeline.process("PATH", {
      lookbackDays: 7,
      includeFilings: false,
      budget: budget(5),
    });

    expect(outcome).toMatchObject({
      status: "scored",
      score: 50,
      category: "ai_software",
      adjudication: "degraded",
      watchlistAction: "none",
    });
    expect(log.records[0]?.category).toBe("Degraded");
  });

  it("reports store write failures to the journal", async () => {
    class FailingRepository extends InMemoryUniverseRepository {
      override async save(): Promise<void> {
        throw new Error("disk full");
      }
    }
    const { pipeline, log, budget } = setup({
      descriptions: { MCD: "We sell hamburgers" },
      universe: new FailingRepository(),
    });

    const outcome = await pipeline.process("MCD", {
      lookbackDays: 7,
      includeFilings: false,
      budget: budget(5),
    });

    expect(outcome).toMatchObject({
      status: "failed",
      failure: { kind: "store_write_failure", reason: "disk full" },
    });
    expect(log.records.map((record) => record.content)).toEqual([
      "MCD: store write failed (disk full)",
    ]);
  });
});
