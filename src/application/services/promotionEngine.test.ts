import { describe, expect, it } from "vitest";
import type { CandidateEntry } from "../../core/entities/candidate";
import type { ClockPort } from "../../core/ports/outboundPorts";
import {
  InMemoryUniverseRepository,
  InMemoryWatchlistRepository,
} from "../../infra/db/inMemoryRepositories";
import { PromotionEngine } from "./promotionEngine";
import { UniverseStore } from "./universeStore";

const now = new Date("2026-10-19T12:00:00.000Z");
const clock: ClockPort = { now: () => now };
const thresholds = { promote: 70, demote: 50, deactivate: 30 };

const entry = (score: number, isActive = true): CandidateEntry => ({
  ticker: "CRWV",
  companyName: "CoreWeave",
  sector: "Technology",
  category: "ai_cloud",
  score,
  isActive,
  lastScanned: now,
  lastMention: now,
  notes: null,
  createdAt: new Date("2026-03-01T00:00:00.000Z"),
  deactivatedAt: null,
});

const setup = (seed: CandidateEntry[] = [entry(0)]) => {
  const watchlist = new InMemoryWatchlistRepository();
  const universe = new InMemoryUniverseRepository(seed);
  const store = new UniverseStore(universe, clock);
  const engine = new PromotionEngine(watchlist, store, clock, thresholds);
  return { watchlist, store, engine };
};

describe("PromotionEngine", () => {
  it("promotes at the threshold with the Watching status", async () => {
    const { watchlist, engine } = setup();

    const outcome = await engine.sync(entry(70));

    expect(outcome.isOk() && outcome.value).toEqual({
      action: "promoted",
      deactivated: false,
    });
    expect(await watchlist.findByTicker("CRWV")).toEqual({
      ticker: "CRWV",
      score: 70,
      status: "Watching",
      pinned: false,
      addedAt: now,
      updatedAt: now,
    });
  });

  it("promotes once and holds through oscillations between 65 and 75", async () => {
    const { watchlist, engine } = setup();
    const actions: string[] = [];

    for (const score of [75, 65, 75, 65, 75]) {
      const outcome = await engine.sync(entry(score));
      if (outcome.isErr()) {
        throw new Error(outcome.error.reason);
      }
      actions.push(outcome.value.action);
    }

    expect(actions).toEqual([
      "promoted",
      "refreshed",
      "refreshed",
      "refreshed",
      "refreshed",
    ]);
    expect((await watchlist.list()).map((row) => row.ticker)).toEqual(["CRWV"]);
  });

  it("demotes only once the score drops below the demote threshold", async () => {
    const { watchlist, engine } = setup();
    await engine.sync(entry(80));

    const atThreshold = await engine.sync(entry(50));
    expect(atThreshold.isOk() && atThreshold.value.action).toBe("refreshed");

    const below = await engine.sync(entry(49));
    expect(below.isOk() && below.value.action).toBe("demoted");
    expect(await watchlist.findByTicker("CRWV")).toBeNull();
  });

  it("keeps an existing watchlist status when refreshing", async () => {
    const { watchlist, engine } = setup();
    await watchlist.save({
      ticker: "CRWV",
      score: 72,
      status: "Position Open",
      pinned: false,
      addedAt: new Date("2026-09-01T00:00:00.000Z"),
      updatedAt: new Date("2026-09-01T00:00:00.000Z"),
    });

    await engine.sync(entry(88));

    expect(await watchlist.findByTicker("CRWV")).toMatchObject({
      score: 88,
      status: "Position Open",
      updatedAt: now,
    });
  });

  it("never removes a pinned entry, even at score 0", async () => {
    const { watchlist, engine } = setup();
    await watchlist.save({
      ticker: "CRWV",
      score: 90,
      status: "Watching",
      pinned: true,
      addedAt: now,
      updatedAt: now,
    });

    const outcome = await engine.sync(entry(0));

    expect(outcome.isOk() && outcome.value.action).toBe("retained_pinned");
    expect(await watchlist.findByTicker("CRWV")).toMatchObject({
      score: 0,
      pinned: true,
    });
  });

  it("deactivates active entries below the floor through the store", async () => {
    const { store, engine } = setup([entry(45)]);

    const outcome = await engine.sync(entry(12));

    expect(outcome.isOk() && outcome.value).toEqual({
      action: "none",
      deactivated: true,
    });
    expect(await store.get("CRWV")).toMatchObject({
      isActive: false,
      deactivatedAt: now,
    });
  });

  it("does nothing between the floor and the demote threshold without a watchlist row", async () => {
    const { store, engine } = setup([entry(45)]);

    const outcome = await engine.sync(entry(35));

    expect(outcome.isOk() && outcome.value).toEqual({
      action: "none",
      deactivated: false,
    });
    expect((await store.get("CRWV"))?.isActive).toBe(true);
  });

  it("exposes the deactivation floor", () => {
    const { engine } = setup();

    expect(engine.isActiveFor(30)).toBe(true);
    expect(engine.isActiveFor(29)).toBe(false);
  });

  it("rejects thresholds that break hysteresis", () => {
    const { watchlist, store } = setup();

    expect(
      () =>
        new PromotionEngine(watchlist, store, clock, {
          promote: 50,
          demote: 70,
          deactivate: 30,
        }),
    ).toThrow("deactivate <= demote <= promote");
  });
});
