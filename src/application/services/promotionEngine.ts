import { err, ok, type Result } from "neverthrow";
import type { StoreWriteFailure } from "../../core/entities/appError";
import type { CandidateEntry } from "../../core/entities/candidate";
import type { WatchlistAction } from "../../core/entities/scan";
import { WATCHING_STATUS } from "../../core/entities/watchlist";
import type {
  ClockPort,
  WatchlistRepositoryPort,
} from "../../core/ports/outboundPorts";
import type { UniverseStore } from "./universeStore";

export type PromotionThresholds = {
  promote: number;
  demote: number;
  deactivate: number;
};

export type SyncOutcome = {
  action: WatchlistAction;
  /** True when this sync soft-deleted the universe entry. */
  deactivated: boolean;
};

/**
 * Three-tier hysteresis between the universe and the watchlist. The gap between the
 * promote and demote thresholds keeps entries from flapping on small score moves.
 */
export class PromotionEngine {
  constructor(
    private readonly watchlist: WatchlistRepositoryPort,
    private readonly store: UniverseStore,
    private readonly clock: ClockPort,
    private readonly thresholds: PromotionThresholds,
  ) {
    const { promote, demote, deactivate } = thresholds;
    if (!(deactivate <= demote && demote <= promote)) {
      throw new Error(
        `Thresholds must satisfy deactivate <= demote <= promote, got ${deactivate}/${demote}/${promote}.`,
      );
    }
  }

  isActiveFor(score: number): boolean {
    return score >= this.thresholds.deactivate;
  }

  async sync(
    entry: CandidateEntry,
  ): Promise<Result<SyncOutcome, StoreWriteFailure>> {
    let action: WatchlistAction;
    try {
      action = await this.syncWatchlist(entry);
    } catch (error) {
      return err({
        kind: "store_write_failure",
        ticker: entry.ticker,
        reason: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }

    if (entry.score >= this.thresholds.deactivate || !entry.isActive) {
      return ok({ action, deactivated: false });
    }

    const deactivated = await this.store.deactivate(entry.ticker);
    if (deactivated.isErr()) {
      return err(deactivated.error);
    }

    return ok({ action, deactivated: true });
  }

  private async syncWatchlist(entry: CandidateEntry): Promise<WatchlistAction> {
    const existing = await this.watchlist.findByTicker(entry.ticker);
    const now = this.clock.now();

    if (entry.score >= this.thresholds.promote) {
      if (existing) {
        await this.watchlist.save({ ...existing, score: entry.score, updatedAt: now });
        return "refreshed";
      }

      await this.watchlist.save({
        ticker: entry.ticker,
        score: entry.score,
        status: WATCHING_STATUS,
        pinned: false,
        addedAt: now,
        updatedAt: now,
      });
      return "promoted";
    }

    if (!existing) {
      return "none";
    }

    if (entry.score < this.thresholds.demote) {
      if (existing.pinned) {
        await this.watchlist.save({ ...existing, score: entry.score, updatedAt: now });
        return "retained_pinned";
      }

      await this.watchlist.remove(entry.ticker);
      return "demoted";
    }

    await this.watchlist.save({ ...existing, score: entry.score, updatedAt: now });
    return "refreshed";
  }
}
