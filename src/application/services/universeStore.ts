import { err, ok, type Result } from "neverthrow";
import type { StoreWriteFailure } from "../../core/entities/appError";
import type {
  CandidateEntry,
  CandidateSeed,
  UniverseQuery,
} from "../../core/entities/candidate";
import type {
  ClockPort,
  UniverseRepositoryPort,
} from "../../core/ports/outboundPorts";

export const BULK_INSERT_CHUNK_SIZE = 1000;

export type BulkInsertSummary = {
  inserted: number;
  updated: number;
};

const toFailure = (ticker: string, error: unknown): StoreWriteFailure => ({
  kind: "store_write_failure",
  ticker,
  reason: error instanceof Error ? error.message : String(error),
  cause: error,
});

/**
 * Authoritative candidate table with soft-delete semantics. Rows are never physically removed.
 */
export class UniverseStore {
  constructor(
    private readonly repository: UniverseRepositoryPort,
    private readonly clock: ClockPort,
  ) {}

  /**
   * Insert-or-replace by ticker. An existing `createdAt` wins, and `deactivatedAt`
   * follows the active flag transition rather than the caller's value.
   */
  async upsert(
    entry: CandidateEntry,
  ): Promise<Result<CandidateEntry, StoreWriteFailure>> {
    const ticker = entry.ticker.trim().toUpperCase();

    try {
      const existing = await this.repository.findByTicker(ticker);
      const next: CandidateEntry = {
        ...entry,
        ticker,
        createdAt: existing?.createdAt ?? entry.createdAt,
        deactivatedAt: this.resolveDeactivatedAt(existing, entry),
      };

      await this.repository.save(next);
      return ok(next);
    } catch (error) {
      return err(toFailure(ticker, error));
    }
  }

  /**
   * Soft-deletes an active entry; inactive and unknown tickers are left untouched.
   */
  async deactivate(
    ticker: string,
  ): Promise<Result<CandidateEntry | null, StoreWriteFailure>> {
    const symbol = ticker.trim().toUpperCase();

    try {
      const existing = await this.repository.findByTicker(symbol);
      if (!existing || !existing.isActive) {
        return ok(existing);
      }

      const next: CandidateEntry = {
        ...existing,
        isActive: false,
        deactivatedAt: this.clock.now(),
      };
      await this.repository.save(next);
      return ok(next);
    } catch (error) {
      return err(toFailure(symbol, error));
    }
  }

  /**
   * Ordered by score descending, then ticker. An empty filter returns inactive rows too.
   */
  query(filters: UniverseQuery = {}): Promise<CandidateEntry[]> {
    if (filters.limit !== undefined && filters.limit <= 0) {
      return Promise.resolve([]);
    }

    return this.repository.query(filters);
  }

  get(ticker: string): Promise<CandidateEntry | null> {
    return this.repository.findByTicker(ticker.trim().toUpperCase());
  }

  page(offset: number, limit: number): Promise<CandidateEntry[]> {
    return this.repository.pageByTicker(offset, limit);
  }

  count(): Promise<number> {
    return this.repository.count();
  }

  /**
   * Idempotent seed load. New tickers start at score 0, category none, active;
   * existing tickers only have their descriptive fields refreshed.
   */
  async bulkInsert(seeds: CandidateSeed[]): Promise<BulkInsertSummary> {
    const unique = new Map<string, CandidateSeed>();
    for (const seed of seeds) {
      const ticker = seed.ticker.trim().toUpperCase();
      unique.set(ticker, { ...seed, ticker });
    }

    const all = [...unique.values()];
    const summary: BulkInsertSummary = { inserted: 0, updated: 0 };
    const now = this.clock.now();

    for (let start = 0; start < all.length; start += BULK_INSERT_CHUNK_SIZE) {
      const chunk = all.slice(start, start + BULK_INSERT_CHUNK_SIZE);
      const existing = new Map(
        (
          await this.repository.findManyByTicker(
            chunk.map((seed) => seed.ticker),
          )
        ).map((entry) => [entry.ticker, entry]),
      );

      const rows = chunk.map((seed): CandidateEntry => {
        const current = existing.get(seed.ticker);
        if (current) {
          summary.updated += 1;
          return {
            ...current,
            companyName: seed.companyName ?? current.companyName,
            sector: seed.sector ?? current.sector,
          };
        }

        summary.inserted += 1;
        return {
          ticker: seed.ticker,
          companyName: seed.companyName,
          sector: seed.sector,
          category: "none",
          score: 0,
          isActive: true,
          lastScanned: null,
          lastMention: null,
          notes: null,
          createdAt: now,
          deactivatedAt: null,
        };
      });

      await this.repository.saveMany(rows);
    }

    return summary;
  }

  private resolveDeactivatedAt(
    existing: CandidateEntry | null,
    entry: CandidateEntry,
  ): Date | null {
    if (!entry.isActive) {
      if (existing && !existing.isActive) {
        return existing.deactivatedAt ?? entry.deactivatedAt ?? this.clock.now();
      }
      return this.clock.now();
    }

    return null;
  }
}
