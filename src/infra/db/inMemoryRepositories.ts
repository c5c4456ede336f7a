import type {
  CandidateEntry,
  UniverseQuery,
} from "../../core/entities/candidate";
import type { DecisionLogRecord } from "../../core/entities/decisionLog";
import type { WatchlistEntry } from "../../core/entities/watchlist";
import type {
  DecisionLogRepositoryPort,
  SchedulerStateRepositoryPort,
  UniverseRepositoryPort,
  WatchlistRepositoryPort,
} from "../../core/ports/outboundPorts";

const byScoreThenTicker = (left: CandidateEntry, right: CandidateEntry) =>
  right.score - left.score || left.ticker.localeCompare(right.ticker);

const byTicker = (left: CandidateEntry, right: CandidateEntry) =>
  left.ticker.localeCompare(right.ticker);

/**
 * Process-local universe table for `STORE_DRIVER=memory` and tests. Rows are copied on
 * the way in and out so callers never share references with the store.
 */
export class InMemoryUniverseRepository implements UniverseRepositoryPort {
  private readonly rows = new Map<string, CandidateEntry>();

  constructor(seed: CandidateEntry[] = []) {
    seed.forEach((entry) => this.rows.set(entry.ticker, { ...entry }));
  }

  async findByTicker(ticker: string): Promise<CandidateEntry | null> {
    const row = this.rows.get(ticker);
    return row ? { ...row } : null;
  }

  async findManyByTicker(tickers: string[]): Promise<CandidateEntry[]> {
    return tickers
      .map((ticker) => this.rows.get(ticker))
      .filter((row): row is CandidateEntry => row !== undefined)
      .map((row) => ({ ...row }));
  }

  async save(entry: CandidateEntry): Promise<void> {
    this.rows.set(entry.ticker, { ...entry });
  }

  async saveMany(entries: CandidateEntry[]): Promise<void> {
    entries.forEach((entry) => this.rows.set(entry.ticker, { ...entry }));
  }

  async query(filters: UniverseQuery): Promise<CandidateEntry[]> {
    const matches = [...this.rows.values()]
      .filter(
        (row) =>
          (filters.isActive === undefined || row.isActive === filters.isActive) &&
          (filters.minScore === undefined || row.score >= filters.minScore) &&
          (filters.category === undefined || row.category === filters.category),
      )
      .sort(byScoreThenTicker)
      .map((row) => ({ ...row }));

    return filters.limit === undefined
      ? matches
      : matches.slice(0, filters.limit);
  }

  async pageByTicker(offset: number, limit: number): Promise<CandidateEntry[]> {
    return [...this.rows.values()]
      .sort(byTicker)
      .slice(offset, offset + limit)
      .map((row) => ({ ...row }));
  }

  async count(): Promise<number> {
    return this.rows.size;
  }
}

export class InMemoryWatchlistRepository implements WatchlistRepositoryPort {
  private readonly rows = new Map<string, WatchlistEntry>();

  constructor(seed: WatchlistEntry[] = []) {
    seed.forEach((entry) => this.rows.set(entry.ticker, { ...entry }));
  }

  async findByTicker(ticker: string): Promise<WatchlistEntry | null> {
    const row = this.rows.get(ticker);
    return row ? { ...row } : null;
  }

  async list(): Promise<WatchlistEntry[]> {
    return [...this.rows.values()]
      .sort((left, right) => left.ticker.localeCompare(right.ticker))
      .map((row) => ({ ...row }));
  }

  async save(entry: WatchlistEntry): Promise<void> {
    this.rows.set(entry.ticker, { ...entry });
  }

  async remove(ticker: string): Promise<void> {
    if (this.rows.get(ticker)?.pinned === false) {
      this.rows.delete(ticker);
    }
  }

  async setPinned(ticker: string, pinned: boolean): Promise<boolean> {
    const row = this.rows.get(ticker);
    if (!row) {
      return false;
    }
    this.rows.set(ticker, { ...row, pinned });
    return true;
  }
}

export class InMemoryDecisionLogRepository implements DecisionLogRepositoryPort {
  readonly records: DecisionLogRecord[] = [];

  async append(record: DecisionLogRecord): Promise<void> {
    this.records.push({ ...record });
  }

  async listRecent(limit: number): Promise<DecisionLogRecord[]> {
    return [...this.records]
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime())
      .slice(0, limit);
  }
}

/**
 * Values round-trip through JSON so reads see the same shapes a database column returns.
 */
export class InMemorySchedulerStateRepository
  implements SchedulerStateRepositoryPort
{
  private readonly values = new Map<string, string>();

  async read(key: string): Promise<unknown | null> {
    const raw = this.values.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async write(key: string, value: unknown): Promise<void> {
    this.values.set(key, JSON.stringify(value));
  }
}
