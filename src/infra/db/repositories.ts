import { and, asc, count, desc, eq, gte, inArray, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import {
  isUniverseCategory,
  type CandidateEntry,
  type UniverseQuery,
} from "../../core/entities/candidate";
import {
  isDecisionCategory,
  type DecisionLogRecord,
} from "../../core/entities/decisionLog";
import type { WatchlistEntry } from "../../core/entities/watchlist";
import type {
  DecisionLogRepositoryPort,
  SchedulerStateRepositoryPort,
  UniverseRepositoryPort,
  WatchlistRepositoryPort,
} from "../../core/ports/outboundPorts";
import {
  journalTable,
  schedulerStateTable,
  tradingUniverseTable,
  watchlistTable,
} from "./schema";

type Db = PostgresJsDatabase<Record<string, never>>;
type UniverseRow = typeof tradingUniverseTable.$inferSelect;

const toCandidate = (row: UniverseRow): CandidateEntry => ({
  ...row,
  category: isUniverseCategory(row.category) ? row.category : "none",
});

/**
 * Upserts rewrite every mutable column; `created_at` keeps the first insert's value.
 */
export class PostgresUniverseRepository implements UniverseRepositoryPort {
  constructor(private readonly db: Db) {}

  async findByTicker(ticker: string): Promise<CandidateEntry | null> {
    const rows = await this.db
      .select()
      .from(tradingUniverseTable)
      .where(eq(tradingUniverseTable.ticker, ticker))
      .limit(1);

    const row = rows[0];
    return row ? toCandidate(row) : null;
  }

  async findManyByTicker(tickers: string[]): Promise<CandidateEntry[]> {
    if (tickers.length === 0) return [];
    const rows = await this.db
      .select()
      .from(tradingUniverseTable)
      .where(inArray(tradingUniverseTable.ticker, tickers));

    return rows.map(toCandidate);
  }

  async save(entry: CandidateEntry): Promise<void> {
    await this.saveMany([entry]);
  }

  async saveMany(entries: CandidateEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.db
      .insert(tradingUniverseTable)
      .values(entries)
      .onConflictDoUpdate({
        target: tradingUniverseTable.ticker,
        set: {
          companyName: sql`excluded.company_name`,
          sector: sql`excluded.sector`,
          category: sql`excluded.category`,
          score: sql`excluded.score`,
          isActive: sql`excluded.is_active`,
          lastScanned: sql`excluded.last_scanned`,
          lastMention: sql`excluded.last_mention`,
          notes: sql`excluded.notes`,
          deactivatedAt: sql`excluded.deactivated_at`,
        },
      });
  }

  async query(filters: UniverseQuery): Promise<CandidateEntry[]> {
    const conditions = [
      filters.isActive === undefined
        ? undefined
        : eq(tradingUniverseTable.isActive, filters.isActive),
      filters.minScore === undefined
        ? undefined
        : gte(tradingUniverseTable.score, filters.minScore),
      filters.category === undefined
        ? undefined
        : eq(tradingUniverseTable.category, filters.category),
    ];

    const ordered = this.db
      .select()
      .from(tradingUniverseTable)
      .where(and(...conditions))
      .orderBy(desc(tradingUniverseTable.score), asc(tradingUniverseTable.ticker));

    const rows =
      filters.limit === undefined ? await ordered : await ordered.limit(filters.limit);
    return rows.map(toCandidate);
  }

  async pageByTicker(offset: number, limit: number): Promise<CandidateEntry[]> {
    const rows = await this.db
      .select()
      .from(tradingUniverseTable)
      .orderBy(asc(tradingUniverseTable.ticker))
      .limit(limit)
      .offset(offset);

    return rows.map(toCandidate);
  }

  async count(): Promise<number> {
    const rows = await this.db
      .select({ value: count() })
      .from(tradingUniverseTable);
    return rows[0]?.value ?? 0;
  }
}

export class PostgresWatchlistRepository implements WatchlistRepositoryPort {
  constructor(private readonly db: Db) {}

  async findByTicker(ticker: string): Promise<WatchlistEntry | null> {
    const rows = await this.db
      .select()
      .from(watchlistTable)
      .where(eq(watchlistTable.ticker, ticker))
      .limit(1);
    return rows[0] ?? null;
  }

  async list(): Promise<WatchlistEntry[]> {
    return await this.db
      .select()
      .from(watchlistTable)
      .orderBy(asc(watchlistTable.ticker));
  }

  /**
   * Status is owned by the trading agent after the first insert, so conflicts only refresh score.
   */
  async save(entry: WatchlistEntry): Promise<void> {
    await this.db
      .insert(watchlistTable)
      .values(entry)
      .onConflictDoUpdate({
        target: watchlistTable.ticker,
        set: {
          score: sql`excluded.score`,
          updatedAt: sql`excluded.updated_at`,
        },
      });
  }

  async remove(ticker: string): Promise<void> {
    await this.db
      .delete(watchlistTable)
      .where(and(eq(watchlistTable.ticker, ticker), eq(watchlistTable.pinned, false)));
  }

  async setPinned(ticker: string, pinned: boolean): Promise<boolean> {
    const rows = await this.db
      .update(watchlistTable)
      .set({ pinned })
      .where(eq(watchlistTable.ticker, ticker))
      .returning({ ticker: watchlistTable.ticker });
    return rows.length > 0;
  }
}

export class PostgresDecisionLogRepository implements DecisionLogRepositoryPort {
  constructor(private readonly db: Db) {}

  async append(record: DecisionLogRecord): Promise<void> {
    await this.db.insert(journalTable).values(record);
  }

  async listRecent(limit: number): Promise<DecisionLogRecord[]> {
    const rows = await this.db
      .select()
      .from(journalTable)
      .orderBy(desc(journalTable.createdAt))
      .limit(limit);

    return rows.flatMap((row) =>
      isDecisionCategory(row.category) ? [{ ...row, category: row.category }] : [],
    );
  }
}

export class PostgresSchedulerStateRepository
  implements SchedulerStateRepositoryPort
{
  constructor(private readonly db: Db) {}

  async read(key: string): Promise<unknown | null> {
    const rows = await this.db
      .select({ value: schedulerStateTable.value })
      .from(schedulerStateTable)
      .where(eq(schedulerStateTable.key, key))
      .limit(1);
    return rows[0]?.value ?? null;
  }

  async write(key: string, value: unknown): Promise<void> {
    const updatedAt = new Date();
    await this.db
      .insert(schedulerStateTable)
      .values({ key, value, updatedAt })
      .onConflictDoUpdate({
        target: schedulerStateTable.key,
        set: { value, updatedAt },
      });
  }
}
