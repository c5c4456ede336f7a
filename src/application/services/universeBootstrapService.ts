import type {
  CandidateSeed,
  UniverseSourceRow,
  UniverseSourceTable,
} from "../../core/entities/candidate";
import type { DecisionJournal } from "./decisionJournal";
import type { UniverseStore } from "./universeStore";

export const TICKER_PATTERN = /^[A-Z0-9][A-Z0-9.-]{0,9}$/;

const TICKER_COLUMNS = ["ticker", "symbol"];
const NAME_COLUMNS = ["name", "company name"];
const SECTOR_COLUMNS = ["sector", "gics sector"];

export type BootstrapRejection = {
  /** 1-based line in the source table, counting the header as line 1. */
  line: number;
  ticker: string | null;
  reason: string;
};

export type BootstrapReport = {
  accepted: number;
  inserted: number;
  updated: number;
  rejected: BootstrapRejection[];
};

const pick = (
  row: Record<string, string>,
  aliases: string[],
): string | null => {
  for (const [key, value] of Object.entries(row)) {
    if (aliases.includes(key.trim().toLowerCase()) && value.trim()) {
      return value.trim();
    }
  }
  return null;
};

/**
 * Feeds a constituents table into the universe. Bad rows are rejected one by one and
 * the rest commit; re-running with a refreshed table never duplicates tickers, and
 * tickers missing from the new table are left for the monthly cleanup.
 */
export class UniverseBootstrapService {
  constructor(
    private readonly store: UniverseStore,
    private readonly journal: DecisionJournal,
  ) {}

  toSeeds(rows: UniverseSourceRow[]): {
    seeds: CandidateSeed[];
    rejected: BootstrapRejection[];
  } {
    const seeds: CandidateSeed[] = [];
    const rejected: BootstrapRejection[] = [];
    const firstSeen = new Map<string, number>();

    rows.forEach(({ line, cells }) => {
      const rawTicker = pick(cells, TICKER_COLUMNS);

      if (!rawTicker) {
        rejected.push({ line, ticker: null, reason: "missing ticker" });
        return;
      }

      const ticker = rawTicker.toUpperCase();
      if (!TICKER_PATTERN.test(ticker)) {
        rejected.push({ line, ticker, reason: `invalid ticker '${ticker}'` });
        return;
      }

      const seenOn = firstSeen.get(ticker);
      if (seenOn !== undefined) {
        rejected.push({
          line,
          ticker,
          reason: `duplicate ticker (first seen on line ${seenOn})`,
        });
        return;
      }

      firstSeen.set(ticker, line);
      seeds.push({
        ticker,
        companyName: pick(cells, NAME_COLUMNS),
        sector: pick(cells, SECTOR_COLUMNS),
      });
    });

    return { seeds, rejected };
  }

  async ingest(table: UniverseSourceTable): Promise<BootstrapReport> {
    const { seeds, rejected: invalid } = this.toSeeds(table.rows);
    const rejected = [
      ...table.malformed.map(({ line, reason }) => ({ line, ticker: null, reason })),
      ...invalid,
    ].sort((left, right) => left.line - right.line);
    const { inserted, updated } = await this.store.bulkInsert(seeds);

    await this.journal.record(
      "Bootstrap",
      `Universe bootstrap: ${seeds.length} accepted (${inserted} new, ${updated} refreshed), ${rejected.length} rejected`,
    );

    return { accepted: seeds.length, inserted, updated, rejected };
  }
}
