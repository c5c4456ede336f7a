import type {
  CandidateEntry,
  UniverseQuery,
} from "../entities/candidate";
import type { DecisionLogRecord } from "../entities/decisionLog";
import type { ScanConfig } from "../entities/scan";
import type { WatchlistEntry } from "../entities/watchlist";

export interface UniverseRepositoryPort {
  findByTicker(ticker: string): Promise<CandidateEntry | null>;
  findManyByTicker(tickers: string[]): Promise<CandidateEntry[]>;
  save(entry: CandidateEntry): Promise<void>;
  saveMany(entries: CandidateEntry[]): Promise<void>;
  query(filters: UniverseQuery): Promise<CandidateEntry[]>;
  pageByTicker(offset: number, limit: number): Promise<CandidateEntry[]>;
  count(): Promise<number>;
}

export interface WatchlistRepositoryPort {
  findByTicker(ticker: string): Promise<WatchlistEntry | null>;
  list(): Promise<WatchlistEntry[]>;
  save(entry: WatchlistEntry): Promise<void>;
  remove(ticker: string): Promise<void>;
  setPinned(ticker: string, pinned: boolean): Promise<boolean>;
}

export interface DecisionLogRepositoryPort {
  append(record: DecisionLogRecord): Promise<void>;
  listRecent(limit: number): Promise<DecisionLogRecord[]>;
}

export interface SchedulerStateRepositoryPort {
  read(key: string): Promise<unknown | null>;
  write(key: string, value: unknown): Promise<void>;
}

export interface ScanQueuePort {
  enqueueScan(config: ScanConfig): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}

export interface SleepPort {
  sleep(ms: number): Promise<void>;
}

export interface IdGeneratorPort {
  next(): string;
}
