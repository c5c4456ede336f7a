import type { BudgetExceeded, CurationFailure } from "./appError";
import type { UniverseCategory } from "./candidate";

export const scanCadences = ["daily", "weekly", "monthly"] as const;

export type ScanCadence = (typeof scanCadences)[number];

export type ScanConfig = {
  cadence: ScanCadence;
  batchSize: number;
  scoreFloorForInclusion: number;
  callBudget?: number;
};

export type NewsHeadline = {
  headline: string;
  publishedAt: Date;
};

export type Evidence = {
  ticker: string;
  companyName: string | null;
  sector: string | null;
  description: string;
  headlines: string[];
  filingSnippets: string[];
};

export type KeywordMatch = {
  term: string;
  tier: string;
  weight: number;
  occurrences: number;
  category: UniverseCategory | null;
};

export type WatchlistAction =
  | "promoted"
  | "refreshed"
  | "demoted"
  | "retained_pinned"
  | "none";

export type TickerOutcome =
  | {
      status: "scored";
      ticker: string;
      stage1Score: number;
      score: number;
      category: UniverseCategory;
      isActive: boolean;
      /** True when this pass moved the entry from active to inactive. */
      deactivated: boolean;
      watchlistAction: WatchlistAction;
      adjudication: "skipped" | "applied" | "degraded";
    }
  | { status: "skipped"; ticker: string; failure: CurationFailure }
  | { status: "failed"; ticker: string; failure: CurationFailure }
  | { status: "deferred"; ticker: string; failure: BudgetExceeded };

export type UniverseSummary = {
  generatedAt: string;
  activeCount: number;
  inactiveCount: number;
  countByCategory: Record<UniverseCategory, number>;
  averageScore: number;
  maxScore: number;
};

export type UniverseSummaryDelta = {
  activeCount: number;
  averageScore: number;
  maxScore: number;
  countByCategory: Record<UniverseCategory, number>;
};

export type ScanReport = {
  cadence: ScanCadence;
  startedAt: Date;
  finishedAt: Date;
  selected: number;
  processed: number;
  skipped: number;
  failed: number;
  deferred: number;
  callsUsed: number;
  callBudget: number;
  budgetExhausted: boolean;
  promoted: string[];
  demoted: string[];
  deactivated: string[];
  focusCategory?: UniverseCategory;
  progressiveCursor?: { from: number; to: number; total: number };
  summary?: { current: UniverseSummary; delta: UniverseSummaryDelta | null };
  outcomes: TickerOutcome[];
};
