export const WATCHING_STATUS = "Watching";

export type WatchlistEntry = {
  ticker: string;
  score: number;
  /** Owned by the trading agent once the row exists. */
  status: string;
  pinned: boolean;
  addedAt: Date;
  updatedAt: Date;
};
