import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const tradingUniverseTable = pgTable(
  "trading_universe",
  {
    ticker: text("ticker").primaryKey(),
    companyName: text("company_name"),
    sector: text("sector"),
    category: text("category").notNull().default("none"),
    score: integer("score").notNull().default(0),
    isActive: boolean("is_active").notNull().default(true),
    lastScanned: timestamp("last_scanned", { withTimezone: true }),
    lastMention: timestamp("last_mention", { withTimezone: true }),
    notes: text("notes"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    deactivatedAt: timestamp("deactivated_at", { withTimezone: true }),
  },
  (table) => ({
    activeScoreIdx: index("trading_universe_active_score_idx").on(
      table.isActive,
      table.score,
    ),
    categoryIdx: index("trading_universe_category_idx").on(table.category),
  }),
);

export const watchlistTable = pgTable("watchlist", {
  ticker: text("ticker").primaryKey(),
  score: integer("score").notNull(),
  status: text("status").notNull(),
  pinned: boolean("pinned").notNull().default(false),
  addedAt: timestamp("added_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

export const journalTable = pgTable(
  "journal",
  {
    id: text("id").primaryKey(),
    actor: text("actor").notNull(),
    category: text("category").notNull(),
    content: text("content").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    createdAtIdx: index("journal_created_at_idx").on(table.createdAt),
  }),
);

export const schedulerStateTable = pgTable("scheduler_state", {
  key: text("key").primaryKey(),
  value: jsonb("value").$type<unknown>().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});
