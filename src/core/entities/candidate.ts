export const aiCategories = [
  "ai_chip",
  "ai_software",
  "ai_cloud",
  "ai_infrastructure",
  "ai_beneficiary",
] as const;

export const universeCategories = [...aiCategories, "none"] as const;

export type AiCategory = (typeof aiCategories)[number];
export type UniverseCategory = (typeof universeCategories)[number];

export const isUniverseCategory = (value: unknown): value is UniverseCategory =>
  typeof value === "string" &&
  universeCategories.some((category) => category === value);

export type CandidateEntry = {
  ticker: string;
  companyName: string | null;
  sector: string | null;
  category: UniverseCategory;
  score: number;
  isActive: boolean;
  lastScanned: Date | null;
  lastMention: Date | null;
  notes: string | null;
  createdAt: Date;
  deactivatedAt: Date | null;
};

/**
 * Descriptive fields only; bootstrap never decides score or lifecycle for an existing row.
 */
export type CandidateSeed = {
  ticker: string;
  companyName: string | null;
  sector: string | null;
};

export type UniverseQuery = {
  isActive?: boolean;
  minScore?: number;
  category?: UniverseCategory;
  limit?: number;
};

/**
 * One record of a tabular universe source, keyed by header, with its line in the source.
 */
export type UniverseSourceRow = {
  line: number;
  cells: Record<string, string>;
};

export type UniverseSourceTable = {
  rows: UniverseSourceRow[];
  /** Records the parser could not read at all. */
  malformed: { line: number; reason: string }[];
};
