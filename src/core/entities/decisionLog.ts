export const decisionCategories = [
  "Scan",
  "Promotion",
  "Demotion",
  "Deactivation",
  "Degraded",
  "Error",
  "Summary",
  "Bootstrap",
] as const;

export type DecisionCategory = (typeof decisionCategories)[number];

export const isDecisionCategory = (value: unknown): value is DecisionCategory =>
  typeof value === "string" &&
  decisionCategories.some((category) => category === value);

export type DecisionLogRecord = {
  id: string;
  actor: string;
  category: DecisionCategory;
  content: string;
  createdAt: Date;
};
