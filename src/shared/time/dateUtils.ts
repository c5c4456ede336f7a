const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Converts a Date to ISO date string (YYYY-MM-DD format).
 * Used for API query parameters that expect date-only strings.
 */
export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

export const daysBefore = (value: Date, days: number): Date =>
  new Date(value.getTime() - days * DAY_MS);

/**
 * ISO-8601 week number (weeks start on Monday, week 1 holds the first Thursday), in UTC.
 */
export const isoWeekNumber = (value: Date): number => {
  const date = new Date(
    Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()),
  );
  const dayOfWeek = date.getUTCDay() === 0 ? 7 : date.getUTCDay();
  date.setUTCDate(date.getUTCDate() + 4 - dayOfWeek);
  const yearStart = Date.UTC(date.getUTCFullYear(), 0, 1);
  return Math.ceil(((date.getTime() - yearStart) / DAY_MS + 1) / 7);
};
