/**
 * Date helpers shared by the filing parsers.
 */

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const LONG_DATE_PATTERN =
  /\b(january|february|march|april|may|june|july|august|september|october|november|december)\s+(\d{1,2}),?\s+(\d{4})\b/i;
const NUMERIC_DATE_PATTERN = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/;

/**
 * Converts a Date to ISO date string (YYYY-MM-DD format).
 */
const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

const fromParts = (
  year: number,
  monthIndex: number,
  day: number,
): string | null => {
  const date = new Date(Date.UTC(year, monthIndex, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== monthIndex ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return toIsoDate(date);
};

/**
 * Finds the first cover-page style date ("September 28, 2024" or "09/28/2024") in free text.
 * Returns `null` when no valid calendar date is present.
 */
export const findDateInText = (text: string): string | null => {
  const longMatch = LONG_DATE_PATTERN.exec(text);
  if (longMatch) {
    const [, month = "", day = "", year = ""] = longMatch;
    return fromParts(
      Number(year),
      MONTHS.indexOf(month.toLowerCase()),
      Number(day),
    );
  }

  const numericMatch = NUMERIC_DATE_PATTERN.exec(text);
  if (numericMatch) {
    const [, month = "", day = "", year = ""] = numericMatch;
    return fromParts(Number(year), Number(month) - 1, Number(day));
  }

  return null;
};
