/**
 * Date and time formats used by roster metadata
 */

const DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{2})$/;
const TIME_PATTERN = /^\d{2}:\d{2}-\d{2}:\d{2}$/;

const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

/**
 * Two-digit years 00-68 map to 20xx, 69-99 to 19xx.
 */
export function parseRosterDate(value: string): Date | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const shortYear = Number(match[3]);
  const year = shortYear < 69 ? 2000 + shortYear : 1900 + shortYear;

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

export function isValidDate(value: string): boolean {
  return parseRosterDate(value) !== null;
}

export function isValidTime(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/** Local calendar date as DD/MM/YY */
export function formatRosterDate(date: Date): string {
  const dd = String(date.getDate()).padStart(2, "0");
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const yy = String(date.getFullYear() % 100).padStart(2, "0");
  return `${dd}/${mm}/${yy}`;
}

export function weekdayName(value: string): string {
  const date = parseRosterDate(value);
  return date ? WEEKDAYS[date.getUTCDay()] : "?";
}
