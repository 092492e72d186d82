/**
 * Calendar-month utilities for the projection horizon.
 * Months are handled as (year, month) pairs, never as strings, so ordering
 * is correct across year boundaries.
 */

export interface YearMonth {
  year: number;
  /** 1-12 */
  month: number;
}

const YEAR_MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

/**
 * Parses a "YYYY-MM" string.
 *
 * @returns The parsed month, or null when the text is not a valid month
 */
export function parseYearMonth(text: string): YearMonth | null {
  const match = YEAR_MONTH_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    return null;
  }
  return { year, month };
}

/**
 * Formats a month as "YYYY-MM".
 */
export function formatYearMonth(ym: YearMonth): string {
  return `${String(ym.year).padStart(4, "0")}-${String(ym.month).padStart(2, "0")}`;
}

/**
 * Compares two months chronologically.
 *
 * @returns Negative if a is before b, 0 if equal, positive if after
 */
export function compareYearMonth(a: YearMonth, b: YearMonth): number {
  if (a.year !== b.year) {
    return a.year - b.year;
  }
  return a.month - b.month;
}

/**
 * Inclusive range check: start ≤ ym ≤ end.
 */
export function isWithinMonths(ym: YearMonth, start: YearMonth, end: YearMonth): boolean {
  return compareYearMonth(start, ym) <= 0 && compareYearMonth(ym, end) <= 0;
}

/**
 * Adds a number of months, rolling over year boundaries.
 *
 * @example
 * ```ts
 * addMonths({ year: 2024, month: 11 }, 3) // { year: 2025, month: 2 }
 * ```
 */
export function addMonths(ym: YearMonth, count: number): YearMonth {
  const index = ym.year * 12 + (ym.month - 1) + count;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

/**
 * Number of calendar days in the month.
 */
export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Day of week in UTC: 0 = Sunday … 6 = Saturday.
 */
export function dayOfWeek(year: number, month: number, day: number): number {
  return new Date(Date.UTC(year, month - 1, day)).getUTCDay();
}

/**
 * ISO date "YYYY-MM-DD" for a calendar day.
 */
export function isoDate(year: number, month: number, day: number): string {
  return `${formatYearMonth({ year, month })}-${String(day).padStart(2, "0")}`;
}

/**
 * The month containing `now`. Only the application shell calls this; the
 * engine always receives its start month explicitly.
 */
export function currentYearMonth(now: Date = new Date()): YearMonth {
  return { year: now.getFullYear(), month: now.getMonth() + 1 };
}
