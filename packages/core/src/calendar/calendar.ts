/**
 * Calendar helpers for ISO 8601 dates (`YYYY-MM-DD`) and months (`YYYY-MM`).
 *
 * Dates are handled as plain strings so that lexical order matches
 * chronological order in SQL comparisons.
 */

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface YearMonth {
  year: number;
  month: number;
}

export interface DateInterval {
  /** Inclusive */
  start: string;
  /** Exclusive */
  end: string;
}

export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;
/**
 * Last year whose months have a four-digit exclusive end bound
 */
export const MAX_SUMMARY_YEAR = MAX_YEAR - 1;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

export function isValidYearMonth(year: number, month: number): boolean {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    year >= MIN_YEAR &&
    year <= MAX_YEAR &&
    month >= 1 &&
    month <= 12
  );
}

/**
 * Parse a strict `YYYY-MM-DD` string, rejecting days that do not exist
 * (e.g. `2023-02-29`). Returns null for anything else.
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (!isValidYearMonth(year, month) || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }

  return { year, month, day };
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatIsoDate({ year, month, day }: CalendarDate): string {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

export function formatYearMonth({ year, month }: YearMonth): string {
  return `${pad(year, 4)}-${pad(month, 2)}`;
}

/**
 * Local calendar date of `now`
 */
export function toIsoDate(now: Date): string {
  return formatIsoDate({
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  });
}

export function shiftMonth({ year, month }: YearMonth, offset: number): YearMonth {
  const index = year * 12 + (month - 1) + offset;
  return {
    year: Math.floor(index / 12),
    month: (((index % 12) + 12) % 12) + 1,
  };
}

/**
 * Half-open interval covering one month: `[YYYY-MM-01, first day of next month)`
 */
export function monthInterval(yearMonth: YearMonth): DateInterval {
  const next = shiftMonth(yearMonth, 1);
  return {
    start: formatIsoDate({ ...yearMonth, day: 1 }),
    end: formatIsoDate({ ...next, day: 1 }),
  };
}
