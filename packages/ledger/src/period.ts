/**
 * @pocketbook/ledger — Calendar month helpers.
 *
 * Dates and periods are zero-padded strings, so lexical order is
 * chronological order.
 */

import type { DateString, YearMonth } from "@pocketbook/types";

/** The month a date falls in. Expects a validated date. */
export function periodOf(date: DateString): YearMonth {
  return date.slice(0, 7);
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Days in a month (1-12) of the proleptic Gregorian calendar; 0 for other months. */
export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/** First and last calendar day of a month. Expects a validated period. */
export function periodRange(period: YearMonth): { readonly from: DateString; readonly to: DateString } {
  const lastDay = daysInMonth(Number(period.slice(0, 4)), Number(period.slice(5, 7)));
  return {
    from: `${period}-01`,
    to: `${period}-${String(lastDay).padStart(2, "0")}`,
  };
}
