// lib/reporting/calendar.ts
// Explicit month-end calendars for callers that do not have a date dimension

import type { IsoDate } from './types';

const YEAR_MONTH = /^(\d{4})-(\d{2})$/;

function parseYearMonth(value: string): { year: number; month: number } {
  const m = value.trim().match(YEAR_MONTH);
  const month = m ? Number(m[2]) : 0;
  if (!m || month < 1 || month > 12) {
    throw new RangeError(`Expected YYYY-MM, got ${value}`);
  }
  return { year: Number(m[1]), month };
}

const pad = (n: number, width: number) => String(n).padStart(width, '0');

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Days in a month of the proleptic Gregorian calendar. */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

export function monthEndDate(year: number, month: number): IsoDate {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(daysInMonth(year, month), 2)}`;
}

/**
 * Month-end dates from `from` to `to` inclusive, both given as YYYY-MM.
 */
export function buildMonthEndCalendar(from: string, to: string): IsoDate[] {
  const start = parseYearMonth(from);
  const end = parseYearMonth(to);
  const startIdx = start.year * 12 + (start.month - 1);
  const endIdx = end.year * 12 + (end.month - 1);
  if (startIdx > endIdx) {
    throw new RangeError(`Calendar start ${from} is after end ${to}`);
  }

  const out: IsoDate[] = [];
  for (let idx = startIdx; idx <= endIdx; idx++) {
    out.push(monthEndDate(Math.floor(idx / 12), (idx % 12) + 1));
  }
  return out;
}
