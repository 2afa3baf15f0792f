// lib/reporting/fact-view.ts
// Reporting view over normalized facts: adds year / month / quarter attributes

import type { FactRow, FactViewRow, IsoDate, Quarter } from './types';

export function quarterOf(monthNumber: number): Quarter {
  if (monthNumber <= 3) return 'Q1';
  if (monthNumber <= 6) return 'Q2';
  if (monthNumber <= 9) return 'Q3';
  return 'Q4';
}

export function dateParts(date: IsoDate): { year: number; monthNumber: number; quarter: Quarter } {
  const year = Number(date.slice(0, 4));
  const monthNumber = Number(date.slice(5, 7));
  return { year, monthNumber, quarter: quarterOf(monthNumber) };
}

export function buildFactView(rows: readonly FactRow[]): FactViewRow[] {
  return rows.map((row) => ({ ...row, ...dateParts(row.monthEndDate) }));
}
