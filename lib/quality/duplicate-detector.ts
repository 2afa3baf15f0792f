// lib/quality/duplicate-detector.ts
// Data Quality - Duplicate fact keys (month_end_date + scenario + account_code)

import type { DuplicateKey, FactRow } from '../reporting/types';

/**
 * Report every (month, scenario, account) key that appears more than once.
 * Nothing is repaired; the report is a signal to the caller.
 *
 * Ordering: rowCount descending, ties by month, scenario, then account code ascending.
 */
export function findDuplicateKeys(rows: readonly FactRow[]): DuplicateKey[] {
  const counts = new Map<string, DuplicateKey>();

  for (const row of rows) {
    const key = `${row.monthEndDate}|${row.scenario}|${row.accountCode}`;
    const existing = counts.get(key);
    if (existing) {
      existing.rowCount += 1;
    } else {
      counts.set(key, {
        monthEndDate: row.monthEndDate,
        scenario: row.scenario,
        accountCode: row.accountCode,
        rowCount: 1,
      });
    }
  }

  return Array.from(counts.values())
    .filter((d) => d.rowCount > 1)
    .sort(
      (a, b) =>
        b.rowCount - a.rowCount ||
        compareText(a.monthEndDate, b.monthEndDate) ||
        compareText(a.scenario, b.scenario) ||
        compareText(a.accountCode, b.accountCode)
    );
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
