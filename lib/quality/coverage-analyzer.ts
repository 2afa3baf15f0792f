// lib/quality/coverage-analyzer.ts
// Data Quality - Missing month / scenario coverage against the calendar dimension

import { toIsoDate } from '../reporting/normalizer';
import { SCENARIOS } from '../reporting/types';
import type { CalendarInput, CoverageGap, FactRow, IsoDate } from '../reporting/types';

/**
 * Every (calendar month, scenario) pair with no fact rows at all.
 * Any account counts as coverage. Sorted by month, then scenario.
 */
export function findCoverageGaps(rows: readonly FactRow[], calendar: readonly CalendarInput[]): CoverageGap[] {
  const covered = new Set<string>();
  for (const row of rows) {
    covered.add(`${row.monthEndDate}|${row.scenario}`);
  }

  const months: IsoDate[] = Array.from(new Set(calendar.map((d) => toIsoDate(d)))).sort();

  const gaps: CoverageGap[] = [];
  for (const monthEndDate of months) {
    for (const scenario of SCENARIOS) {
      if (!covered.has(`${monthEndDate}|${scenario}`)) {
        gaps.push({ monthEndDate, scenario });
      }
    }
  }
  return gaps;
}
