// lib/quality/quality-monitor.ts
// Data Quality - Combined checks over the normalized fact set

import { logInfo, logWarn } from '../log';
import type { CalendarInput, CoverageGap, DuplicateKey, FactRow } from '../reporting/types';
import { findCoverageGaps } from './coverage-analyzer';
import { findDuplicateKeys } from './duplicate-detector';

export interface QualityReport {
  duplicates: DuplicateKey[];
  /** null when no calendar was supplied, so coverage was not checked */
  coverageGaps: CoverageGap[] | null;
  passed: boolean;
}

/**
 * Run duplicate-key and coverage checks. Both are read-only over the facts.
 */
export function runQualityChecks(rows: readonly FactRow[], calendar?: readonly CalendarInput[]): QualityReport {
  const duplicates = findDuplicateKeys(rows);
  const coverageGaps = calendar ? findCoverageGaps(rows, calendar) : null;
  const passed = duplicates.length === 0 && (coverageGaps === null || coverageGaps.length === 0);

  const coverageText = coverageGaps === null ? 'coverage not checked' : `${coverageGaps.length} coverage gaps`;
  const summary = `${duplicates.length} duplicate keys, ${coverageText}`;
  if (passed) {
    logInfo('QualityChecker', `Passed: ${summary}`);
  } else {
    logWarn('QualityChecker', `Issues found: ${summary}`);
  }

  return { duplicates, coverageGaps, passed };
}
