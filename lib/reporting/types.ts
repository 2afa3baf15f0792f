// lib/reporting/types.ts
// KPI Pack - Type Definitions

import type { Decimal } from '../math';

export const SCENARIOS = ['ACTUAL', 'BUDGET'] as const;
export type Scenario = (typeof SCENARIOS)[number];

/** Calendar day as `YYYY-MM-DD`; sorts chronologically as a string. */
export type IsoDate = string;

export type Quarter = 'Q1' | 'Q2' | 'Q3' | 'Q4';

// ============================================================================
// Fact rows
// ============================================================================

/**
 * Raw P&L fact row as delivered by a resultset or spreadsheet extract.
 * Field types vary by source; the normalizer coerces them.
 */
export interface RawFactRow {
  month_end_date: unknown;
  scenario: unknown;
  account_code: unknown;
  amount: unknown;
}

export interface FactRow {
  monthEndDate: IsoDate;
  scenario: Scenario;
  accountCode: string;
  amount: Decimal; // 2 fractional digits
}

export interface FactViewRow extends FactRow {
  year: number;
  monthNumber: number;
  quarter: Quarter;
}

// ============================================================================
// KPI outputs
// ============================================================================

export const KPI_KEYS = ['revenue', 'cogs', 'opex', 'ebitda'] as const;
export type KpiKey = (typeof KPI_KEYS)[number];

export interface MonthlyAggregate {
  monthEndDate: IsoDate;
  scenario: Scenario;
  revenue: Decimal;
  cogs: Decimal; // negative by sign convention
  opex: Decimal; // negative by sign convention
  ebitda: Decimal;
}

/**
 * A pivoted KPI. `null` means the scenario has no data for the month,
 * which is different from a submitted zero.
 */
export interface KpiVariance {
  actual: Decimal | null;
  budget: Decimal | null;
  variance: Decimal | null;
  variancePct: Decimal | null;
}

export type VarianceRow = { monthEndDate: IsoDate } & Record<KpiKey, KpiVariance>;

// ============================================================================
// Data quality
// ============================================================================

export interface DuplicateKey {
  monthEndDate: IsoDate;
  scenario: Scenario;
  accountCode: string;
  rowCount: number;
}

export interface CoverageGap {
  monthEndDate: IsoDate;
  scenario: Scenario;
}

export type CalendarInput = Date | string;
