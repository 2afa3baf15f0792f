// lib/export/report-tables.ts
// Flat, string-valued tables for CSV / workbook export

import { formatAmount, formatRatio } from '../math';
import type { KpiPackResult } from '../kpi-pack';
import { KPI_KEYS } from '../reporting/types';

export interface ReportTable {
  name: string;
  columns: string[];
  rows: string[][];
}

export function monthlyKpiTable(result: Pick<KpiPackResult, 'aggregates'>): ReportTable {
  return {
    name: 'monthly_kpis',
    columns: ['month_end_date', 'scenario', 'revenue', 'cogs', 'opex', 'ebitda'],
    rows: result.aggregates.map((a) => [
      a.monthEndDate,
      a.scenario,
      formatAmount(a.revenue),
      formatAmount(a.cogs),
      formatAmount(a.opex),
      formatAmount(a.ebitda),
    ]),
  };
}

export function varianceTable(result: Pick<KpiPackResult, 'variance'>): ReportTable {
  const columns = ['month_end_date'];
  for (const kpi of KPI_KEYS) {
    columns.push(`${kpi}_actual`, `${kpi}_budget`, `${kpi}_variance`, `${kpi}_variance_pct`);
  }

  return {
    name: 'kpi_variance',
    columns,
    rows: result.variance.map((row) => {
      const cells = [row.monthEndDate];
      for (const kpi of KPI_KEYS) {
        const v = row[kpi];
        cells.push(formatAmount(v.actual), formatAmount(v.budget), formatAmount(v.variance), formatRatio(v.variancePct));
      }
      return cells;
    }),
  };
}

export function duplicateKeyTable(result: Pick<KpiPackResult, 'quality'>): ReportTable {
  return {
    name: 'dq_duplicate_keys',
    columns: ['month_end_date', 'scenario', 'account_code', 'row_count'],
    rows: result.quality.duplicates.map((d) => [d.monthEndDate, d.scenario, d.accountCode, String(d.rowCount)]),
  };
}

export function coverageGapTable(result: Pick<KpiPackResult, 'quality'>): ReportTable | null {
  const gaps = result.quality.coverageGaps;
  if (gaps === null) return null;
  return {
    name: 'dq_missing_months',
    columns: ['month_end_date', 'scenario'],
    rows: gaps.map((g) => [g.monthEndDate, g.scenario]),
  };
}

/**
 * All output tables of a run. The coverage table is left out when no calendar was supplied.
 */
export function toReportTables(result: KpiPackResult): ReportTable[] {
  const tables = [monthlyKpiTable(result), varianceTable(result), duplicateKeyTable(result)];
  const coverage = coverageGapTable(result);
  if (coverage) tables.push(coverage);
  return tables;
}
