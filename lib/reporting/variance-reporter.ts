// lib/reporting/variance-reporter.ts
// KPI Pack - Actual vs Budget pivot with variance and variance %

import { Decimal, FinMath } from '../math';
import { logInfo } from '../log';
import { KPI_KEYS } from './types';
import type { IsoDate, KpiKey, KpiVariance, MonthlyAggregate, Scenario, VarianceRow } from './types';

type ScenarioValues = Partial<Record<Scenario, Record<KpiKey, Decimal>>>;

function kpiValues(agg: MonthlyAggregate): Record<KpiKey, Decimal> {
  return { revenue: agg.revenue, cogs: agg.cogs, opex: agg.opex, ebitda: agg.ebitda };
}

// A repeated (month, scenario) keeps the larger value per KPI
function mergeMax(prev: Record<KpiKey, Decimal>, next: Record<KpiKey, Decimal>): Record<KpiKey, Decimal> {
  return {
    revenue: Decimal.max(prev.revenue, next.revenue),
    cogs: Decimal.max(prev.cogs, next.cogs),
    opex: Decimal.max(prev.opex, next.opex),
    ebitda: Decimal.max(prev.ebitda, next.ebitda),
  };
}

export function computeKpiVariance(actual: Decimal | null, budget: Decimal | null): KpiVariance {
  const variance = FinMath.sub(actual, budget);
  return {
    actual,
    budget,
    variance,
    // Null rather than infinite when there is no budget to compare against
    variancePct: FinMath.ratio(variance, budget),
  };
}

/**
 * Pivot (month, scenario) aggregates into one row per month with Actual and Budget side by side.
 * A scenario with no aggregate for the month pivots to null, never to zero.
 */
export function buildVarianceReport(aggregates: readonly MonthlyAggregate[]): VarianceRow[] {
  const byMonth = new Map<IsoDate, ScenarioValues>();

  for (const agg of aggregates) {
    const month = byMonth.get(agg.monthEndDate) ?? {};
    const prev = month[agg.scenario];
    month[agg.scenario] = prev ? mergeMax(prev, kpiValues(agg)) : kpiValues(agg);
    byMonth.set(agg.monthEndDate, month);
  }

  const months = Array.from(byMonth.keys()).sort();

  const rows = months.map((monthEndDate) => {
    const values = byMonth.get(monthEndDate) ?? {};
    const pivot = (kpi: KpiKey) => computeKpiVariance(values.ACTUAL?.[kpi] ?? null, values.BUDGET?.[kpi] ?? null);

    const row: VarianceRow = {
      monthEndDate,
      revenue: pivot('revenue'),
      cogs: pivot('cogs'),
      opex: pivot('opex'),
      ebitda: pivot('ebitda'),
    };
    return row;
  });

  const missingBudget = rows.filter((r) => r.revenue.budget === null).length;
  logInfo(
    'VarianceReporter',
    `Pivoted ${rows.length} months across ${KPI_KEYS.length} KPIs` +
      (missingBudget ? ` (${missingBudget} without budget)` : '')
  );

  return rows;
}
