// lib/reporting/aggregator.ts
// KPI Pack - Monthly Aggregation (Revenue / COGS / OPEX / EBITDA per month and scenario)

import { Decimal, ZERO } from '../math';
import { UnclassifiedAccountError } from '../errors';
import { logInfo, logWarn } from '../log';
import type { AccountClassifier } from '../accounts';
import type { FactRow, IsoDate, MonthlyAggregate, Scenario } from './types';

export type UnclassifiedPolicy = 'warn' | 'error';

export interface AggregateOptions {
  unclassifiedPolicy?: UnclassifiedPolicy;
}

export interface AggregationResult {
  /** One entry per (month, scenario) in order of first appearance. Sort before presenting. */
  aggregates: MonthlyAggregate[];
  /** Codes the classifier did not know; they were summed as OTHER, i.e. left out. */
  unclassifiedAccounts: string[];
}

interface Buckets {
  monthEndDate: IsoDate;
  scenario: Scenario;
  revenue: Decimal;
  cogs: Decimal;
  opex: Decimal;
}

/**
 * Group normalized rows by (month, scenario) and sum amounts by account class.
 * Signs are kept as booked: COGS and OPEX carry negative amounts, so
 * EBITDA = revenue + cogs + opex.
 */
export function aggregateMonthlyKpis(
  rows: readonly FactRow[],
  classifier: AccountClassifier,
  options: AggregateOptions = {}
): AggregationResult {
  const { unclassifiedPolicy = 'warn' } = options;

  const groups = new Map<string, Buckets>();
  const unclassified = new Set<string>();

  for (const row of rows) {
    const key = `${row.monthEndDate}|${row.scenario}`;
    let group = groups.get(key);
    if (!group) {
      group = { monthEndDate: row.monthEndDate, scenario: row.scenario, revenue: ZERO, cogs: ZERO, opex: ZERO };
      groups.set(key, group);
    }

    const cls = classifier.classify(row.accountCode);
    switch (cls) {
      case 'REVENUE':
        group.revenue = group.revenue.plus(row.amount);
        break;
      case 'COGS':
        group.cogs = group.cogs.plus(row.amount);
        break;
      case 'OPEX':
        group.opex = group.opex.plus(row.amount);
        break;
      case 'OTHER':
        break;
      case null:
        unclassified.add(row.accountCode);
        break;
    }
  }

  const unclassifiedAccounts = Array.from(unclassified).sort();
  if (unclassifiedAccounts.length > 0) {
    if (unclassifiedPolicy === 'error') {
      throw new UnclassifiedAccountError(unclassifiedAccounts);
    }
    logWarn('Aggregator', `Treating unclassified accounts as Other: ${unclassifiedAccounts.join(', ')}`);
  }

  const aggregates = Array.from(groups.values()).map(
    (g): MonthlyAggregate => ({
      monthEndDate: g.monthEndDate,
      scenario: g.scenario,
      revenue: g.revenue,
      cogs: g.cogs,
      opex: g.opex,
      ebitda: g.revenue.plus(g.cogs).plus(g.opex),
    })
  );

  logInfo('Aggregator', `Built ${aggregates.length} monthly aggregates from ${rows.length} rows`);

  return { aggregates, unclassifiedAccounts };
}

/**
 * Month ascending, then ACTUAL before BUDGET.
 */
export function sortAggregates(aggregates: readonly MonthlyAggregate[]): MonthlyAggregate[] {
  return [...aggregates].sort((a, b) =>
    a.monthEndDate === b.monthEndDate
      ? a.scenario.localeCompare(b.scenario)
      : a.monthEndDate < b.monthEndDate
        ? -1
        : 1
  );
}
