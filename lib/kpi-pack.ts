// lib/kpi-pack.ts
// KPI Pack pipeline: Normalizer -> { Aggregator -> Variance Reporter, Quality Checker }

import { createAccountClassifier, defaultAccountChart } from './accounts';
import type { AccountChart, AccountClassifier } from './accounts';
import { logInfo } from './log';
import { runQualityChecks } from './quality';
import type { QualityReport } from './quality';
import {
  aggregateMonthlyKpis,
  buildFactView,
  buildVarianceReport,
  normalizeFactRows,
  sortAggregates,
} from './reporting';
import type {
  CalendarInput,
  FactRow,
  FactViewRow,
  MonthlyAggregate,
  RawFactRow,
  UnclassifiedPolicy,
  VarianceRow,
} from './reporting';

export interface KpiPackOptions {
  /** Account chart; ignored when `classifier` is given. Defaults to the bundled chart. */
  chart?: AccountChart;
  classifier?: AccountClassifier;
  /** Expected month-end dates. Without it the coverage check is skipped. */
  calendar?: readonly CalendarInput[];
  unclassifiedPolicy?: UnclassifiedPolicy;
}

export interface KpiPackResult {
  facts: FactRow[];
  factView: FactViewRow[];
  aggregates: MonthlyAggregate[];
  variance: VarianceRow[];
  quality: QualityReport;
  unclassifiedAccounts: string[];
}

export function runKpiPack(rawRows: readonly RawFactRow[], options: KpiPackOptions = {}): KpiPackResult {
  const classifier = options.classifier ?? createAccountClassifier(options.chart ?? defaultAccountChart());

  logInfo('KpiPack', `Processing ${rawRows.length} raw fact rows`);

  // Account codes are padded to the chart's width so they match the classifier
  const facts = normalizeFactRows(rawRows, { codeWidth: classifier.codeWidth });

  const { aggregates, unclassifiedAccounts } = aggregateMonthlyKpis(facts, classifier, {
    unclassifiedPolicy: options.unclassifiedPolicy,
  });
  const variance = buildVarianceReport(aggregates);
  const quality = runQualityChecks(facts, options.calendar);

  return {
    facts,
    factView: buildFactView(facts),
    aggregates: sortAggregates(aggregates),
    variance,
    quality,
    unclassifiedAccounts,
  };
}
