/**
 * KPI Pack Report Script
 *
 * Loads P&L facts and the month-end calendar, runs the KPI pack
 * (normalize, aggregate, variance, data-quality checks) and exports the tables.
 *
 * Usage:
 *   npm run report -- --workbook data/Financial_Raw_Data.xlsx --out reports/
 *   npm run report -- --postgres --xlsx reports/kpi_pack.xlsx
 *   npm run report -- --workbook data.xlsx --from 2024-01 --to 2024-12   # explicit calendar
 *   npm run report -- --postgres --strict-accounts --fail-on-quality
 */

import 'dotenv/config';
import { loadAccountChart } from '../lib/accounts';
import { loadConfig } from '../lib/config';
import { toReportTables, writeCsvReports, writeWorkbookReport } from '../lib/export';
import { runKpiPack } from '../lib/kpi-pack';
import { buildMonthEndCalendar } from '../lib/reporting';
import type { CalendarInput } from '../lib/reporting';
import { createPostgresFactSource, WorkbookFactSource } from '../lib/sources';
import type { FactSource } from '../lib/sources';

interface RunOptions {
  workbook?: string;
  postgres: boolean;
  chart?: string;
  from?: string;
  to?: string;
  out?: string;
  xlsx?: string;
  strictAccounts: boolean;
  failOnQuality: boolean;
}

function parseArgs(): RunOptions {
  const args = process.argv.slice(2);
  const options: RunOptions = {
    postgres: false,
    strictAccounts: false,
    failOnQuality: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === '--workbook' && next) {
      options.workbook = next;
      i++;
    } else if (arg === '--postgres') {
      options.postgres = true;
    } else if (arg === '--chart' && next) {
      options.chart = next;
      i++;
    } else if (arg === '--from' && next) {
      options.from = next;
      i++;
    } else if (arg === '--to' && next) {
      options.to = next;
      i++;
    } else if (arg === '--out' && next) {
      options.out = next;
      i++;
    } else if (arg === '--xlsx' && next) {
      options.xlsx = next;
      i++;
    } else if (arg === '--strict-accounts') {
      options.strictAccounts = true;
    } else if (arg === '--fail-on-quality') {
      options.failOnQuality = true;
    } else {
      throw new Error(`Unknown or incomplete argument: ${arg}`);
    }
  }

  if (Boolean(options.workbook) === options.postgres) {
    throw new Error('Pass exactly one of --workbook <path> or --postgres');
  }
  if (Boolean(options.from) !== Boolean(options.to)) {
    throw new Error('--from and --to must be given together');
  }

  return options;
}

async function openSource(options: RunOptions): Promise<FactSource> {
  if (options.workbook) {
    return WorkbookFactSource.fromFile(options.workbook);
  }
  return createPostgresFactSource();
}

async function main() {
  const options = parseArgs();
  const config = loadConfig();

  console.log('='.repeat(60));
  console.log('P&L KPI Pack');
  console.log('='.repeat(60));
  console.log(`  Source: ${options.workbook ? `workbook ${options.workbook}` : `postgres ${config.factTable}`}`);
  console.log(`  Account chart: ${options.chart || config.accountChartPath || 'bundled default'}`);
  console.log(`  Calendar: ${options.from ? `${options.from} .. ${options.to}` : 'from source'}`);
  console.log('='.repeat(60));

  const chart = await loadAccountChart(options.chart || config.accountChartPath);
  const source = await openSource(options);

  try {
    const rawRows = await source.loadFacts();
    const calendar: CalendarInput[] =
      options.from && options.to ? buildMonthEndCalendar(options.from, options.to) : await source.loadCalendar();

    const result = runKpiPack(rawRows, {
      chart,
      calendar,
      unclassifiedPolicy: options.strictAccounts ? 'error' : 'warn',
    });

    const tables = toReportTables(result);
    if (options.out) await writeCsvReports(options.out, tables);
    if (options.xlsx) await writeWorkbookReport(options.xlsx, tables);

    const { quality } = result;
    console.log('\n' + '='.repeat(60));
    console.log('Summary');
    console.log('='.repeat(60));
    console.log(`Fact rows:         ${result.facts.length}`);
    console.log(`Months reported:   ${result.variance.length}`);
    console.log(`Duplicate keys:    ${quality.duplicates.length}`);
    console.log(`Coverage gaps:     ${quality.coverageGaps?.length ?? 'not checked'}`);
    console.log(`Unclassified:      ${result.unclassifiedAccounts.join(', ') || 'none'}`);

    if (!options.out && !options.xlsx) {
      console.table(tables[1].rows.map((cells) => Object.fromEntries(tables[1].columns.map((c, i) => [c, cells[i]]))));
    }

    if (options.failOnQuality && !quality.passed) {
      console.error('\nData-quality checks failed');
      process.exitCode = 2;
    }
  } finally {
    await source.close();
  }
}

main().catch((error: unknown) => {
  console.error('[KpiPack] Fatal error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
