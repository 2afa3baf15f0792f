// lib/export/report-writer.ts

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { logInfo } from '../log';
import type { ReportTable } from './report-tables';

function toSheet(table: ReportTable): XLSX.WorkSheet {
  return XLSX.utils.aoa_to_sheet([table.columns, ...table.rows]);
}

export function renderCsv(table: ReportTable): string {
  return XLSX.utils.sheet_to_csv(toSheet(table));
}

/**
 * One `<name>.csv` per table. Returns the written paths.
 */
export async function writeCsvReports(dir: string, tables: readonly ReportTable[]): Promise<string[]> {
  await mkdir(dir, { recursive: true });

  const paths: string[] = [];
  for (const table of tables) {
    const path = join(dir, `${table.name}.csv`);
    await writeFile(path, `${renderCsv(table)}\n`, 'utf8');
    paths.push(path);
  }

  logInfo('ReportWriter', `Wrote ${paths.length} CSV files to ${dir}`);
  return paths;
}

export function buildWorkbook(tables: readonly ReportTable[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const table of tables) {
    // Sheet names are capped at 31 characters
    XLSX.utils.book_append_sheet(workbook, toSheet(table), table.name.slice(0, 31));
  }
  return workbook;
}

export async function writeWorkbookReport(path: string, tables: readonly ReportTable[]): Promise<void> {
  const buffer: Buffer = XLSX.write(buildWorkbook(tables), { type: 'buffer', bookType: 'xlsx' });
  await writeFile(path, buffer);
  logInfo('ReportWriter', `Wrote ${tables.length} sheets to ${path}`);
}
