// lib/sources/workbook-source.ts
// Fact / calendar loader for a spreadsheet extract (FactPnL_Monthly + DimDate sheets)

import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { SourceError } from '../errors';
import { logInfo } from '../log';
import type { RawFactRow } from '../reporting/types';
import type { FactSource } from './types';

export interface WorkbookSourceOptions {
  factSheet?: string;
  calendarSheet?: string;
}

type FactColumn = keyof RawFactRow;

const HEADER_ALIASES: Record<FactColumn, string[]> = {
  month_end_date: ['monthenddate', 'month_end_date', 'month end date', 'date'],
  scenario: ['scenario'],
  account_code: ['accountcode', 'account_code', 'account code', 'account'],
  amount: ['amount', 'value'],
};

const normalizeHeader = (value: unknown): string => (typeof value === 'string' ? value.trim().toLowerCase() : '');

/**
 * Date cells arrive as serial day numbers; they are converted here with
 * SheetJS' own date code parser so no local timezone is involved.
 */
function toDateCell(value: unknown): unknown {
  if (typeof value !== 'number') return value;
  const parsed: { y: number; m: number; d: number } | null = XLSX.SSF.parse_date_code(value);
  if (!parsed) return value;
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  return `${pad(parsed.y, 4)}-${pad(parsed.m)}-${pad(parsed.d)}`;
}

export class WorkbookFactSource implements FactSource {
  readonly name = 'workbook';
  private factSheet: string;
  private calendarSheet: string;

  constructor(
    private workbook: XLSX.WorkBook,
    options: WorkbookSourceOptions = {}
  ) {
    this.factSheet = options.factSheet ?? 'FactPnL_Monthly';
    this.calendarSheet = options.calendarSheet ?? 'DimDate';
  }

  static async fromFile(path: string, options: WorkbookSourceOptions = {}): Promise<WorkbookFactSource> {
    const buffer = await readFile(path);
    return new WorkbookFactSource(XLSX.read(buffer, { type: 'buffer' }), options);
  }

  private readRows(sheetName: string): unknown[][] {
    const sheet = this.workbook.Sheets[sheetName];
    if (!sheet) {
      throw new SourceError('WorkbookSource', `Sheet not found: ${sheetName}`);
    }
    return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, defval: null, raw: true });
  }

  private columnIndex(header: unknown[], column: FactColumn, sheetName: string): number {
    const aliases = HEADER_ALIASES[column];
    const idx = header.findIndex((cell) => aliases.includes(normalizeHeader(cell)));
    if (idx < 0) {
      throw new SourceError('WorkbookSource', `Column ${column} not found in sheet ${sheetName}`);
    }
    return idx;
  }

  async loadFacts(): Promise<RawFactRow[]> {
    const [header = [], ...body] = this.readRows(this.factSheet);
    const col = {
      month_end_date: this.columnIndex(header, 'month_end_date', this.factSheet),
      scenario: this.columnIndex(header, 'scenario', this.factSheet),
      account_code: this.columnIndex(header, 'account_code', this.factSheet),
      amount: this.columnIndex(header, 'amount', this.factSheet),
    };

    const rows = body.map(
      (cells): RawFactRow => ({
        month_end_date: toDateCell(cells[col.month_end_date]),
        scenario: cells[col.scenario],
        account_code: cells[col.account_code],
        amount: cells[col.amount],
      })
    );

    logInfo('WorkbookSource', `Loaded ${rows.length} rows from sheet ${this.factSheet}`);
    return rows;
  }

  async loadCalendar(): Promise<Array<string | Date>> {
    const [header = [], ...body] = this.readRows(this.calendarSheet);
    const idx = this.columnIndex(header, 'month_end_date', this.calendarSheet);

    const dates: Array<string | Date> = [];
    body.forEach((cells, i) => {
      const value = toDateCell(cells[idx]);
      if (value === null || value === undefined || value === '') return;
      if (typeof value !== 'string' && !(value instanceof Date)) {
        throw new SourceError('WorkbookSource', `Row ${i + 2} of ${this.calendarSheet} has no usable date`);
      }
      dates.push(value);
    });

    logInfo('WorkbookSource', `Loaded ${dates.length} calendar months from sheet ${this.calendarSheet}`);
    return dates;
  }

  async close(): Promise<void> {
    // nothing held open
  }
}
