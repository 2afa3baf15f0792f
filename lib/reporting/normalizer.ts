// lib/reporting/normalizer.ts
// KPI Pack - Fact Row Normalization
//
// Every row is coerced or the batch fails: a partially normalized set would
// under-report the KPIs without anyone noticing.

import { Decimal, roundMoney } from '../math';
import { MalformedRowError } from '../errors';
import { logInfo } from '../log';
import { daysInMonth } from './calendar';
import { SCENARIOS } from './types';
import type { FactRow, IsoDate, RawFactRow, Scenario } from './types';

export const DEFAULT_CODE_WIDTH = 4;

export interface NormalizeOptions {
  codeWidth?: number;
}

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;
const PLAIN_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ACCOUNT_CODE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// Thrown by the coercers; the caller adds row context
class CoercionFailure extends Error {}

const pad2 = (n: number) => String(n).padStart(2, '0');

function isoFromParts(year: number, month: number, day: number): IsoDate | null {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

function coerceDate(value: unknown): IsoDate {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new CoercionFailure('invalid date');
    // Time of day is discarded; the calendar day is taken in UTC
    return `${String(value.getUTCFullYear()).padStart(4, '0')}-${pad2(value.getUTCMonth() + 1)}-${pad2(value.getUTCDate())}`;
  }

  if (typeof value === 'string') {
    const m = value.trim().match(ISO_DATE_PREFIX);
    if (!m) throw new CoercionFailure('expected a YYYY-MM-DD date');
    const iso = isoFromParts(Number(m[1]), Number(m[2]), Number(m[3]));
    if (!iso) throw new CoercionFailure('not a calendar day');
    return iso;
  }

  throw new CoercionFailure('expected a date or an ISO date string');
}

function coerceScenario(value: unknown): Scenario {
  if (typeof value !== 'string') throw new CoercionFailure('expected text');
  const scenario = value.trim().toUpperCase();
  const known = SCENARIOS.find((s) => s === scenario);
  if (!known) throw new CoercionFailure(`expected one of ${SCENARIOS.join(', ')}`);
  return known;
}

function coerceAccountCode(value: unknown, width: number): string {
  let code: string;
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0) throw new CoercionFailure('expected a non-negative integer');
    code = String(value);
  } else if (typeof value === 'string') {
    code = value.trim();
  } else {
    throw new CoercionFailure('expected text or an integer');
  }

  if (!code) throw new CoercionFailure('empty account code');
  if (!ACCOUNT_CODE.test(code)) throw new CoercionFailure('unexpected characters');
  if (code.length > width) throw new CoercionFailure(`longer than ${width} characters`);
  return code.padStart(width, '0');
}

function coerceAmount(value: unknown): Decimal {
  if (value instanceof Decimal) {
    if (!value.isFinite()) throw new CoercionFailure('not a finite number');
    return roundMoney(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new CoercionFailure('not a finite number');
    return roundMoney(value);
  }

  if (typeof value === 'string') {
    let text = value.trim();
    // Accounting negatives: (1,234.50)
    const parens = text.match(/^\((.*)\)$/);
    if (parens) text = `-${parens[1].trim()}`;
    text = text.replace(/,/g, '');
    if (!PLAIN_NUMBER.test(text)) throw new CoercionFailure('not numeric');
    return roundMoney(text);
  }

  throw new CoercionFailure('expected a number');
}

export function normalizeCodeWidth(width: number | undefined): number {
  const w = width ?? DEFAULT_CODE_WIDTH;
  if (!Number.isInteger(w) || w < 1) {
    throw new RangeError(`Account code width must be a positive integer, got ${w}`);
  }
  return w;
}

/**
 * Coerces a calendar entry with the same rule as fact dates.
 */
export function toIsoDate(value: unknown): IsoDate {
  try {
    return coerceDate(value);
  } catch (err) {
    if (err instanceof CoercionFailure) {
      throw new RangeError(`Invalid calendar date ${String(value)}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Pads an account code to the configured width. Used by the account chart so
 * configured codes and fact codes compare equal.
 */
export function padAccountCode(code: string, width: number): string {
  return code.trim().padStart(width, '0');
}

/**
 * Canonicalize raw P&L fact rows.
 * @throws MalformedRowError on the first field that cannot be coerced
 */
export function normalizeFactRows(rows: readonly RawFactRow[], options: NormalizeOptions = {}): FactRow[] {
  const width = normalizeCodeWidth(options.codeWidth);
  const out: FactRow[] = [];

  rows.forEach((row, index) => {
    const field = <T>(name: MalformedRowError['field'], value: unknown, coerce: (v: unknown) => T): T => {
      try {
        return coerce(value);
      } catch (err) {
        if (err instanceof CoercionFailure) throw new MalformedRowError(index, name, value, err.message);
        throw err;
      }
    };

    out.push({
      monthEndDate: field('month_end_date', row.month_end_date, coerceDate),
      scenario: field('scenario', row.scenario, coerceScenario),
      accountCode: field('account_code', row.account_code, (v) => coerceAccountCode(v, width)),
      amount: field('amount', row.amount, coerceAmount),
    });
  });

  logInfo('Normalizer', `Normalized ${out.length} fact rows (code width ${width})`);
  return out;
}
