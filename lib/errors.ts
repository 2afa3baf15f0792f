// lib/errors.ts
// Error taxonomy for the KPI pack

export class KpiPackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KpiPackError';
  }
}

export type FactField = 'month_end_date' | 'scenario' | 'account_code' | 'amount';

/**
 * A raw fact row has a field that cannot be coerced. The whole batch is rejected.
 */
export class MalformedRowError extends KpiPackError {
  constructor(
    public rowIndex: number,
    public field: FactField,
    public value: unknown,
    reason: string
  ) {
    super(`Row ${rowIndex}: invalid ${field} (${describeValue(value)}): ${reason}`);
    this.name = 'MalformedRowError';
  }
}

export class UnclassifiedAccountError extends KpiPackError {
  constructor(public accountCodes: string[]) {
    super(`Accounts not in the account chart: ${accountCodes.join(', ')}`);
    this.name = 'UnclassifiedAccountError';
  }
}

export class InvalidAccountChartError extends KpiPackError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidAccountChartError';
  }
}

export class SourceError extends KpiPackError {
  constructor(
    public source: string,
    message: string
  ) {
    super(`[${source}] ${message}`);
    this.name = 'SourceError';
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}
