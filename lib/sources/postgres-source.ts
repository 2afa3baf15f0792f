// lib/sources/postgres-source.ts
// Fact / calendar loader for a Postgres fact_pnl + dim_date schema

import { Pool } from 'pg';
import { z } from 'zod';
import { buildPoolConfig, loadConfig } from '../config';
import { SourceError } from '../errors';
import { logInfo } from '../log';
import type { RawFactRow } from '../reporting/types';
import type { FactSource } from './types';

/** The part of a pg Pool / Client the source needs. */
export interface QueryClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PostgresSourceOptions {
  factTable?: string;
  calendarTable?: string;
  /** Called from close(); set when the source owns the pool. */
  onClose?: () => Promise<void>;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

// Dates and numerics are cast to text so pg does not shift dates into the local timezone
// or round numerics through JS floats
const FactRowSchema = z.object({
  month_end_date: z.string().nullable(),
  scenario: z.string().nullable(),
  account_code: z.string().nullable(),
  amount: z.string().nullable(),
});

const CalendarRowSchema = z.object({
  month_end_date: z.string(),
});

function assertIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new SourceError('PostgresSource', `Invalid table name: ${name}`);
  }
  return name;
}

export class PostgresFactSource implements FactSource {
  readonly name = 'postgres';
  private factTable: string;
  private calendarTable: string;

  constructor(
    private client: QueryClient,
    private options: PostgresSourceOptions = {}
  ) {
    this.factTable = assertIdentifier(options.factTable ?? 'fact_pnl');
    this.calendarTable = assertIdentifier(options.calendarTable ?? 'dim_date');
  }

  async loadFacts(): Promise<RawFactRow[]> {
    const result = await this.client.query(
      `SELECT month_end_date::text AS month_end_date,
              scenario::text       AS scenario,
              account_code::text   AS account_code,
              amount::text         AS amount
         FROM ${this.factTable};`
    );

    const parsed = z.array(FactRowSchema).safeParse(result.rows);
    if (!parsed.success) {
      throw new SourceError('PostgresSource', `Unexpected row shape from ${this.factTable}: ${parsed.error.message}`);
    }

    logInfo('PostgresSource', `Loaded ${parsed.data.length} rows from ${this.factTable}`);
    return parsed.data;
  }

  async loadCalendar(): Promise<string[]> {
    const result = await this.client.query(
      `SELECT DISTINCT month_end_date::text AS month_end_date
         FROM ${this.calendarTable}
        ORDER BY 1;`
    );

    const parsed = z.array(CalendarRowSchema).safeParse(result.rows);
    if (!parsed.success) {
      throw new SourceError('PostgresSource', `Unexpected row shape from ${this.calendarTable}: ${parsed.error.message}`);
    }

    logInfo('PostgresSource', `Loaded ${parsed.data.length} calendar months from ${this.calendarTable}`);
    return parsed.data.map((r) => r.month_end_date);
  }

  async close(): Promise<void> {
    await this.options.onClose?.();
  }
}

/**
 * Source backed by a new pool built from the environment (DATABASE_URL or PG* vars).
 */
export function createPostgresFactSource(env: Record<string, string | undefined> = process.env): PostgresFactSource {
  const config = loadConfig(env);
  const pool = new Pool(buildPoolConfig(env));

  pool.on('error', (error: Error) => {
    console.error('[PostgresSource] Connection pool reported an error:', error);
  });

  return new PostgresFactSource(pool, {
    factTable: config.factTable,
    calendarTable: config.calendarTable,
    onClose: () => pool.end(),
  });
}
