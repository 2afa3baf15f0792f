// lib/config.ts
// Environment-driven configuration (read lazily so tests can override process.env)

import type { PoolConfig } from 'pg';

export type LogLevel = 'info' | 'silent';

export interface KpiPackConfig {
  factTable: string;
  calendarTable: string;
  accountChartPath?: string;
}

type Env = Record<string, string | undefined>;

export function getLogLevel(env: Env = process.env): LogLevel {
  return env.KPI_PACK_LOG_LEVEL?.trim().toLowerCase() === 'silent' ? 'silent' : 'info';
}

export function loadConfig(env: Env = process.env): KpiPackConfig {
  return {
    factTable: env.KPI_PACK_FACT_TABLE?.trim() || 'fact_pnl',
    calendarTable: env.KPI_PACK_CALENDAR_TABLE?.trim() || 'dim_date',
    accountChartPath: env.KPI_PACK_ACCOUNT_CHART?.trim() || undefined,
  };
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  const n = Number(value ?? fallback);
  return Number.isFinite(n) ? n : fallback;
}

// PGSSL=true / PGSSL=false force TLS on or off; unset keeps the branch default
function sslFromEnv(env: Env, enabledByDefault: boolean): PoolConfig['ssl'] {
  const flag = env.PGSSL?.trim().toLowerCase();
  const enabled = flag === 'true' ? true : flag === 'false' ? false : enabledByDefault;
  return enabled ? { rejectUnauthorized: false } : false;
}

export function buildPoolConfig(env: Env = process.env): PoolConfig {
  const connectionTimeoutMillis = numberFromEnv(env.PG_CONNECTION_TIMEOUT_MS, 8000);

  // Hosted connection strings default to TLS; discrete PG* settings default to plain
  if (env.DATABASE_URL) {
    return {
      connectionString: env.DATABASE_URL,
      ssl: sslFromEnv(env, true),
      connectionTimeoutMillis,
    };
  }

  return {
    host: env.PGHOST ?? 'localhost',
    port: numberFromEnv(env.PGPORT, 5432),
    user: env.PGUSER,
    password: env.PGPASSWORD,
    database: env.PGDATABASE,
    ssl: sslFromEnv(env, false),
    connectionTimeoutMillis,
  };
}
