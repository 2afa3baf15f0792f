export type { FactSource } from './types';
export { PostgresFactSource, createPostgresFactSource } from './postgres-source';
export type { PostgresSourceOptions, QueryClient } from './postgres-source';
export { WorkbookFactSource } from './workbook-source';
export type { WorkbookSourceOptions } from './workbook-source';
