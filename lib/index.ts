export * from './reporting';
export * from './accounts';
export * from './quality';
export * from './errors';
export { runKpiPack } from './kpi-pack';
export type { KpiPackOptions, KpiPackResult } from './kpi-pack';
export * from './sources';
export * from './export';
