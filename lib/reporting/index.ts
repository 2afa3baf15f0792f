// lib/reporting/index.ts
// KPI Pack - Module Exports

export * from './types';
export * from './normalizer';
export * from './fact-view';
export * from './calendar';
export * from './aggregator';
export * from './variance-reporter';
