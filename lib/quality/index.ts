export { findDuplicateKeys } from './duplicate-detector';
export { findCoverageGaps } from './coverage-analyzer';
export { runQualityChecks } from './quality-monitor';
export type { QualityReport } from './quality-monitor';
