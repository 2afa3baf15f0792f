export {
  ACCOUNT_CLASSES,
  AccountChartSchema,
  chartFromMapping,
  defaultAccountChart,
  loadAccountChart,
  parseAccountChart,
} from './account-chart';
export type {
  AccountChart,
  AccountChartInput,
  AccountClass,
  AccountDefinition,
  AccountRange,
} from './account-chart';
export { createAccountClassifier } from './classifier';
export type { AccountClassifier } from './classifier';
