// lib/accounts/classifier.ts

import { padAccountCode } from '../reporting/normalizer';
import type { AccountChart, AccountClass } from './account-chart';

export interface AccountClassifier {
  readonly codeWidth: number;
  /** Class of a normalized account code, or null when the chart does not know it. */
  classify(accountCode: string): AccountClass | null;
}

/**
 * Exact codes take precedence over ranges; among ranges the first match wins.
 * Codes are compared after padding to the chart's width, so digit codes order numerically.
 */
export function createAccountClassifier(chart: AccountChart): AccountClassifier {
  const width = chart.codeWidth;
  const exact = new Map<string, AccountClass>();
  for (const account of chart.accounts) {
    exact.set(padAccountCode(account.code, width), account.class);
  }

  const ranges = chart.ranges.map((r) => ({
    from: padAccountCode(r.from, width),
    to: padAccountCode(r.to, width),
    cls: r.class,
  }));

  return {
    codeWidth: width,
    classify(accountCode: string): AccountClass | null {
      const code = padAccountCode(accountCode, width);
      const hit = exact.get(code);
      if (hit) return hit;
      const range = ranges.find((r) => code >= r.from && code <= r.to);
      return range ? range.cls : null;
    },
  };
}
