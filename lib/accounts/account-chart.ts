// lib/accounts/account-chart.ts
// Account classification configuration (which codes roll into Revenue / COGS / OPEX)

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import defaultChartJson from '../../config/account-chart.json';
import { InvalidAccountChartError } from '../errors';
import { DEFAULT_CODE_WIDTH } from '../reporting/normalizer';

export const ACCOUNT_CLASSES = ['REVENUE', 'COGS', 'OPEX', 'OTHER'] as const;

const AccountClassSchema = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toUpperCase() : v),
  z.enum(ACCOUNT_CLASSES)
);

const AccountCodeSchema = z.string().trim().min(1).regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'invalid account code');

export const AccountChartSchema = z
  .object({
    codeWidth: z.number().int().min(1).max(32).default(DEFAULT_CODE_WIDTH),
    accounts: z
      .array(
        z.object({
          code: AccountCodeSchema,
          name: z.string().optional(),
          class: AccountClassSchema,
        })
      )
      .default([]),
    ranges: z
      .array(
        z.object({
          from: AccountCodeSchema,
          to: AccountCodeSchema,
          class: AccountClassSchema,
        })
      )
      .default([]),
  })
  .superRefine((chart, ctx) => {
    const seen = new Set<string>();
    chart.accounts.forEach((account, i) => {
      if (account.code.length > chart.codeWidth) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['accounts', i, 'code'],
          message: `code ${account.code} is longer than codeWidth ${chart.codeWidth}`,
        });
      }
      const key = account.code.padStart(chart.codeWidth, '0');
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['accounts', i, 'code'],
          message: `code ${account.code} is listed twice`,
        });
      }
      seen.add(key);
    });

    chart.ranges.forEach((range, i) => {
      const from = range.from.padStart(chart.codeWidth, '0');
      const to = range.to.padStart(chart.codeWidth, '0');
      if (range.from.length > chart.codeWidth || range.to.length > chart.codeWidth) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ranges', i],
          message: `range ${range.from}-${range.to} is wider than codeWidth ${chart.codeWidth}`,
        });
      } else if (from > to) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ranges', i],
          message: `range ${range.from}-${range.to} is reversed`,
        });
      }
    });
  });

export type AccountClass = (typeof ACCOUNT_CLASSES)[number];
export type AccountChart = z.infer<typeof AccountChartSchema>;
export type AccountChartInput = z.input<typeof AccountChartSchema>;
export type AccountDefinition = AccountChart['accounts'][number];
export type AccountRange = AccountChart['ranges'][number];

/**
 * Validate an account chart, e.g. one read from JSON.
 */
export function parseAccountChart(input: unknown): AccountChart {
  const result = AccountChartSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InvalidAccountChartError('Invalid account chart', issues);
  }
  return result.data;
}

/**
 * Build a chart from a flat `{ code: class }` mapping.
 */
export function chartFromMapping(
  mapping: Record<string, string>,
  codeWidth: number = DEFAULT_CODE_WIDTH
): AccountChart {
  return parseAccountChart({
    codeWidth,
    accounts: Object.entries(mapping).map(([code, cls]) => ({ code, class: cls })),
  });
}

export function defaultAccountChart(): AccountChart {
  return parseAccountChart(defaultChartJson);
}

/**
 * Load a chart from a JSON file, or the bundled default chart when no path is given.
 */
export async function loadAccountChart(path?: string): Promise<AccountChart> {
  if (!path) return defaultAccountChart();

  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidAccountChartError(`Cannot read account chart ${path}`, [reason]);
  }
  return parseAccountChart(json);
}
