import { Decimal } from 'decimal.js';

export { Decimal };

/** Fractional digits carried by every monetary amount. */
export const MONEY_SCALE = 2;

export const ZERO = new Decimal(0);

/**
 * Safely converts input to Decimal.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  if (value instanceof Decimal) return value;
  return new Decimal(value);
}

/**
 * Rounds to the money scale with round-half-even.
 */
export function roundMoney(value: Decimal.Value): Decimal {
  return toDecimal(value).toDecimalPlaces(MONEY_SCALE, Decimal.ROUND_HALF_EVEN);
}

/**
 * Null-propagating arithmetic for pivoted KPI values
 */
export const FinMath = {
  sub: (a: Decimal | null, b: Decimal | null): Decimal | null => (a === null || b === null ? null : a.minus(b)),

  // Ratio is undefined for a missing or zero denominator
  ratio: (num: Decimal | null, den: Decimal | null): Decimal | null =>
    num === null || den === null || den.isZero() ? null : num.dividedBy(den),
};

export function formatAmount(value: Decimal | null): string {
  return value === null ? '' : value.toFixed(MONEY_SCALE);
}

export function formatRatio(value: Decimal | null, digits = 6): string {
  return value === null ? '' : value.toFixed(digits);
}
