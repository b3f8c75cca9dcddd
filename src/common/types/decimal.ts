import { Decimal } from 'decimal.js';

/**
 * Currency amounts are exact decimals. Absent values are `null`, never zero.
 */
export type Amount = Decimal;

export const ZERO = new Decimal(0);

/**
 * Adds two optional amounts. The result is absent only when both inputs are.
 */
export const addOptional = (a: Decimal | null, b: Decimal | null): Decimal | null => {
  if (a === null) return b;
  if (b === null) return a;
  return a.plus(b);
};

/**
 * Fixed two-place rendering used in every published table.
 */
export const formatAmount = (value: Decimal | null): string | null =>
  value === null ? null : value.toFixed(2);
