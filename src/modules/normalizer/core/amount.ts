import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

export type AmountParseFailure = 'blank' | 'invalid';

const CURRENCY_SYMBOLS = /[$€£¥]/g;
const GROUPED_NUMBER = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$/;
const FRACTION_ONLY = /^\.\d+$/;

/**
 * Parses a currency cell such as `$1,250.00`, `(300)` or `-€12.5`.
 * Parentheses and a leading minus both mean negative.
 */
export const parseAmount = (raw: string): Result<Decimal, AmountParseFailure> => {
  let text = raw.replace(CURRENCY_SYMBOLS, '').trim();
  if (text === '') {
    return err('blank');
  }

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1).trim();
  }
  if (text.startsWith('-')) {
    if (negative) return err('invalid');
    negative = true;
    text = text.slice(1).trim();
  }

  if (!GROUPED_NUMBER.test(text) && !FRACTION_ONLY.test(text)) {
    return err('invalid');
  }

  const value = new Decimal(text.replace(/,/g, ''));
  return ok(negative ? value.negated() : value);
};
