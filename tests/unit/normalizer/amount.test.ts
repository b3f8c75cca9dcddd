import { describe, expect, it } from 'vitest';

import { parseAmount } from '@/modules/normalizer/index.js';

describe('parseAmount', () => {
  it.each([
    ['1250', '1250'],
    ['$1,250.00', '1250'],
    ['  €12.5 ', '12.5'],
    ['£1,234,567.89', '1234567.89'],
    ['.75', '0.75'],
    ['(300)', '-300'],
    ['($1,000.50)', '-1000.5'],
    ['-¥42', '-42'],
    ['$-42', '-42'],
  ])('parses %s', (raw, expected) => {
    expect(parseAmount(raw)._unsafeUnwrap().toString()).toBe(expected);
  });

  it('keeps exact decimal precision', () => {
    const sum = parseAmount('0.1')._unsafeUnwrap().plus(parseAmount('0.2')._unsafeUnwrap());

    expect(sum.toString()).toBe('0.3');
  });

  it.each(['', '   ', '$'])('reports %j as blank', (raw) => {
    expect(parseAmount(raw)._unsafeUnwrapErr()).toBe('blank');
  });

  it.each(['abc', '1,2,3', '12,34', '1.2.3', '-(5)', '(-5)', '1 000', 'N/A'])(
    'rejects %s',
    (raw) => {
      expect(parseAmount(raw)._unsafeUnwrapErr()).toBe('invalid');
    }
  );
});
