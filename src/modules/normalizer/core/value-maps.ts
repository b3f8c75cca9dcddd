import type { AccountCategory, AmountType, SourceConfig } from '../../pipeline-config/index.js';

const CATEGORY_SYNONYMS: Readonly<Record<string, AccountCategory>> = {
  revenue: 'revenue',
  revenues: 'revenue',
  rev: 'revenue',
  income: 'revenue',
  receipts: 'revenue',
  expenditure: 'expenditure',
  expenditures: 'expenditure',
  expense: 'expenditure',
  expenses: 'expenditure',
  exp: 'expenditure',
  spending: 'expenditure',
};

const AMOUNT_TYPE_SYNONYMS: Readonly<Record<string, AmountType>> = {
  budget: 'budgeted',
  budgeted: 'budgeted',
  adopted: 'budgeted',
  appropriation: 'budgeted',
  appropriated: 'budgeted',
  actual: 'actual',
  actuals: 'actual',
  expended: 'actual',
  realized: 'actual',
};

const lookup = <T extends string>(
  table: Readonly<Record<string, T>> | undefined,
  raw: string
): T | undefined => {
  if (table === undefined) return undefined;
  const key = raw.trim().toLowerCase();
  for (const [candidate, value] of Object.entries(table)) {
    if (candidate.trim().toLowerCase() === key) {
      return value;
    }
  }
  return undefined;
};

/**
 * Source-specific value maps take precedence over the built-in synonyms.
 */
export const mapAccountCategory = (
  raw: string,
  source: SourceConfig
): AccountCategory | undefined =>
  lookup(source.valueMaps?.account_category, raw) ?? lookup(CATEGORY_SYNONYMS, raw);

export const mapAmountType = (raw: string, source: SourceConfig): AmountType | undefined =>
  lookup(source.valueMaps?.amount_type, raw) ?? lookup(AMOUNT_TYPE_SYNONYMS, raw);
