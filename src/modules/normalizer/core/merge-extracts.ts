import type { FiscalRecord, NormalizedExtract } from './types.js';

/**
 * Deterministic merge of independently normalized extracts:
 * fiscal year ascending, then source declaration order, then row order.
 * The order extracts arrive in does not matter.
 */
export const mergeExtracts = (extracts: readonly NormalizedExtract[]): FiscalRecord[] => {
  const ordered = [...extracts].sort((a, b) => a.sourceIndex - b.sourceIndex);
  const merged = ordered.flatMap((extract) => extract.records);

  // Array.prototype.sort is stable, so source and row order survive within a year
  return merged.sort((a, b) => a.fiscalYear - b.fiscalYear);
};
