import type { AccountCategory, EntityKind } from '../../pipeline-config/index.js';
import type { Decimal } from 'decimal.js';

export const CLASSIFICATIONS = [
  'on_target',
  'overspend',
  'underspend',
  'missing_actual',
  'missing_budget',
] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

/**
 * Budget vs actual for one (fiscal year, entity, category).
 * A side without any input is `null` (absent), which is not the same as zero.
 */
export interface ReconciledFact {
  fiscalYear: number;
  entityKey: string;
  entityKind: EntityKind;
  category: AccountCategory;
  budgeted: Decimal | null;
  actual: Decimal | null;
  /** actual − budgeted; null unless both sides are present */
  variance: Decimal | null;
  /** variance as a percentage of budgeted; null when budgeted is absent or zero */
  variancePct: Decimal | null;
  classification: Classification;
  /** true for roll-ups summed from child facts */
  derived: boolean;
  recordCount: number;
}

export interface ReconciliationStats {
  recordsIn: number;
  recordsUsed: number;
  /** Budgeted records dropped because their budget cycle is not accepted */
  excludedBudgetRecords: number;
  /** Accepted budget cycles seen per fiscal year */
  budgetCyclesByYear: Record<string, string[]>;
  leafFacts: number;
  rollupFacts: number;
}

export interface ReconciliationOutput {
  facts: ReconciledFact[];
  stats: ReconciliationStats;
}
