import type { AggregateView } from '../../aggregation/index.js';
import type { Entity } from '../../hierarchy/index.js';
import type { ReconciledFact, ReconciliationStats } from '../../reconciliation/index.js';

export const QUALITY_CHECK_NAMES = [
  'entity_tree',
  'rollup_invariant',
  'view_row_bounds',
  'fiscal_year_range',
  'missing_actual_rate',
  'budget_cycle_duplication',
] as const;

export type QualityCheckName = (typeof QUALITY_CHECK_NAMES)[number];

export type QualityCheckStatus = 'pass' | 'warn' | 'fail';

export interface QualityCheckResult {
  name: QualityCheckName;
  status: QualityCheckStatus;
  message: string;
  details: string[];
}

/**
 * Everything a run has computed before publishing.
 */
export interface QualityCheckInput {
  entities: readonly Entity[];
  facts: readonly ReconciledFact[];
  views: readonly AggregateView[];
  stats: ReconciliationStats;
}
