export { reconcile } from './core/reconcile.js';
export { classifyVariance, type VarianceResult } from './core/classify.js';
export { findRollupMismatches } from './core/rollup.js';

export { CLASSIFICATIONS } from './core/types.js';
export type {
  Classification,
  ReconciledFact,
  ReconciliationStats,
  ReconciliationOutput,
} from './core/types.js';

export { createUnresolvedEntityError, createDataQualityError } from './core/errors.js';
export type {
  UnresolvedEntityError,
  DataQualityError,
  ReconciliationError,
} from './core/errors.js';
