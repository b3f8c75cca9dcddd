export { runQualityChecks, assertQualityChecks, VIEW_ROW_CEILING } from './core/run-checks.js';
export { createQualityCheckError, type QualityCheckError } from './core/errors.js';
export { QUALITY_CHECK_NAMES } from './core/types.js';
export type {
  QualityCheckName,
  QualityCheckStatus,
  QualityCheckResult,
  QualityCheckInput,
} from './core/types.js';
