import type { ConfigurationError } from '../../../common/types/errors.js';
import type { WriteError } from '../../artifacts/index.js';
import type { ExtractReadError, NormalizeError } from '../../normalizer/index.js';
import type { QualityCheckError } from '../../quality-checks/index.js';
import type { ReconciliationError } from '../../reconciliation/index.js';

/**
 * Any fatal error of a run. Each one stops the run before publishing.
 */
export type PipelineError =
  | ExtractReadError
  | NormalizeError
  | ReconciliationError
  | ConfigurationError
  | QualityCheckError
  | WriteError;
