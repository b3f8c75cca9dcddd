import type { AppError } from '../../../common/types/errors.js';
import type { QualityCheckResult } from './types.js';

export interface QualityCheckError extends AppError {
  readonly type: 'QualityCheckError';
  readonly failures: readonly QualityCheckResult[];
}

export const createQualityCheckError = (
  failures: readonly QualityCheckResult[]
): QualityCheckError => ({
  type: 'QualityCheckError',
  message: `Quality checks failed: ${failures.map((failure) => `${failure.name} (${failure.message})`).join('; ')}`,
  failures,
});
