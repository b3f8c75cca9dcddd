import { describeLocation, type AppError } from '../../../common/types/errors.js';

import type { RecordLocation } from '../../normalizer/index.js';

/**
 * A record points at an entity key that is not in the resolved tree.
 * Fatal: reconciling against a partial hierarchy would produce misleading totals.
 */
export interface UnresolvedEntityError extends AppError {
  readonly type: 'UnresolvedEntityError';
  readonly entityKey: string;
  readonly location: RecordLocation;
}

/**
 * Input that parses but cannot be reconciled as-is (e.g. a negative amount).
 */
export interface DataQualityError extends AppError {
  readonly type: 'DataQualityError';
  readonly location: RecordLocation;
  readonly value: string;
}

export type ReconciliationError = UnresolvedEntityError | DataQualityError;

export const createUnresolvedEntityError = (
  entityKey: string,
  location: RecordLocation
): UnresolvedEntityError => ({
  type: 'UnresolvedEntityError',
  message: `${describeLocation(location)} references unresolved entity '${entityKey}'`,
  entityKey,
  location,
});

export const createDataQualityError = (
  location: RecordLocation,
  problem: string,
  value: string
): DataQualityError => ({
  type: 'DataQualityError',
  message: `${describeLocation({ ...location, column: 'amount' })}: ${problem}`,
  location,
  value,
});
