import type { WriteError } from './errors.js';
import type { ArtifactFile, PublishSummary } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Replaces the published output set as a whole: either every file is
 * replaced or none is.
 */
export interface ArtifactStore {
  publish(files: readonly ArtifactFile[]): Promise<Result<PublishSummary, WriteError>>;
}
