import type { SourceConfig } from '../../pipeline-config/index.js';
import type { ExtractReadError } from './errors.js';
import type { RawExtract } from './types.js';
import type { Result } from 'neverthrow';

export interface ExtractReader {
  /**
   * Load the raw rows of one configured source.
   */
  read(source: SourceConfig): Promise<Result<RawExtract, ExtractReadError>>;
}
