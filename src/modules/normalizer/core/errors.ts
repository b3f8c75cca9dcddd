import { describeLocation, type AppError } from '../../../common/types/errors.js';

/**
 * A required canonical field cannot be mapped from the extract's header.
 * Fatal for the whole run.
 */
export interface SchemaError extends AppError {
  readonly type: 'SchemaError';
  readonly sourceId: string;
  readonly file: string;
  readonly missingFields: readonly string[];
}

/**
 * A cell that cannot be parsed. Fatal for the whole run.
 */
export interface FormatError extends AppError {
  readonly type: 'FormatError';
  readonly sourceId: string;
  readonly file: string;
  readonly row: number | undefined;
  readonly column: string | undefined;
  readonly value: string | undefined;
}

export interface ReadError extends AppError {
  readonly type: 'ReadError';
  readonly sourceId: string;
  readonly file: string;
}

export type NormalizeError = SchemaError | FormatError;

export type ExtractReadError = ReadError | FormatError;

export const createSchemaError = (
  sourceId: string,
  file: string,
  missingFields: readonly string[]
): SchemaError => ({
  type: 'SchemaError',
  message: `${describeLocation({ sourceId, file })} is missing required column(s): ${missingFields.join(', ')}`,
  sourceId,
  file,
  missingFields,
});

export const createFormatError = (
  location: { sourceId: string; file: string; row?: number; column?: string },
  problem: string,
  value?: string
): FormatError => ({
  type: 'FormatError',
  message: `${describeLocation(location)}: ${problem}`,
  sourceId: location.sourceId,
  file: location.file,
  row: location.row,
  column: location.column,
  value,
});
