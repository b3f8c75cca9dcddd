// Core
export { normalizeExtract } from './core/normalize-extract.js';
export { mergeExtracts } from './core/merge-extracts.js';
export { planColumns, type ColumnPlan, type FieldBinding } from './core/column-mapping.js';
export { parseAmount, type AmountParseFailure } from './core/amount.js';
export { parseFiscalYear } from './core/fiscal-year.js';
export { mapAccountCategory, mapAmountType } from './core/value-maps.js';
export type { ExtractReader } from './core/ports.js';

// Shell
export { createCsvExtractReader, type CsvExtractReaderOptions } from './shell/csv-extract-reader.js';

// Types
export type {
  RawExtract,
  EntityLabel,
  RecordLocation,
  FiscalRecord,
  NormalizedExtract,
} from './core/types.js';

// Errors
export { createSchemaError, createFormatError } from './core/errors.js';
export type {
  SchemaError,
  FormatError,
  ReadError,
  NormalizeError,
  ExtractReadError,
} from './core/errors.js';
