import { err, ok, type Result } from 'neverthrow';

import { CANONICAL_FIELDS } from '../../pipeline-config/index.js';
import { createSchemaError, type SchemaError } from './errors.js';

import type { CanonicalField, SourceConfig } from '../../pipeline-config/index.js';
import type { RawExtract } from './types.js';

/**
 * Where each canonical field's value comes from for one extract.
 */
export type FieldBinding =
  | { kind: 'column'; index: number; column: string }
  | { kind: 'constant'; value: string };

export interface ColumnPlan {
  bindings: ReadonlyMap<CanonicalField, FieldBinding>;
  unmatchedColumns: string[];
}

/**
 * Each entry is satisfied when any one of its alternatives is bound.
 */
const REQUIRED_FIELDS: readonly (readonly CanonicalField[])[] = [
  ['fiscal_year'],
  ['account_category'],
  ['amount_type'],
  ['amount'],
  ['department_code', 'department_name'],
  ['line_item_code', 'line_item_name'],
];

const CANONICAL_FIELD_SET = new Set<string>(CANONICAL_FIELDS);

const isCanonicalField = (value: string): value is CanonicalField => CANONICAL_FIELD_SET.has(value);

const normalizeHeader = (value: string): string => value.trim().toLowerCase();

/**
 * Binds canonical fields to header positions or constants.
 * Fails with a SchemaError listing every required field that cannot be bound.
 */
export const planColumns = (
  extract: RawExtract,
  source: SourceConfig
): Result<ColumnPlan, SchemaError> => {
  const headerIndex = new Map<string, number>();
  extract.header.forEach((column, index) => {
    const key = normalizeHeader(column);
    if (!headerIndex.has(key)) {
      headerIndex.set(key, index);
    }
  });

  const bindings = new Map<CanonicalField, FieldBinding>();
  const unmatchedColumns: string[] = [];

  for (const [rawColumn, field] of Object.entries(source.columns)) {
    const index = headerIndex.get(normalizeHeader(rawColumn));
    if (index === undefined) {
      unmatchedColumns.push(rawColumn);
      continue;
    }
    bindings.set(field, { kind: 'column', index, column: rawColumn });
  }

  for (const [field, value] of Object.entries(source.constants ?? {})) {
    if (isCanonicalField(field)) {
      bindings.set(field, { kind: 'constant', value });
    }
  }

  const missing = REQUIRED_FIELDS.filter((alternatives) =>
    alternatives.every((field) => !bindings.has(field))
  ).map((alternatives) => alternatives.join(' or '));

  if (missing.length > 0) {
    return err(createSchemaError(extract.sourceId, extract.file, missing));
  }

  return ok({ bindings, unmatchedColumns });
};
