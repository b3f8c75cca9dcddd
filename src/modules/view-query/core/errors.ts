import type { ValueError } from '@sinclair/typebox/errors';

export type ViewRepoError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'InvalidTable'; message: string };

export type ViewQueryError = { type: 'UnknownColumn'; message: string; column: string };

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

export const unknownColumn = (table: string, column: string): ViewQueryError => ({
  type: 'UnknownColumn',
  message: `View '${table}' has no column '${column}'`,
  column,
});
