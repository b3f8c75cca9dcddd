import type { ConfigurationError } from '../../../common/types/errors.js';
import type { ValueError } from '@sinclair/typebox/errors';

export type ConfigLoadError =
  | { type: 'NotFound'; message: string; path: string }
  | { type: 'ReadError'; message: string; path: string }
  | { type: 'ParseError'; message: string; path: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | ConfigurationError;

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
