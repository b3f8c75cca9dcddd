/**
 * Base error types for the engine.
 * Every module error is a plain object with a `type` discriminant and extends AppError.
 */

export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Where in the raw input an error or a record comes from.
 */
export interface SourceLocation {
  readonly sourceId: string;
  readonly file: string;
  /** 1-based data row, header excluded */
  readonly row?: number | undefined;
  readonly column?: string | undefined;
}

/**
 * Configuration that is well-formed but semantically unusable
 * (duplicate ids, a view that cannot honour its row bound, ...).
 */
export interface ConfigurationError extends AppError {
  readonly type: 'ConfigurationError';
  readonly subject: string;
  readonly details?: readonly string[] | undefined;
}

export const createConfigurationError = (
  subject: string,
  message: string,
  details?: readonly string[]
): ConfigurationError => ({
  type: 'ConfigurationError',
  message,
  subject,
  ...(details !== undefined && { details }),
});

export const describeLocation = (location: SourceLocation): string => {
  const parts = [`source '${location.sourceId}' (${location.file})`];
  if (location.row !== undefined) {
    parts.push(`row ${String(location.row)}`);
  }
  if (location.column !== undefined) {
    parts.push(`column '${location.column}'`);
  }
  return parts.join(', ');
};
