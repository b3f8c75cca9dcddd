import type { AppError } from '../../../common/types/errors.js';

export interface WriteError extends AppError {
  readonly type: 'WriteError';
  readonly path: string;
}

export const createWriteError = (path: string, message: string, cause?: unknown): WriteError => ({
  type: 'WriteError',
  message,
  path,
  ...(cause !== undefined && { cause }),
});
