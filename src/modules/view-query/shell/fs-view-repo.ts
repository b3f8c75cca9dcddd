import fs from 'node:fs/promises';
import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { TableSchema, VIEWS_DIR, type Table } from '../../artifacts/index.js';
import { formatSchemaErrors, type ViewRepoError } from '../core/errors.js';

const validator = TypeCompiler.Compile(TableSchema);

const VIEW_NAME = /^[a-z][a-z0-9_]*$/;

export interface ViewRepoOptions {
  /** Output directory of a pipeline run */
  rootDir: string;
  cacheMax?: number;
}

export interface ViewRepo {
  getByName(name: string): Promise<Result<Table, ViewRepoError>>;
  listAvailable(): Promise<Result<string[], ViewRepoError>>;
}

interface CachedView {
  mtimeMs: number;
  table: Table;
}

const checkShape = (table: Table): string | null => {
  const seen = new Set<string>();
  for (const column of table.columns) {
    if (seen.has(column.name)) return `duplicate column '${column.name}'`;
    seen.add(column.name);
    if (column.values.length !== table.rowCount) {
      return `column '${column.name}' has ${String(column.values.length)} values, expected ${String(table.rowCount)}`;
    }
  }
  return null;
};

const readViewFile = async (filePath: string): Promise<Result<Table, ViewRepoError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({ type: 'NotFound', message: `View file not found at ${filePath}` });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read view file at ${filePath}: ${(error as Error).message}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${filePath}: ${(error as Error).message}`,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  const problem = checkShape(parsed);
  if (problem !== null) {
    return err({ type: 'InvalidTable', message: `${filePath}: ${problem}` });
  }

  return ok(parsed);
};

/**
 * Loads published views by name. A cached table is reused until its file changes.
 */
export const createViewRepo = (options: ViewRepoOptions): ViewRepo => {
  const viewsDir = path.join(options.rootDir, VIEWS_DIR);
  const cacheMax = options.cacheMax ?? 50;
  const cache = new Map<string, CachedView>();

  return {
    async getByName(name: string): Promise<Result<Table, ViewRepoError>> {
      if (!VIEW_NAME.test(name)) {
        return err({ type: 'NotFound', message: `'${name}' is not a view name` });
      }

      const filePath = path.join(viewsDir, `${name}.json`);

      let mtimeMs: number;
      try {
        mtimeMs = (await fs.stat(filePath)).mtimeMs;
      } catch (error) {
        const code = (error as NodeJS.ErrnoException).code;
        if (code === 'ENOENT') {
          return err({ type: 'NotFound', message: `View '${name}' not found under ${viewsDir}` });
        }
        return err({
          type: 'ReadError',
          message: `Failed to stat ${filePath}: ${(error as Error).message}`,
        });
      }

      const cached = cache.get(name);
      if (cached?.mtimeMs === mtimeMs) {
        return ok(cached.table);
      }

      const result = await readViewFile(filePath);
      if (result.isErr()) {
        return err(result.error);
      }

      cache.delete(name);
      if (cache.size >= cacheMax) {
        const oldest = cache.keys().next().value;
        if (oldest !== undefined) cache.delete(oldest);
      }
      cache.set(name, { mtimeMs, table: result.value });

      return ok(result.value);
    },

    async listAvailable(): Promise<Result<string[], ViewRepoError>> {
      try {
        const names = await fs.readdir(viewsDir);
        return ok(
          names
            .filter((file) => file.endsWith('.json'))
            .map((file) => file.slice(0, -'.json'.length))
            .sort()
        );
      } catch (error) {
        const code = (error as NodeJS.ErrnoException).code;
        if (code === 'ENOENT') {
          return err({ type: 'NotFound', message: `Views directory not found at ${viewsDir}` });
        }
        return err({
          type: 'ReadError',
          message: `Failed to list views under ${viewsDir}: ${(error as Error).message}`,
        });
      }
    },
  };
};
