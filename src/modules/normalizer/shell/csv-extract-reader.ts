import fs from 'node:fs/promises';
import path from 'node:path';

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { createFormatError, type ExtractReadError } from '../core/errors.js';

import type { SourceConfig } from '../../pipeline-config/index.js';
import type { ExtractReader } from '../core/ports.js';
import type { RawExtract } from '../core/types.js';

export interface CsvExtractReaderOptions {
  /** Directory that source `file` entries are relative to */
  inputDir: string;
}

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));

/** csv-parse reports the 1-based physical line; the header is line 1 */
const dataRowFromParserError = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && 'lines' in error) {
    const { lines } = error;
    if (typeof lines === 'number' && lines > 1) {
      return lines - 1;
    }
  }
  return undefined;
};

export const createCsvExtractReader = (options: CsvExtractReaderOptions): ExtractReader => ({
  async read(source: SourceConfig): Promise<Result<RawExtract, ExtractReadError>> {
    const filePath = path.resolve(options.inputDir, source.file);
    let contents: string;

    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      return err({
        type: 'ReadError',
        message:
          code === 'ENOENT'
            ? `Extract for source '${source.id}' not found at ${filePath}`
            : `Failed to read extract for source '${source.id}' at ${filePath}: ${(error as Error).message}`,
        sourceId: source.id,
        file: source.file,
      });
    }

    let parsed: unknown;
    try {
      parsed = parse(contents, {
        delimiter: source.delimiter,
        bom: true,
        skip_empty_lines: true,
      });
    } catch (error) {
      const row = dataRowFromParserError(error);
      return err(
        createFormatError(
          {
            sourceId: source.id,
            file: source.file,
            ...(row !== undefined && { row }),
          },
          `malformed delimited text: ${(error as Error).message}`
        )
      );
    }

    if (!isStringMatrix(parsed)) {
      return err(
        createFormatError(
          { sourceId: source.id, file: source.file },
          'parser returned rows that are not text'
        )
      );
    }

    const [header = [], ...rows] = parsed;
    return ok({ sourceId: source.id, file: source.file, header, rows });
  },
});
