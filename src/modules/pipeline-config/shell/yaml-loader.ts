import fs from 'node:fs/promises';

import { err, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { parsePipelineConfig } from '../core/parse-config.js';

import type { ConfigLoadError } from '../core/errors.js';
import type { PipelineConfig } from '../core/types.js';

/**
 * Reads and validates a pipeline configuration file.
 */
export const loadPipelineConfig = async (
  filePath: string
): Promise<Result<PipelineConfig, ConfigLoadError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Pipeline configuration not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read pipeline configuration at ${filePath}: ${(error as Error).message}`,
      path: filePath,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${filePath}: ${(error as Error).message}`,
      path: filePath,
    });
  }

  return parsePipelineConfig(parsed);
};
