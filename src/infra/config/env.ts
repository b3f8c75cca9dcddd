/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Pipeline locations
  PIPELINE_CONFIG_PATH: Type.String({ minLength: 1 }),
  INPUT_DIR: Type.Optional(Type.String({ minLength: 1 })),
  OUTPUT_DIR: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim() !== '' ? value.trim() : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const inputDir = nonEmpty(env['INPUT_DIR']);
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    PIPELINE_CONFIG_PATH: nonEmpty(env['PIPELINE_CONFIG_PATH']) ?? 'config/pipeline.yaml',
    ...(inputDir !== undefined && { INPUT_DIR: inputDir }),
    OUTPUT_DIR: nonEmpty(env['OUTPUT_DIR']) ?? 'data/output',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment.
 * Relative paths resolve against `cwd`.
 */
export const createConfig = (env: Env, cwd: string = process.cwd()) => {
  const configPath = path.resolve(cwd, env.PIPELINE_CONFIG_PATH);

  return {
    runtime: {
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
    logger: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV !== 'production',
    },
    pipeline: {
      configPath,
      /** Base directory that source `file` entries are relative to */
      inputDir:
        env.INPUT_DIR !== undefined ? path.resolve(cwd, env.INPUT_DIR) : path.dirname(configPath),
      outputDir: path.resolve(cwd, env.OUTPUT_DIR),
    },
  };
};

export type AppConfig = ReturnType<typeof createConfig>;
