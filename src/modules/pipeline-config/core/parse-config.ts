import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  createConfigurationError,
  type ConfigurationError,
} from '../../../common/types/errors.js';
import { formatSchemaErrors, type ConfigLoadError } from './errors.js';
import {
  HIERARCHY_DEFAULTS,
  PipelineConfigSchema,
  QUALITY_CHECK_DEFAULTS,
  RECONCILIATION_DEFAULTS,
  isEntityDimension,
  type PipelineConfig,
  type PipelineConfigDTO,
  type SourceConfig,
  type ViewDefinition,
} from './types.js';

const validator = TypeCompiler.Compile(PipelineConfigSchema);

/** Columns a view row can be sorted by: its dimensions (and their names) plus its measures */
export const sortableFields = (view: ViewDefinition): Set<string> => {
  const fields = new Set<string>(view.measures);
  for (const dimension of view.dimensions) {
    fields.add(dimension);
    if (isEntityDimension(dimension)) {
      fields.add(`${dimension}_name`);
    }
  }
  return fields;
};

const findDuplicates = (values: readonly string[]): string[] => {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates].sort();
};

/** Per-row fields (line item, amount) cannot be constants */
const VALID_CONSTANT_FIELDS = new Set<string>([
  'fiscal_year',
  'fund_code',
  'fund_name',
  'department_code',
  'department_name',
  'program_code',
  'program_name',
  'account_category',
  'amount_type',
  'budget_cycle',
  'service_area',
  'district',
]);

const validateSource = (source: SourceConfig): string[] => {
  const problems: string[] = [];
  const targets = new Map<string, string>();

  for (const [rawColumn, field] of Object.entries(source.columns)) {
    const previous = targets.get(field);
    if (previous !== undefined) {
      problems.push(
        `source '${source.id}': columns '${previous}' and '${rawColumn}' both map to '${field}'`
      );
    }
    targets.set(field, rawColumn);
  }

  const lowered = Object.keys(source.columns).map((column) => column.trim().toLowerCase());
  for (const duplicate of findDuplicates(lowered)) {
    problems.push(`source '${source.id}': column '${duplicate}' is mapped more than once`);
  }

  for (const field of Object.keys(source.constants ?? {})) {
    if (!VALID_CONSTANT_FIELDS.has(field)) {
      problems.push(`source '${source.id}': constant '${field}' cannot be set per source`);
    } else if (targets.has(field)) {
      problems.push(`source '${source.id}': '${field}' is both a column and a constant`);
    }
  }

  return problems;
};

const validateView = (view: ViewDefinition): string[] => {
  const problems: string[] = [];
  const fields = sortableFields(view);

  for (const duplicate of findDuplicates(view.dimensions)) {
    problems.push(`view '${view.name}': dimension '${duplicate}' is listed twice`);
  }
  for (const duplicate of findDuplicates(view.measures)) {
    problems.push(`view '${view.name}': measure '${duplicate}' is listed twice`);
  }
  for (const key of view.sort) {
    if (!fields.has(key.field)) {
      problems.push(`view '${view.name}': sort field '${key.field}' is not a dimension or measure`);
    }
  }

  const range = view.filter?.fiscalYear;
  if (range?.from !== undefined && range.to !== undefined && range.from > range.to) {
    problems.push(`view '${view.name}': fiscal year filter 'from' is after 'to'`);
  }

  return problems;
};

/**
 * Semantic checks the schema cannot express.
 */
export const validatePipelineConfig = (
  config: PipelineConfig
): Result<PipelineConfig, ConfigurationError> => {
  const problems: string[] = [];

  for (const duplicate of findDuplicates(config.sources.map((source) => source.id))) {
    problems.push(`source id '${duplicate}' is declared more than once`);
  }
  for (const duplicate of findDuplicates(config.views.map((view) => view.name))) {
    problems.push(`view name '${duplicate}' is declared more than once`);
  }

  problems.push(...config.sources.flatMap(validateSource));
  problems.push(...config.views.flatMap(validateView));

  if (config.qualityChecks.minFiscalYear > config.qualityChecks.maxFiscalYear) {
    problems.push('qualityChecks.minFiscalYear is after qualityChecks.maxFiscalYear');
  }

  if (problems.length > 0) {
    return err(
      createConfigurationError('pipeline', 'Pipeline configuration is inconsistent', problems)
    );
  }

  return ok(config);
};

const toPipelineConfig = (dto: PipelineConfigDTO): PipelineConfig => ({
  sources: dto.sources,
  hierarchy: dto.hierarchy ?? HIERARCHY_DEFAULTS,
  reconciliation: dto.reconciliation ?? RECONCILIATION_DEFAULTS,
  views: dto.views,
  qualityChecks: dto.qualityChecks ?? QUALITY_CHECK_DEFAULTS,
});

/**
 * Validates an already-parsed configuration object and fills in defaults.
 */
export const parsePipelineConfig = (raw: unknown): Result<PipelineConfig, ConfigLoadError> => {
  const candidate: unknown = Value.Default(PipelineConfigSchema, Value.Clone(raw));

  if (!validator.Check(candidate)) {
    return err({
      type: 'SchemaValidationError',
      message: 'Pipeline configuration does not match the schema',
      details: formatSchemaErrors(validator.Errors(candidate)),
    });
  }

  return validatePipelineConfig(toPipelineConfig(candidate));
};
