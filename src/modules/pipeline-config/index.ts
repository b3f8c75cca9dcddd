// Loading
export { loadPipelineConfig } from './shell/yaml-loader.js';
export { parsePipelineConfig, validatePipelineConfig, sortableFields } from './core/parse-config.js';

// Types
export {
  CANONICAL_FIELDS,
  ENTITY_KINDS,
  ACCOUNT_CATEGORIES,
  AMOUNT_TYPES,
  VIEW_DIMENSIONS,
  VIEW_MEASURES,
  PipelineConfigSchema,
  HIERARCHY_DEFAULTS,
  RECONCILIATION_DEFAULTS,
  QUALITY_CHECK_DEFAULTS,
  isEntityDimension,
} from './core/types.js';
export type {
  CanonicalField,
  EntityKind,
  AccountCategory,
  AmountType,
  SourceConfig,
  DepartmentAttributes,
  HierarchyOptions,
  ReconciliationOptions,
  ViewDimension,
  EntityDimension,
  ViewMeasure,
  ViewDefinition,
  SortKey,
  QualityCheckOptions,
  PipelineConfig,
} from './core/types.js';

// Errors
export type { ConfigLoadError } from './core/errors.js';
