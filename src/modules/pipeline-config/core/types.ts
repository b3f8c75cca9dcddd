import { type Static, Type } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Canonical record fields
// ─────────────────────────────────────────────────────────────────────────────

export const CANONICAL_FIELDS = [
  'fiscal_year',
  'fund_code',
  'fund_name',
  'department_code',
  'department_name',
  'program_code',
  'program_name',
  'line_item_code',
  'line_item_name',
  'account_category',
  'amount_type',
  'amount',
  'budget_cycle',
  'service_area',
  'district',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

const CanonicalFieldSchema = Type.Union(CANONICAL_FIELDS.map((field) => Type.Literal(field)));

export const ENTITY_KINDS = ['fund', 'department', 'program', 'line_item'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

const EntityKindSchema = Type.Union(ENTITY_KINDS.map((kind) => Type.Literal(kind)));

export const ACCOUNT_CATEGORIES = ['revenue', 'expenditure'] as const;
export type AccountCategory = (typeof ACCOUNT_CATEGORIES)[number];

const AccountCategorySchema = Type.Union(ACCOUNT_CATEGORIES.map((c) => Type.Literal(c)));

export const AMOUNT_TYPES = ['budgeted', 'actual'] as const;
export type AmountType = (typeof AMOUNT_TYPES)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Sources
// ─────────────────────────────────────────────────────────────────────────────

const SourceSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  file: Type.String({ minLength: 1, description: 'Path relative to the input directory' }),
  delimiter: Type.String({ minLength: 1, maxLength: 1, default: ',' }),
  columns: Type.Record(Type.String(), CanonicalFieldSchema, {
    description: 'Raw column header -> canonical field',
  }),
  constants: Type.Optional(
    Type.Record(Type.String(), Type.String(), {
      description: 'Canonical field -> raw value applied to every row',
    })
  ),
  valueMaps: Type.Optional(
    Type.Object({
      account_category: Type.Optional(Type.Record(Type.String(), AccountCategorySchema)),
      amount_type: Type.Optional(
        Type.Record(Type.String(), Type.Union([Type.Literal('budgeted'), Type.Literal('actual')]))
      ),
    })
  ),
  skipBlankAmounts: Type.Boolean({ default: false }),
});

export type SourceConfig = Static<typeof SourceSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Hierarchy
// ─────────────────────────────────────────────────────────────────────────────

const AliasSchema = Type.Object({
  kind: EntityKindSchema,
  codes: Type.Array(Type.String({ minLength: 1 }), { minItems: 2 }),
});

const DepartmentAttributesSchema = Type.Object({
  serviceArea: Type.Optional(Type.String()),
  district: Type.Optional(Type.String()),
});

export type DepartmentAttributes = Static<typeof DepartmentAttributesSchema>;

const HierarchySchema = Type.Object(
  {
    globalCodeKinds: Type.Array(EntityKindSchema, { default: ['fund', 'department', 'program'] }),
    aliases: Type.Array(AliasSchema, { default: [] }),
    departmentAttributes: Type.Record(Type.String(), DepartmentAttributesSchema, { default: {} }),
  },
  { default: {} }
);

export type HierarchyOptions = Static<typeof HierarchySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Reconciliation
// ─────────────────────────────────────────────────────────────────────────────

const ReconciliationSchema = Type.Object(
  {
    onTargetTolerancePct: Type.Number({ minimum: 0, maximum: 100, default: 2 }),
    budgetCycles: Type.Array(Type.String({ minLength: 1 }), { default: ['adopted'] }),
    allowNegativeAmounts: Type.Boolean({ default: false }),
  },
  { default: {} }
);

export type ReconciliationOptions = Static<typeof ReconciliationSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Views
// ─────────────────────────────────────────────────────────────────────────────

export const VIEW_DIMENSIONS = [
  'fiscal_year',
  'category',
  'classification',
  'fund',
  'department',
  'program',
  'service_area',
  'district',
] as const;

export type ViewDimension = (typeof VIEW_DIMENSIONS)[number];

/** Dimensions backed by an ancestor entity; rows carry both its key and `<dimension>_name` */
export type EntityDimension = 'fund' | 'department' | 'program';

export const isEntityDimension = (dimension: ViewDimension): dimension is EntityDimension =>
  dimension === 'fund' || dimension === 'department' || dimension === 'program';

export const VIEW_MEASURES = [
  'budgeted',
  'actual',
  'variance',
  'variance_pct',
  'fact_count',
  'missing_actual_count',
  'missing_budget_count',
] as const;

export type ViewMeasure = (typeof VIEW_MEASURES)[number];

const SortKeySchema = Type.Object({
  field: Type.String({ minLength: 1 }),
  direction: Type.Union([Type.Literal('asc'), Type.Literal('desc')], { default: 'asc' }),
});

const ViewSchema = Type.Object({
  name: Type.String({ pattern: '^[a-z][a-z0-9_]*$' }),
  description: Type.Optional(Type.String()),
  level: EntityKindSchema,
  dimensions: Type.Array(Type.Union(VIEW_DIMENSIONS.map((d) => Type.Literal(d))), {
    minItems: 1,
  }),
  measures: Type.Array(Type.Union(VIEW_MEASURES.map((m) => Type.Literal(m))), {
    minItems: 1,
    default: ['budgeted', 'actual', 'variance'],
  }),
  filter: Type.Optional(
    Type.Object({
      category: Type.Optional(AccountCategorySchema),
      fiscalYear: Type.Optional(
        Type.Object({
          from: Type.Optional(Type.Integer()),
          to: Type.Optional(Type.Integer()),
          latest: Type.Optional(Type.Integer({ minimum: 1 })),
        })
      ),
    })
  ),
  sort: Type.Array(SortKeySchema, { default: [] }),
  maxRows: Type.Integer({ minimum: 10, maximum: 50, default: 50 }),
  absentAsZero: Type.Boolean({ default: false }),
});

export type ViewDefinition = Static<typeof ViewSchema>;
export type SortKey = Static<typeof SortKeySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Quality checks
// ─────────────────────────────────────────────────────────────────────────────

const QualityChecksSchema = Type.Object(
  {
    minFiscalYear: Type.Integer({ default: 2000 }),
    maxFiscalYear: Type.Integer({ default: 2100 }),
    maxMissingRate: Type.Number({ minimum: 0, maximum: 1, default: 0.25 }),
  },
  { default: {} }
);

export type QualityCheckOptions = Static<typeof QualityChecksSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Root
// ─────────────────────────────────────────────────────────────────────────────

export const HIERARCHY_DEFAULTS: HierarchyOptions = {
  globalCodeKinds: ['fund', 'department', 'program'],
  aliases: [],
  departmentAttributes: {},
};

export const RECONCILIATION_DEFAULTS: ReconciliationOptions = {
  onTargetTolerancePct: 2,
  budgetCycles: ['adopted'],
  allowNegativeAmounts: false,
};

export const QUALITY_CHECK_DEFAULTS: QualityCheckOptions = {
  minFiscalYear: 2000,
  maxFiscalYear: 2100,
  maxMissingRate: 0.25,
};

export const PipelineConfigSchema = Type.Object({
  sources: Type.Array(SourceSchema, { minItems: 1 }),
  hierarchy: Type.Optional(HierarchySchema),
  reconciliation: Type.Optional(ReconciliationSchema),
  views: Type.Array(ViewSchema, { default: [] }),
  qualityChecks: Type.Optional(QualityChecksSchema),
});

export type PipelineConfigDTO = Static<typeof PipelineConfigSchema>;

/**
 * Validated configuration with every section and default filled in.
 */
export interface PipelineConfig {
  sources: SourceConfig[];
  hierarchy: HierarchyOptions;
  reconciliation: ReconciliationOptions;
  views: ViewDefinition[];
  qualityChecks: QualityCheckOptions;
}
