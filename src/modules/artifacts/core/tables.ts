import { formatAmount } from '../../../common/types/decimal.js';

import type { ColumnType } from '../../../common/types/table.js';
import type { AggregateView } from '../../aggregation/index.js';
import type { CodeMapping, Entity } from '../../hierarchy/index.js';
import type { ReconciledFact } from '../../reconciliation/index.js';
import type { ArtifactFile, RunReport, Table, TableCell } from './types.js';

interface ColumnDef<T> {
  name: string;
  type: ColumnType;
  value: (row: T) => TableCell;
}

/**
 * Pivots row objects into a columnar table.
 */
export const toTable = <T>(
  name: string,
  columns: readonly ColumnDef<T>[],
  rows: readonly T[]
): Table => ({
  name,
  rowCount: rows.length,
  columns: columns.map((column) => ({
    name: column.name,
    type: column.type,
    values: rows.map((row) => column.value(row)),
  })),
});

const ENTITY_COLUMNS: readonly ColumnDef<Entity>[] = [
  { name: 'entity_key', type: 'string', value: (e) => e.key },
  { name: 'kind', type: 'string', value: (e) => e.kind },
  { name: 'code', type: 'string', value: (e) => e.code },
  { name: 'name', type: 'string', value: (e) => e.name },
  { name: 'parent_key', type: 'string', value: (e) => e.parentKey },
  { name: 'first_fiscal_year', type: 'integer', value: (e) => e.fiscalYears[0] ?? null },
  { name: 'last_fiscal_year', type: 'integer', value: (e) => e.fiscalYears.at(-1) ?? null },
  { name: 'label_count', type: 'integer', value: (e) => e.labels.length },
  { name: 'service_area', type: 'string', value: (e) => e.attributes.serviceArea },
  { name: 'district', type: 'string', value: (e) => e.attributes.district },
];

const CODE_COLUMNS: readonly ColumnDef<CodeMapping>[] = [
  { name: 'fiscal_year', type: 'integer', value: (m) => m.fiscalYear },
  { name: 'kind', type: 'string', value: (m) => m.kind },
  { name: 'code', type: 'string', value: (m) => m.code },
  { name: 'name', type: 'string', value: (m) => m.name },
  { name: 'entity_key', type: 'string', value: (m) => m.entityKey },
];

const FACT_COLUMNS: readonly ColumnDef<ReconciledFact>[] = [
  { name: 'fiscal_year', type: 'integer', value: (f) => f.fiscalYear },
  { name: 'entity_key', type: 'string', value: (f) => f.entityKey },
  { name: 'entity_kind', type: 'string', value: (f) => f.entityKind },
  { name: 'category', type: 'string', value: (f) => f.category },
  { name: 'budgeted', type: 'decimal', value: (f) => formatAmount(f.budgeted) },
  { name: 'actual', type: 'decimal', value: (f) => formatAmount(f.actual) },
  { name: 'variance', type: 'decimal', value: (f) => formatAmount(f.variance) },
  { name: 'variance_pct', type: 'decimal', value: (f) => formatAmount(f.variancePct) },
  { name: 'classification', type: 'string', value: (f) => f.classification },
  { name: 'derived', type: 'boolean', value: (f) => f.derived },
  { name: 'record_count', type: 'integer', value: (f) => f.recordCount },
];

export const entitiesTable = (entities: readonly Entity[]): Table =>
  toTable('entities', ENTITY_COLUMNS, entities);

export const entityCodesTable = (mappings: readonly CodeMapping[]): Table =>
  toTable('entity_codes', CODE_COLUMNS, mappings);

export const factsTable = (facts: readonly ReconciledFact[]): Table =>
  toTable('facts', FACT_COLUMNS, facts);

export const viewTable = (view: AggregateView): Table =>
  toTable(
    view.name,
    view.columns.map((column) => ({
      name: column.name,
      type: column.type,
      value: (row: AggregateView['rows'][number]) => row[column.name] ?? null,
    })),
    view.rows
  );

/**
 * Stable text form: two-space indent and a trailing newline.
 */
export const serializeArtifact = (value: Table | RunReport): string =>
  `${JSON.stringify(value, null, 2)}\n`;

export interface ArtifactSet {
  entities: readonly Entity[];
  codeMappings: readonly CodeMapping[];
  facts: readonly ReconciledFact[];
  views: readonly AggregateView[];
  report: RunReport;
}

export const VIEWS_DIR = 'views';

/**
 * Every file of one output set, in publish order.
 */
export const buildArtifactFiles = (set: ArtifactSet): ArtifactFile[] => [
  { path: 'entities.json', contents: serializeArtifact(entitiesTable(set.entities)) },
  { path: 'entity_codes.json', contents: serializeArtifact(entityCodesTable(set.codeMappings)) },
  { path: 'facts.json', contents: serializeArtifact(factsTable(set.facts)) },
  ...set.views.map((view) => ({
    path: `${VIEWS_DIR}/${view.name}.json`,
    contents: serializeArtifact(viewTable(view)),
  })),
  { path: 'run_report.json', contents: serializeArtifact(set.report) },
];
