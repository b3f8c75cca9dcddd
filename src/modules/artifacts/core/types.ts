import { Type, type Static } from '@sinclair/typebox';

import { COLUMN_TYPES } from '../../../common/types/table.js';

import type { AliasLink, HierarchyConflict } from '../../hierarchy/index.js';
import type { EntityKind } from '../../pipeline-config/index.js';
import type { QualityCheckResult } from '../../quality-checks/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Columnar tables
// ─────────────────────────────────────────────────────────────────────────────

export const TableCellSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Null(),
]);

export const TableColumnSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  type: Type.Union(COLUMN_TYPES.map((type) => Type.Literal(type))),
  values: Type.Array(TableCellSchema),
});

/**
 * On-disk table: one array of values per column, all of length `rowCount`.
 */
export const TableSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  rowCount: Type.Integer({ minimum: 0 }),
  columns: Type.Array(TableColumnSchema),
});

export type TableCell = Static<typeof TableCellSchema>;
export type TableColumn = Static<typeof TableColumnSchema>;
export type Table = Static<typeof TableSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Run report
// ─────────────────────────────────────────────────────────────────────────────

export interface SourceSummary {
  id: string;
  file: string;
  records: number;
  skippedRows: number;
  unmatchedColumns: string[];
}

/**
 * Audit document written beside the tables. Contains nothing that varies
 * between two runs over the same input.
 */
export interface RunReport {
  sources: SourceSummary[];
  records: {
    normalized: number;
    used: number;
    skipped: number;
    excludedBudget: number;
  };
  fiscalYears: number[];
  entities: Record<EntityKind, number>;
  facts: { leaf: number; rollup: number };
  budgetCyclesByYear: Record<string, string[]>;
  aliasLinks: AliasLink[];
  conflicts: HierarchyConflict[];
  views: { name: string; rows: number; maxRows: number }[];
  qualityChecks: QualityCheckResult[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Files
// ─────────────────────────────────────────────────────────────────────────────

export interface ArtifactFile {
  /** Path relative to the output directory, `/`-separated */
  path: string;
  contents: string;
}

export interface PublishSummary {
  written: string[];
  /** View files left over from earlier runs */
  removed: string[];
}
