import type { ColumnSpec } from '../../../common/types/table.js';
import type { EntityKind, ViewDimension, ViewMeasure } from '../../pipeline-config/index.js';

/** Decimal measures are exact strings with two places */
export type ViewCell = string | number | null;

export type ViewRow = Record<string, ViewCell>;

/**
 * Display-ready table derived from reconciled facts.
 */
export interface AggregateView {
  name: string;
  description: string | null;
  level: EntityKind;
  dimensions: ViewDimension[];
  measures: ViewMeasure[];
  maxRows: number;
  columns: ColumnSpec[];
  rows: ViewRow[];
}
