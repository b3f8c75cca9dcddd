import type { TableCell } from '../../artifacts/index.js';

export type ViewQueryRow = Record<string, TableCell>;

export interface ViewQuerySort {
  field: string;
  direction: 'asc' | 'desc';
}

/**
 * Read-side query over one published view.
 */
export interface ViewQuery {
  /** Column equality filters */
  where?: Record<string, TableCell>;
  fiscalYear?: { from?: number; to?: number };
  /** Regroup by these columns, summing measures */
  groupBy?: string[];
  sort?: ViewQuerySort[];
  limit?: number;
}

export interface EntityOption {
  key: string;
  name: string | null;
}

export interface FilterOptions {
  fiscalYears: number[];
  categories: string[];
  departments: EntityOption[];
  serviceAreas: string[];
  districts: string[];
}
