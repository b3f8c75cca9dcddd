import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { formatAmount } from '../../../common/types/decimal.js';
import { unknownColumn, type ViewQueryError } from './errors.js';

import type { Table, TableCell, TableColumn } from '../../artifacts/index.js';
import type { EntityOption, FilterOptions, ViewQuery, ViewQueryRow, ViewQuerySort } from './types.js';

/**
 * Columnar table → row objects, in stored order.
 */
export const tableRows = (table: Table): ViewQueryRow[] =>
  Array.from({ length: table.rowCount }, (_, index) =>
    Object.fromEntries(table.columns.map((column) => [column.name, column.values[index] ?? null]))
  );

const isMeasureColumn = (column: TableColumn): boolean =>
  column.type === 'decimal' || (column.type === 'integer' && column.name.endsWith('_count'));

const DECIMAL_TEXT = /^-?\d+(?:\.\d+)?$/;
const isDecimalText = (value: string): boolean => DECIMAL_TEXT.test(value);

/** Nulls sort last in either direction; decimal strings compare by value */
const compareCells = (a: TableCell, b: TableCell, direction: 'asc' | 'desc'): number => {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }

  let order: number;
  if (typeof a === 'number' && typeof b === 'number') {
    order = a - b;
  } else if (
    typeof a === 'string' &&
    typeof b === 'string' &&
    isDecimalText(a) &&
    isDecimalText(b)
  ) {
    order = new Decimal(a).cmp(new Decimal(b));
  } else {
    const left = String(a);
    const right = String(b);
    order = left < right ? -1 : left > right ? 1 : 0;
  }

  return direction === 'asc' ? order : -order;
};

const sumDecimals = (values: readonly TableCell[]): string | null => {
  let total: Decimal | null = null;
  for (const value of values) {
    if (typeof value !== 'string') continue;
    total = total === null ? new Decimal(value) : total.plus(value);
  }
  return formatAmount(total);
};

const sumIntegers = (values: readonly TableCell[]): number =>
  values.reduce<number>((total, value) => (typeof value === 'number' ? total + value : total), 0);

const percent = (variance: TableCell, budgeted: TableCell): string | null => {
  if (typeof variance !== 'string' || typeof budgeted !== 'string') return null;
  const base = new Decimal(budgeted);
  if (base.isZero()) return null;
  return formatAmount(new Decimal(variance).div(base.abs()).times(100));
};

/**
 * Groups rows by `groupBy` and sums every measure column. Dimensions not
 * grouped on are dropped; `variance_pct` is recomputed from the summed
 * variance and budgeted.
 */
const regroupMeasures = (
  groupBy: readonly string[],
  columns: readonly TableColumn[]
): TableColumn[] =>
  columns.filter((column) => isMeasureColumn(column) && !groupBy.includes(column.name));

const regroup = (
  rows: readonly ViewQueryRow[],
  groupBy: readonly string[],
  columns: readonly TableColumn[]
): ViewQueryRow[] => {
  const measures = regroupMeasures(groupBy, columns);
  const groups = new Map<string, ViewQueryRow[]>();

  for (const row of rows) {
    const key = JSON.stringify(groupBy.map((field) => row[field] ?? null));
    const members = groups.get(key) ?? [];
    members.push(row);
    groups.set(key, members);
  }

  return [...groups.values()].map((members) => {
    const first = members[0] ?? {};
    const grouped: ViewQueryRow = Object.fromEntries(
      groupBy.map((field) => [field, first[field] ?? null])
    );

    for (const measure of measures) {
      const values = members.map((member) => member[measure.name] ?? null);
      grouped[measure.name] =
        measure.type === 'decimal' ? sumDecimals(values) : sumIntegers(values);
    }
    if ('variance_pct' in grouped) {
      grouped['variance_pct'] = percent(grouped['variance'] ?? null, grouped['budgeted'] ?? null);
    }

    return grouped;
  });
};

/**
 * Filters, optionally regroups, sorts and limits the rows of one view.
 */
export const queryView = (
  table: Table,
  query: ViewQuery = {}
): Result<ViewQueryRow[], ViewQueryError> => {
  const names = new Set(table.columns.map((column) => column.name));
  const requested = [
    ...Object.keys(query.where ?? {}),
    ...(query.fiscalYear !== undefined ? ['fiscal_year'] : []),
    ...(query.groupBy ?? []),
  ];
  const missing = requested.find((name) => !names.has(name));
  if (missing !== undefined) {
    return err(unknownColumn(table.name, missing));
  }

  const where = Object.entries(query.where ?? {});
  const from = query.fiscalYear?.from;
  const to = query.fiscalYear?.to;

  let rows = tableRows(table).filter((row) => {
    if (!where.every(([field, value]) => row[field] === value)) return false;
    const year = row['fiscal_year'];
    if (from !== undefined && (typeof year !== 'number' || year < from)) return false;
    if (to !== undefined && (typeof year !== 'number' || year > to)) return false;
    return true;
  });

  if (query.groupBy !== undefined) {
    rows = regroup(rows, query.groupBy, table.columns);
  }

  const sort: readonly ViewQuerySort[] = query.sort ?? [];
  const available =
    query.groupBy === undefined
      ? names
      : new Set([
          ...query.groupBy,
          ...regroupMeasures(query.groupBy, table.columns).map((column) => column.name),
        ]);
  const unsortable = sort.find((key) => !available.has(key.field));
  if (unsortable !== undefined) {
    return err(unknownColumn(table.name, unsortable.field));
  }

  if (sort.length > 0) {
    rows = [...rows].sort((a, b) => {
      for (const key of sort) {
        const order = compareCells(a[key.field] ?? null, b[key.field] ?? null, key.direction);
        if (order !== 0) return order;
      }
      return 0;
    });
  }

  return ok(query.limit !== undefined ? rows.slice(0, query.limit) : rows);
};

const ascending = (a: string | number, b: string | number): number => compareCells(a, b, 'asc');

const distinct = <T extends string | number>(
  values: readonly TableCell[],
  guard: (value: TableCell) => value is T
): T[] => [...new Set(values.filter(guard))].sort(ascending);

const isString = (value: TableCell): value is string => typeof value === 'string';
const isNumber = (value: TableCell): value is number => typeof value === 'number';

const columnValues = (tables: readonly Table[], name: string): TableCell[] =>
  tables.flatMap(
    (table) => table.columns.find((column) => column.name === name)?.values ?? []
  );

/**
 * Distinct filter values available across the given views.
 */
export const getFilterOptions = (tables: readonly Table[]): FilterOptions => {
  const departments = new Map<string, string | null>();
  for (const table of tables) {
    for (const row of tableRows(table)) {
      const key = row['department'];
      if (typeof key !== 'string') continue;
      const name = row['department_name'];
      if (!departments.has(key) || departments.get(key) === null) {
        departments.set(key, typeof name === 'string' ? name : null);
      }
    }
  }

  const departmentOptions: EntityOption[] = [...departments.entries()]
    .sort(([a], [b]) => ascending(a, b))
    .map(([key, name]) => ({ key, name }));

  return {
    fiscalYears: distinct(columnValues(tables, 'fiscal_year'), isNumber),
    categories: distinct(columnValues(tables, 'category'), isString),
    departments: departmentOptions,
    serviceAreas: distinct(columnValues(tables, 'service_area'), isString),
    districts: distinct(columnValues(tables, 'district'), isString),
  };
};
