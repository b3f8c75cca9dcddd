import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  addOptional,
  createConfigurationError,
  formatAmount,
  ZERO,
  type ColumnSpec,
  type ConfigurationError,
} from '../../../common/types/index.js';

import {
  createEntityContext,
  dimensionColumns,
  dimensionValues,
  type DimensionValue,
  type EntityContext,
} from './dimensions.js';

import type { Entity } from '../../hierarchy/index.js';
import type { ViewDefinition, ViewMeasure } from '../../pipeline-config/index.js';
import type { ReconciledFact } from '../../reconciliation/index.js';
import type { AggregateView, ViewRow } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Groups
// ─────────────────────────────────────────────────────────────────────────────

interface Group {
  values: Map<string, DimensionValue>;
  budgeted: Decimal | null;
  actual: Decimal | null;
  /** Sums over facts with both sides present */
  matchedVariance: Decimal | null;
  matchedBudgeted: Decimal | null;
  factCount: number;
  missingActualCount: number;
  missingBudgetCount: number;
}

type SortValue = Decimal | string | number | null;

const MEASURE_TYPES: Readonly<Record<ViewMeasure, ColumnSpec['type']>> = {
  budgeted: 'decimal',
  actual: 'decimal',
  variance: 'decimal',
  variance_pct: 'decimal',
  fact_count: 'integer',
  missing_actual_count: 'integer',
  missing_budget_count: 'integer',
};

const orZero = (value: Decimal | null): Decimal => value ?? ZERO;

const percentOf = (part: Decimal | null, whole: Decimal | null): Decimal | null => {
  if (part === null || whole === null || whole.isZero()) return null;
  return part.div(whole.abs()).times(100);
};

const measureValue = (
  group: Group,
  measure: ViewMeasure,
  absentAsZero: boolean
): Decimal | number | null => {
  switch (measure) {
    case 'budgeted':
      return absentAsZero ? orZero(group.budgeted) : group.budgeted;
    case 'actual':
      return absentAsZero ? orZero(group.actual) : group.actual;
    case 'variance':
      return absentAsZero
        ? orZero(group.actual).minus(orZero(group.budgeted))
        : group.matchedVariance;
    case 'variance_pct':
      return absentAsZero
        ? percentOf(orZero(group.actual).minus(orZero(group.budgeted)), orZero(group.budgeted))
        : percentOf(group.matchedVariance, group.matchedBudgeted);
    case 'fact_count':
      return group.factCount;
    case 'missing_actual_count':
      return group.missingActualCount;
    case 'missing_budget_count':
      return group.missingBudgetCount;
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Filtering
// ─────────────────────────────────────────────────────────────────────────────

const selectFacts = (facts: readonly ReconciledFact[], view: ViewDefinition): ReconciledFact[] => {
  const category = view.filter?.category;
  const range = view.filter?.fiscalYear;

  let selected = facts.filter(
    (fact) =>
      fact.entityKind === view.level &&
      (category === undefined || fact.category === category) &&
      (range?.from === undefined || fact.fiscalYear >= range.from) &&
      (range?.to === undefined || fact.fiscalYear <= range.to)
  );

  const latest = range?.latest;
  if (latest !== undefined) {
    const years = [...new Set(selected.map((fact) => fact.fiscalYear))]
      .sort((a, b) => b - a)
      .slice(0, latest);
    const kept = new Set(years);
    selected = selected.filter((fact) => kept.has(fact.fiscalYear));
  }

  return selected;
};

// ─────────────────────────────────────────────────────────────────────────────
// Sorting
// ─────────────────────────────────────────────────────────────────────────────

/** Nulls sort last in either direction */
const compareValues = (a: SortValue, b: SortValue, direction: 'asc' | 'desc'): number => {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }

  let order: number;
  if (a instanceof Decimal && b instanceof Decimal) {
    order = a.cmp(b);
  } else if (typeof a === 'number' && typeof b === 'number') {
    order = a - b;
  } else {
    const left = String(a);
    const right = String(b);
    order = left < right ? -1 : left > right ? 1 : 0;
  }

  return direction === 'asc' ? order : -order;
};

// ─────────────────────────────────────────────────────────────────────────────
// Build
// ─────────────────────────────────────────────────────────────────────────────

const viewColumns = (view: ViewDefinition): ColumnSpec[] => [
  ...view.dimensions.flatMap(dimensionColumns),
  ...view.measures.map((measure): ColumnSpec => ({ name: measure, type: MEASURE_TYPES[measure] })),
];

const isMeasure = (view: ViewDefinition, field: string): field is ViewMeasure =>
  view.measures.some((measure) => measure === field);

const groupFacts = (
  facts: readonly ReconciledFact[],
  view: ViewDefinition,
  context: EntityContext
): Map<string, Group> => {
  const groups = new Map<string, Group>();

  for (const fact of facts) {
    const values = new Map<string, DimensionValue>(
      view.dimensions.flatMap((dimension) => dimensionValues(fact, dimension, context))
    );
    const key = JSON.stringify([...values.values()]);

    const group: Group = groups.get(key) ?? {
      values,
      budgeted: null,
      actual: null,
      matchedVariance: null,
      matchedBudgeted: null,
      factCount: 0,
      missingActualCount: 0,
      missingBudgetCount: 0,
    };

    group.budgeted = addOptional(group.budgeted, fact.budgeted);
    group.actual = addOptional(group.actual, fact.actual);
    if (fact.variance !== null && fact.budgeted !== null) {
      group.matchedVariance = addOptional(group.matchedVariance, fact.variance);
      group.matchedBudgeted = addOptional(group.matchedBudgeted, fact.budgeted);
    }
    group.factCount += 1;
    if (fact.classification === 'missing_actual') group.missingActualCount += 1;
    if (fact.classification === 'missing_budget') group.missingBudgetCount += 1;

    groups.set(key, group);
  }

  return groups;
};

/**
 * Groups the facts at the view's level by its dimensions and computes its measures.
 * Fails instead of truncating when the grouping yields more than `maxRows` rows.
 */
export const buildView = (
  facts: readonly ReconciledFact[],
  view: ViewDefinition,
  context: EntityContext
): Result<AggregateView, ConfigurationError> => {
  const groups = groupFacts(selectFacts(facts, view), view, context);

  if (groups.size > view.maxRows) {
    return err(
      createConfigurationError(
        `views.${view.name}`,
        `View '${view.name}' groups into ${String(groups.size)} rows, above its maxRows of ${String(view.maxRows)}; narrow its dimensions or filter`
      )
    );
  }

  const sortValue = (group: Group, field: string): SortValue => {
    if (isMeasure(view, field)) {
      return measureValue(group, field, view.absentAsZero);
    }
    return group.values.get(field) ?? null;
  };

  const tieBreakers = view.dimensions.map((dimension) => ({
    field: dimension,
    direction: 'asc' as const,
  }));
  const order = [...view.sort, ...tieBreakers];

  const sorted = [...groups.values()].sort((a, b) => {
    for (const key of order) {
      const result = compareValues(sortValue(a, key.field), sortValue(b, key.field), key.direction);
      if (result !== 0) return result;
    }
    return 0;
  });

  const rows = sorted.map((group): ViewRow => {
    const row: ViewRow = Object.fromEntries(group.values);
    for (const measure of view.measures) {
      const value = measureValue(group, measure, view.absentAsZero);
      row[measure] = value instanceof Decimal ? formatAmount(value) : value;
    }
    return row;
  });

  return ok({
    name: view.name,
    description: view.description ?? null,
    level: view.level,
    dimensions: [...view.dimensions],
    measures: [...view.measures],
    maxRows: view.maxRows,
    columns: viewColumns(view),
    rows,
  });
};

/**
 * Builds every configured view, in declaration order.
 */
export const buildViews = (
  facts: readonly ReconciledFact[],
  entities: readonly Entity[],
  views: readonly ViewDefinition[]
): Result<AggregateView[], ConfigurationError> => {
  const context = createEntityContext(entities);
  const built: AggregateView[] = [];

  for (const view of views) {
    const result = buildView(facts, view, context);
    if (result.isErr()) {
      return err(result.error);
    }
    built.push(result.value);
  }

  return ok(built);
};
