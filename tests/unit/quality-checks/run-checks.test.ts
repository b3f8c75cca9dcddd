import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import type { AggregateView } from '@/modules/aggregation/index.js';
import { resolveHierarchy } from '@/modules/hierarchy/index.js';
import {
  HIERARCHY_DEFAULTS,
  QUALITY_CHECK_DEFAULTS,
  RECONCILIATION_DEFAULTS,
} from '@/modules/pipeline-config/index.js';
import {
  assertQualityChecks,
  runQualityChecks,
  type QualityCheckInput,
  type QualityCheckResult,
} from '@/modules/quality-checks/index.js';
import { reconcile } from '@/modules/reconciliation/index.js';
import { makeRecord } from '@/tests/fixtures/builders.js';

import type { FiscalRecord } from '@/modules/normalizer/index.js';

const makeInput = (records: FiscalRecord[]): QualityCheckInput => {
  const resolution = resolveHierarchy(records, HIERARCHY_DEFAULTS);
  const { facts, stats } = reconcile(
    resolution.records,
    resolution.entities,
    RECONCILIATION_DEFAULTS
  )._unsafeUnwrap();
  return { entities: resolution.entities, facts, views: [], stats };
};

const matched = (): QualityCheckInput =>
  makeInput([
    makeRecord({ amount: new Decimal(100) }),
    makeRecord({ amountType: 'actual', amount: new Decimal(100) }),
  ]);

const find = (results: QualityCheckResult[], name: QualityCheckResult['name']) =>
  results.find((check) => check.name === name);

const makeAggregate = (rows: number, maxRows: number): AggregateView => ({
  name: 'big',
  description: null,
  level: 'line_item',
  dimensions: ['fiscal_year'],
  measures: ['fact_count'],
  maxRows,
  columns: [
    { name: 'fiscal_year', type: 'integer' },
    { name: 'fact_count', type: 'integer' },
  ],
  rows: Array.from({ length: rows }, (_, index) => ({ fiscal_year: 2000 + index, fact_count: 1 })),
});

describe('runQualityChecks', () => {
  it('passes every check on consistent data', () => {
    const results = runQualityChecks(matched(), QUALITY_CHECK_DEFAULTS);

    expect(results.map((check) => [check.name, check.status])).toEqual([
      ['entity_tree', 'pass'],
      ['rollup_invariant', 'pass'],
      ['view_row_bounds', 'pass'],
      ['fiscal_year_range', 'pass'],
      ['missing_actual_rate', 'pass'],
      ['budget_cycle_duplication', 'pass'],
    ]);
    expect(find(results, 'entity_tree')?.message).toBe('3 entities form a tree');
    expect(find(results, 'fiscal_year_range')?.message).toBe('all fiscal years within 2000-2100');
  });

  it('fails when a roll-up no longer matches its children', () => {
    const input = matched();
    const facts = input.facts.map((fact) =>
      fact.entityKey === 'department:FIR' ? { ...fact, budgeted: new Decimal(999) } : fact
    );

    const check = find(runQualityChecks({ ...input, facts }, QUALITY_CHECK_DEFAULTS), 'rollup_invariant');

    expect(check?.status).toBe('fail');
    expect(check?.details).toContain(
      '2024|department:FIR|expenditure: budgeted 999 != children 100'
    );
  });

  it('fails when a view holds more rows than its bound', () => {
    const input = { ...matched(), views: [makeAggregate(30, 25)] };

    const check = find(runQualityChecks(input, QUALITY_CHECK_DEFAULTS), 'view_row_bounds');

    expect(check).toEqual({
      name: 'view_row_bounds',
      status: 'fail',
      message: '1 views over their row bound',
      details: ['big: 30 rows, limit 25'],
    });
  });

  it('fails on fiscal years outside the configured range', () => {
    const check = find(
      runQualityChecks(matched(), { ...QUALITY_CHECK_DEFAULTS, minFiscalYear: 2025 }),
      'fiscal_year_range'
    );

    expect(check?.status).toBe('fail');
    expect(check?.message).toBe('fiscal years outside 2025-2100');
    expect(check?.details).toEqual(['2024']);
  });

  it('warns when too many line items lack an actual', () => {
    const input = makeInput([
      makeRecord({ amount: new Decimal(100) }),
      makeRecord({ amountType: 'actual', amount: new Decimal(90) }),
      makeRecord({ lineItem: { code: '5300', name: 'Equipment' }, amount: new Decimal(50) }),
    ]);

    const check = find(runQualityChecks(input, QUALITY_CHECK_DEFAULTS), 'missing_actual_rate');

    expect(check?.status).toBe('warn');
    expect(check?.details).toEqual(['2024: 1 of 2 line items have no actual']);
  });

  it('warns when a year sums several budget cycles', () => {
    const input = matched();
    const stats = { ...input.stats, budgetCyclesByYear: { '2024': ['adopted', 'amended'] } };

    const check = find(
      runQualityChecks({ ...input, stats }, QUALITY_CHECK_DEFAULTS),
      'budget_cycle_duplication'
    );

    expect(check?.status).toBe('warn');
    expect(check?.details).toEqual(['2024: adopted, amended']);
  });
});

describe('assertQualityChecks', () => {
  it('accepts warnings', () => {
    const results: QualityCheckResult[] = [
      { name: 'missing_actual_rate', status: 'warn', message: 'high', details: [] },
    ];

    expect(assertQualityChecks(results).isOk()).toBe(true);
  });

  it('rejects failures and names each one', () => {
    const results = runQualityChecks(matched(), { ...QUALITY_CHECK_DEFAULTS, minFiscalYear: 2025 });

    const error = assertQualityChecks(results)._unsafeUnwrapErr();

    expect(error.type).toBe('QualityCheckError');
    expect(error.message).toBe(
      'Quality checks failed: fiscal_year_range (fiscal years outside 2025-2100)'
    );
    expect(error.failures).toHaveLength(1);
  });
});
