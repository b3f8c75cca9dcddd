import { err, ok, type Result } from 'neverthrow';

import { addOptional } from '../../../common/types/decimal.js';
import { ancestorsOf } from '../../hierarchy/index.js';
import { classifyVariance } from './classify.js';
import {
  createDataQualityError,
  createUnresolvedEntityError,
  type ReconciliationError,
} from './errors.js';

import type { Entity, ResolvedRecord } from '../../hierarchy/index.js';
import type { AccountCategory, ReconciliationOptions } from '../../pipeline-config/index.js';
import type { ReconciledFact, ReconciliationOutput } from './types.js';
import type { Decimal } from 'decimal.js';

interface Accumulator {
  fiscalYear: number;
  entity: Entity;
  category: AccountCategory;
  budgeted: Decimal | null;
  actual: Decimal | null;
  recordCount: number;
}

const factKey = (fiscalYear: number, entityKey: string, category: AccountCategory): string =>
  `${String(fiscalYear)}|${entityKey}|${category}`;

const compareFacts = (a: ReconciledFact, b: ReconciledFact): number => {
  if (a.fiscalYear !== b.fiscalYear) return a.fiscalYear - b.fiscalYear;
  if (a.entityKey !== b.entityKey) return a.entityKey < b.entityKey ? -1 : 1;
  if (a.category !== b.category) return a.category < b.category ? -1 : 1;
  return 0;
};

const toFact = (acc: Accumulator, derived: boolean, tolerancePct: number): ReconciledFact => ({
  fiscalYear: acc.fiscalYear,
  entityKey: acc.entity.key,
  entityKind: acc.entity.kind,
  category: acc.category,
  budgeted: acc.budgeted,
  actual: acc.actual,
  ...classifyVariance(acc.budgeted, acc.actual, tolerancePct),
  derived,
  recordCount: acc.recordCount,
});

/**
 * Joins budgeted and actual amounts at line item grain and derives roll-ups
 * for every ancestor. Fails fast on the first record that cannot be used.
 */
export const reconcile = (
  records: readonly ResolvedRecord[],
  entities: readonly Entity[],
  options: ReconciliationOptions
): Result<ReconciliationOutput, ReconciliationError> => {
  const byKey = new Map(entities.map((entity) => [entity.key, entity]));
  const acceptedCycles = new Set(options.budgetCycles.map((cycle) => cycle.toLowerCase()));
  const leaves = new Map<string, Accumulator>();
  const cyclesByYear = new Map<number, Set<string>>();
  let excludedBudgetRecords = 0;

  for (const record of records) {
    const entity = byKey.get(record.entityKey);
    if (entity === undefined) {
      return err(createUnresolvedEntityError(record.entityKey, record.location));
    }

    if (record.amount.lt(0) && !options.allowNegativeAmounts) {
      return err(
        createDataQualityError(
          record.location,
          `negative amount ${record.amount.toString()} for ${record.amountType} ${record.category}`,
          record.amount.toString()
        )
      );
    }

    if (record.amountType === 'budgeted' && record.budgetCycle !== null) {
      if (!acceptedCycles.has(record.budgetCycle)) {
        excludedBudgetRecords += 1;
        continue;
      }
      const cycles = cyclesByYear.get(record.fiscalYear) ?? new Set<string>();
      cycles.add(record.budgetCycle);
      cyclesByYear.set(record.fiscalYear, cycles);
    }

    const key = factKey(record.fiscalYear, entity.key, record.category);
    const acc: Accumulator = leaves.get(key) ?? {
      fiscalYear: record.fiscalYear,
      entity,
      category: record.category,
      budgeted: null,
      actual: null,
      recordCount: 0,
    };

    if (record.amountType === 'budgeted') {
      acc.budgeted = addOptional(acc.budgeted, record.amount);
    } else {
      acc.actual = addOptional(acc.actual, record.amount);
    }
    acc.recordCount += 1;
    leaves.set(key, acc);
  }

  const rollups = new Map<string, Accumulator>();
  for (const leaf of leaves.values()) {
    for (const ancestor of ancestorsOf(leaf.entity.key, byKey)) {
      const key = factKey(leaf.fiscalYear, ancestor.key, leaf.category);
      const acc: Accumulator = rollups.get(key) ?? {
        fiscalYear: leaf.fiscalYear,
        entity: ancestor,
        category: leaf.category,
        budgeted: null,
        actual: null,
        recordCount: 0,
      };
      acc.budgeted = addOptional(acc.budgeted, leaf.budgeted);
      acc.actual = addOptional(acc.actual, leaf.actual);
      acc.recordCount += leaf.recordCount;
      rollups.set(key, acc);
    }
  }

  const tolerance = options.onTargetTolerancePct;
  const facts = [
    ...[...leaves.values()].map((acc) => toFact(acc, false, tolerance)),
    ...[...rollups.values()].map((acc) => toFact(acc, true, tolerance)),
  ].sort(compareFacts);

  const budgetCyclesByYear: Record<string, string[]> = {};
  for (const year of [...cyclesByYear.keys()].sort((a, b) => a - b)) {
    budgetCyclesByYear[String(year)] = [...(cyclesByYear.get(year) ?? [])].sort();
  }

  return ok({
    facts,
    stats: {
      recordsIn: records.length,
      recordsUsed: records.length - excludedBudgetRecords,
      excludedBudgetRecords,
      budgetCyclesByYear,
      leafFacts: leaves.size,
      rollupFacts: rollups.size,
    },
  });
};
