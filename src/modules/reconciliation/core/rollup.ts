import { addOptional } from '../../../common/types/decimal.js';

import type { Entity } from '../../hierarchy/index.js';
import type { ReconciledFact } from './types.js';
import type { Decimal } from 'decimal.js';

const sameAmount = (a: Decimal | null, b: Decimal | null): boolean =>
  a === null || b === null ? a === b : a.eq(b);

const show = (value: Decimal | null): string => (value === null ? 'absent' : value.toString());

/**
 * Checks that every derived fact equals the exact sum of its immediate
 * children, per fiscal year and category, and that every parent of a fact
 * has a fact of its own. Returns one message per mismatch.
 */
export const findRollupMismatches = (
  facts: readonly ReconciledFact[],
  entities: readonly Entity[]
): string[] => {
  const byKey = new Map(entities.map((entity) => [entity.key, entity]));
  const factsByKey = new Map(
    facts.map((fact) => [`${String(fact.fiscalYear)}|${fact.entityKey}|${fact.category}`, fact])
  );
  const childSums = new Map<string, { budgeted: Decimal | null; actual: Decimal | null }>();
  const problems: string[] = [];

  for (const fact of facts) {
    const parentKey = byKey.get(fact.entityKey)?.parentKey ?? null;
    if (parentKey === null) continue;

    const key = `${String(fact.fiscalYear)}|${parentKey}|${fact.category}`;
    const sum = childSums.get(key) ?? { budgeted: null, actual: null };
    childSums.set(key, {
      budgeted: addOptional(sum.budgeted, fact.budgeted),
      actual: addOptional(sum.actual, fact.actual),
    });
  }

  for (const [key, sum] of childSums) {
    const parent = factsByKey.get(key);
    if (parent === undefined) {
      problems.push(`missing roll-up fact for ${key}`);
      continue;
    }
    if (!sameAmount(parent.budgeted, sum.budgeted)) {
      problems.push(
        `${key}: budgeted ${show(parent.budgeted)} != children ${show(sum.budgeted)}`
      );
    }
    if (!sameAmount(parent.actual, sum.actual)) {
      problems.push(`${key}: actual ${show(parent.actual)} != children ${show(sum.actual)}`);
    }
  }

  for (const fact of facts) {
    const key = `${String(fact.fiscalYear)}|${fact.entityKey}|${fact.category}`;
    if (fact.derived && !childSums.has(key)) {
      problems.push(`derived fact ${key} has no child facts`);
    }
  }

  return problems;
};
