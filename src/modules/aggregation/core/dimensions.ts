import { ancestorsOf } from '../../hierarchy/index.js';
import { isEntityDimension } from '../../pipeline-config/index.js';

import type { Entity } from '../../hierarchy/index.js';
import type { ViewDimension } from '../../pipeline-config/index.js';
import type { ReconciledFact } from '../../reconciliation/index.js';
import type { ColumnSpec } from '../../../common/types/table.js';

export type DimensionValue = string | number | null;

/**
 * Resolves a fact's entity and its ancestors once per entity key.
 */
export interface EntityContext {
  byKey: ReadonlyMap<string, Entity>;
  lineage(entityKey: string): readonly Entity[];
}

export const createEntityContext = (entities: readonly Entity[]): EntityContext => {
  const byKey = new Map(entities.map((entity) => [entity.key, entity]));
  const cache = new Map<string, Entity[]>();

  return {
    byKey,
    lineage(entityKey: string): readonly Entity[] {
      const cached = cache.get(entityKey);
      if (cached !== undefined) return cached;

      const self = byKey.get(entityKey);
      const chain = self === undefined ? [] : [self, ...ancestorsOf(entityKey, byKey)];
      cache.set(entityKey, chain);
      return chain;
    },
  };
};

export const dimensionColumns = (dimension: ViewDimension): ColumnSpec[] => {
  if (dimension === 'fiscal_year') {
    return [{ name: 'fiscal_year', type: 'integer' }];
  }
  if (isEntityDimension(dimension)) {
    return [
      { name: dimension, type: 'string' },
      { name: `${dimension}_name`, type: 'string' },
    ];
  }
  return [{ name: dimension, type: 'string' }];
};

/**
 * Column values a fact contributes for one dimension, keyed by column name.
 */
export const dimensionValues = (
  fact: ReconciledFact,
  dimension: ViewDimension,
  context: EntityContext
): [string, DimensionValue][] => {
  switch (dimension) {
    case 'fiscal_year':
      return [['fiscal_year', fact.fiscalYear]];
    case 'category':
      return [['category', fact.category]];
    case 'classification':
      return [['classification', fact.classification]];
    case 'fund':
    case 'department':
    case 'program': {
      const entity = context.lineage(fact.entityKey).find((node) => node.kind === dimension);
      return [
        [dimension, entity?.key ?? null],
        [`${dimension}_name`, entity?.name ?? null],
      ];
    }
    case 'service_area':
    case 'district': {
      const department = context
        .lineage(fact.entityKey)
        .find((node) => node.kind === 'department');
      const attributes = department?.attributes;
      const value = dimension === 'service_area' ? attributes?.serviceArea : attributes?.district;
      return [[dimension, value ?? null]];
    }
  }
};
