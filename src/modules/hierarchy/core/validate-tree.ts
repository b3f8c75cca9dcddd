import type { EntityKind } from '../../pipeline-config/index.js';
import type { Entity } from './types.js';

const DEPTH: Readonly<Record<EntityKind, number>> = {
  fund: 0,
  department: 1,
  program: 2,
  line_item: 3,
};

/**
 * Structural problems with an entity tree; empty when the tree is sound.
 * Every parent must exist and sit at a shallower level, roots must be funds
 * or departments, and every node must reach a root.
 */
export const validateTree = (entities: readonly Entity[]): string[] => {
  const byKey = new Map(entities.map((entity) => [entity.key, entity]));
  const problems: string[] = [];

  if (byKey.size !== entities.length) {
    problems.push('entity keys are not unique');
  }

  for (const entity of entities) {
    if (entity.parentKey === null) {
      if (entity.kind !== 'fund' && entity.kind !== 'department') {
        problems.push(`${entity.kind} '${entity.key}' has no parent`);
      }
      continue;
    }

    const parent = byKey.get(entity.parentKey);
    if (parent === undefined) {
      problems.push(`'${entity.key}' references missing parent '${entity.parentKey}'`);
      continue;
    }
    if (DEPTH[parent.kind] >= DEPTH[entity.kind]) {
      problems.push(`'${entity.key}' (${entity.kind}) sits under ${parent.kind} '${parent.key}'`);
    }

    const visited = new Set<string>([entity.key]);
    let current: Entity | undefined = parent;
    while (current !== undefined && current.parentKey !== null) {
      if (visited.has(current.key)) {
        problems.push(`'${entity.key}' is part of a cycle`);
        break;
      }
      visited.add(current.key);
      current = byKey.get(current.parentKey);
    }
  }

  return problems;
};

/**
 * Ancestor chain of an entity, nearest first, the entity itself excluded.
 */
export const ancestorsOf = (
  entityKey: string,
  byKey: ReadonlyMap<string, Entity>
): Entity[] => {
  const ancestors: Entity[] = [];
  const seen = new Set<string>([entityKey]);
  let parentKey = byKey.get(entityKey)?.parentKey ?? null;

  while (parentKey !== null && !seen.has(parentKey)) {
    const parent = byKey.get(parentKey);
    if (parent === undefined) break;
    ancestors.push(parent);
    seen.add(parentKey);
    parentKey = parent.parentKey;
  }

  return ancestors;
};
