export { resolveHierarchy, LEVELS } from './core/resolve-hierarchy.js';
export { validateTree, ancestorsOf } from './core/validate-tree.js';
export { normalizeName, nameSlug } from './core/names.js';
export { UnionFind } from './core/union-find.js';

export type {
  Entity,
  EntityAttributes,
  LabelUsage,
  CodeMapping,
  AliasLink,
  AliasReason,
  HierarchyConflict,
  ResolvedRecord,
  HierarchyResolution,
} from './core/types.js';
