import { nameSlug, normalizeName } from './names.js';
import { UnionFind } from './union-find.js';

import type { EntityLabel, FiscalRecord } from '../../normalizer/index.js';
import type { EntityKind, HierarchyOptions } from '../../pipeline-config/index.js';
import type {
  AliasLink,
  AliasReason,
  CodeMapping,
  Entity,
  EntityAttributes,
  HierarchyConflict,
  HierarchyResolution,
  LabelUsage,
  ResolvedRecord,
} from './types.js';

const ROOT = 'root';

interface LevelSpec {
  kind: EntityKind;
  label: (record: FiscalRecord) => EntityLabel | null;
}

export const LEVELS: readonly LevelSpec[] = [
  { kind: 'fund', label: (record) => record.fund },
  { kind: 'department', label: (record) => record.department },
  { kind: 'program', label: (record) => record.program },
  { kind: 'line_item', label: (record) => record.lineItem },
];

/**
 * One raw label as seen in one fiscal year.
 */
interface Element {
  id: string;
  rawId: string;
  fiscalYear: number;
  code: string | null;
  /** Parent scope the raw id is bound to; null for a global code */
  scope: string | null;
  /** raw name -> number of records */
  names: Map<string, number>;
  /** parent key (or ROOT) -> number of records */
  parents: Map<string, number>;
  serviceArea: string | null;
  district: string | null;
}

interface PendingAlias {
  reason: AliasReason;
  from: string;
  to: string;
}

interface ResolutionState {
  records: readonly FiscalRecord[];
  options: HierarchyOptions;
  /** recordKeys[recordIndex][levelIndex] */
  recordKeys: (string | null)[][];
  usedKeys: Set<string>;
  entities: Entity[];
  codeMappings: CodeMapping[];
  aliasLinks: AliasLink[];
  conflicts: HierarchyConflict[];
}

const increment = (counts: Map<string, number>, key: string): void => {
  counts.set(key, (counts.get(key) ?? 0) + 1);
};

/** Most frequent entry; ties go to the smallest key */
const mostFrequent = (counts: ReadonlyMap<string, number>): string | null => {
  let best: string | null = null;
  let bestCount = 0;
  for (const [key, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && key < best)) {
      best = key;
      bestCount = count;
    }
  }
  return best;
};

const elementId = (fiscalYear: number, rawId: string): string =>
  `${String(fiscalYear).padStart(4, '0')}|${rawId}`;

const nearestParentKey = (keys: readonly (string | null)[], levelIndex: number): string | null => {
  for (let index = levelIndex - 1; index >= 0; index -= 1) {
    const key = keys[index];
    if (key !== null && key !== undefined) {
      return key;
    }
  }
  return null;
};

const disjoint = <T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean => {
  for (const value of a) {
    if (b.has(value)) return false;
  }
  return true;
};

const compareNullable = (a: string | null, b: string | null): number => {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
};

const collectElements = (
  state: ResolutionState,
  level: LevelSpec,
  levelIndex: number
): { elements: Map<string, Element>; recordElements: (string | null)[] } => {
  const isGlobal = state.options.globalCodeKinds.includes(level.kind);
  const elements = new Map<string, Element>();
  const recordElements: (string | null)[] = [];

  state.records.forEach((record, recordIndex) => {
    const label = level.label(record);
    const keys = state.recordKeys[recordIndex] ?? [];
    if (label === null) {
      recordElements.push(null);
      return;
    }

    const scope = nearestParentKey(keys, levelIndex) ?? ROOT;
    const token = label.code ?? `~${normalizeName(label.name ?? '')}`;
    const globalCode = isGlobal && label.code !== null;
    const rawId =
      isGlobal && label.code !== null
        ? `${level.kind}|${label.code}`
        : `${level.kind}|${scope}|${token}`;
    const id = elementId(record.fiscalYear, rawId);

    let element = elements.get(id);
    if (element === undefined) {
      element = {
        id,
        rawId,
        fiscalYear: record.fiscalYear,
        code: label.code,
        scope: globalCode ? null : scope,
        names: new Map(),
        parents: new Map(),
        serviceArea: null,
        district: null,
      };
      elements.set(id, element);
    }

    if (label.name !== null) increment(element.names, label.name);
    increment(element.parents, scope);
    element.serviceArea = record.serviceArea ?? element.serviceArea;
    element.district = record.district ?? element.district;
    recordElements.push(id);
  });

  return { elements, recordElements };
};

/**
 * Unions elements by shared code, declared alias and name match.
 */
const unionElements = (
  state: ResolutionState,
  kind: EntityKind,
  elements: ReadonlyMap<string, Element>
): { unionFind: UnionFind; pending: PendingAlias[] } => {
  const unionFind = new UnionFind();
  const classYears = new Map<string, Set<number>>();
  const classCodes = new Map<string, Set<string>>();
  const pending: PendingAlias[] = [];
  const sortedElements = [...elements.values()].sort((a, b) => (a.id < b.id ? -1 : 1));

  for (const element of sortedElements) {
    unionFind.add(element.id);
    classYears.set(element.id, new Set([element.fiscalYear]));
    classCodes.set(element.id, new Set(element.code === null ? [] : [element.code]));
  }

  const yearsOf = (id: string): Set<number> => classYears.get(unionFind.find(id)) ?? new Set();
  const codesOf = (id: string): Set<string> => classCodes.get(unionFind.find(id)) ?? new Set();

  const merge = (a: string, b: string): boolean => {
    const rootA = unionFind.find(a);
    const rootB = unionFind.find(b);
    if (rootA === rootB) return false;

    const years = new Set([...yearsOf(rootA), ...yearsOf(rootB)]);
    const codes = new Set([...codesOf(rootA), ...codesOf(rootB)]);
    for (const root of [rootA, rootB]) {
      classYears.delete(root);
      classCodes.delete(root);
    }
    const survivor = unionFind.union(rootA, rootB);
    classYears.set(survivor, years);
    classCodes.set(survivor, codes);
    return true;
  };

  // Two differently coded entities may share a name only when they never coexist
  const nameMatchAllowed = (a: string, b: string): boolean => {
    const codesA = codesOf(a);
    const codesB = codesOf(b);
    if (codesA.size === 0 || codesB.size === 0 || !disjoint(codesA, codesB)) return true;
    return disjoint(yearsOf(a), yearsOf(b));
  };

  // 1. Same raw label across years
  const byRawId = new Map<string, string[]>();
  for (const element of sortedElements) {
    const ids = byRawId.get(element.rawId) ?? [];
    ids.push(element.id);
    byRawId.set(element.rawId, ids);
  }
  for (const ids of byRawId.values()) {
    const [first, ...rest] = ids;
    if (first === undefined) continue;
    for (const id of rest) merge(first, id);
  }

  // 2. Declared aliases, within one parent scope unless the code is global
  for (const alias of state.options.aliases) {
    if (alias.kind !== kind) continue;
    const codes = new Set(alias.codes);
    const byScope = new Map<string, string[]>();
    for (const element of sortedElements) {
      if (element.code === null || !codes.has(element.code)) continue;
      const scopeKey = element.scope ?? '';
      byScope.set(scopeKey, [...(byScope.get(scopeKey) ?? []), element.id]);
    }
    for (const ids of byScope.values()) {
      const [first, ...rest] = ids;
      if (first === undefined) continue;
      for (const id of rest) {
        if (merge(first, id)) pending.push({ reason: 'declared', from: id, to: first });
      }
    }
  }

  // 3. Normalized name within the same parent scope
  const byScopedName = new Map<string, string[]>();
  for (const element of sortedElements) {
    for (const name of element.names.keys()) {
      const normalized = normalizeName(name);
      if (normalized === '') continue;
      for (const scope of element.parents.keys()) {
        const groupKey = `${scope}|${normalized}`;
        const ids = byScopedName.get(groupKey) ?? [];
        if (!ids.includes(element.id)) ids.push(element.id);
        byScopedName.set(groupKey, ids);
      }
    }
  }
  for (const groupKey of [...byScopedName.keys()].sort()) {
    const ids = byScopedName.get(groupKey) ?? [];
    ids.forEach((id, index) => {
      for (const previous of ids.slice(0, index)) {
        if (unionFind.find(previous) === unionFind.find(id)) break;
        if (nameMatchAllowed(previous, id)) {
          merge(previous, id);
          pending.push({ reason: 'name', from: id, to: previous });
          break;
        }
      }
    });
  }

  return { unionFind, pending };
};

const primaryName = (element: Element): string | null => mostFrequent(element.names);

const chooseName = (members: readonly Element[]): string => {
  const byYear = [...members].sort((a, b) => b.fiscalYear - a.fiscalYear);
  for (const year of new Set(byYear.map((member) => member.fiscalYear))) {
    const counts = new Map<string, number>();
    for (const member of byYear.filter((candidate) => candidate.fiscalYear === year)) {
      for (const [name, count] of member.names) {
        counts.set(name, (counts.get(name) ?? 0) + count);
      }
    }
    const name = mostFrequent(counts);
    if (name !== null) return name;
  }
  return byYear.find((member) => member.code !== null)?.code ?? '';
};

const chooseParent = (
  members: readonly Element[]
): { chosen: string; candidates: { fiscalYear: number; parentKey: string }[] } => {
  const stats = new Map<string, { latestYear: number; count: number }>();
  const seen = new Map<string, { fiscalYear: number; parentKey: string }>();

  for (const member of members) {
    for (const [parent, count] of member.parents) {
      const current = stats.get(parent) ?? { latestYear: Number.NEGATIVE_INFINITY, count: 0 };
      stats.set(parent, {
        latestYear: Math.max(current.latestYear, member.fiscalYear),
        count: current.count + count,
      });
      seen.set(`${String(member.fiscalYear)}|${parent}`, {
        fiscalYear: member.fiscalYear,
        parentKey: parent,
      });
    }
  }

  const ranked = [...stats.entries()].sort(([keyA, a], [keyB, b]) => {
    if (a.latestYear !== b.latestYear) return b.latestYear - a.latestYear;
    if (a.count !== b.count) return b.count - a.count;
    return keyA < keyB ? -1 : 1;
  });

  const candidates = [...seen.values()].sort((a, b) =>
    a.fiscalYear !== b.fiscalYear ? a.fiscalYear - b.fiscalYear : a.parentKey < b.parentKey ? -1 : 1
  );

  return { chosen: ranked[0]?.[0] ?? ROOT, candidates };
};

const collectLabels = (members: readonly Element[]): LabelUsage[] => {
  const usages = new Map<string, LabelUsage>();
  for (const member of members) {
    const names: (string | null)[] = member.names.size > 0 ? [...member.names.keys()] : [null];
    for (const name of names) {
      const key = `${member.code ?? ''}\u0000${name ?? ''}`;
      const usage = usages.get(key) ?? { code: member.code, name, fiscalYears: [] };
      if (!usage.fiscalYears.includes(member.fiscalYear)) usage.fiscalYears.push(member.fiscalYear);
      usages.set(key, usage);
    }
  }

  return [...usages.values()]
    .map((usage) => ({ ...usage, fiscalYears: [...usage.fiscalYears].sort((a, b) => a - b) }))
    .sort((a, b) => compareNullable(a.code, b.code) || compareNullable(a.name, b.name));
};

const collectAttributes = (
  kind: EntityKind,
  members: readonly Element[],
  options: HierarchyOptions
): EntityAttributes => {
  if (kind !== 'department') {
    return { serviceArea: null, district: null };
  }

  const latestFirst = [...members].sort((a, b) => b.fiscalYear - a.fiscalYear);
  const codes = [...new Set(members.map((member) => member.code))]
    .filter((code): code is string => code !== null)
    .sort();
  const reference = codes
    .map((code) => options.departmentAttributes[code])
    .find((attributes) => attributes !== undefined);

  return {
    serviceArea:
      latestFirst.find((member) => member.serviceArea !== null)?.serviceArea ??
      reference?.serviceArea ??
      null,
    district:
      latestFirst.find((member) => member.district !== null)?.district ??
      reference?.district ??
      null,
  };
};

const reserveKey = (usedKeys: Set<string>, base: string): string => {
  let key = base;
  let suffix = 2;
  while (usedKeys.has(key)) {
    key = `${base}#${String(suffix)}`;
    suffix += 1;
  }
  usedKeys.add(key);
  return key;
};

const resolveLevel = (state: ResolutionState, level: LevelSpec, levelIndex: number): void => {
  const { elements, recordElements } = collectElements(state, level, levelIndex);
  const { unionFind, pending } = unionElements(state, level.kind, elements);
  const isGlobal = state.options.globalCodeKinds.includes(level.kind);
  const classKeys = new Map<string, string>();

  for (const [root, memberIds] of unionFind.groups()) {
    const members = memberIds
      .map((id) => elements.get(id))
      .filter((element): element is Element => element !== undefined);
    const anchor = members[0];
    if (anchor === undefined) continue;

    const { chosen, candidates } = chooseParent(members);
    const parentKey = chosen === ROOT ? null : chosen;
    const firstCoded = members.find((member) => member.code !== null);

    const baseKey =
      isGlobal && firstCoded?.code != null
        ? `${level.kind}:${firstCoded.code}`
        : `${chosen}/${level.kind}:${firstCoded?.code ?? `~${nameSlug(primaryName(anchor) ?? '')}`}`;
    const key = reserveKey(state.usedKeys, baseKey);
    classKeys.set(root, key);

    const distinctParents = new Set(candidates.map((candidate) => candidate.parentKey));
    if (distinctParents.size > 1) {
      const winner = candidates.filter((candidate) => candidate.parentKey === chosen).pop();
      state.conflicts.push({
        type: 'HierarchyConflict',
        message: `${level.kind} '${key}' appears under ${String(distinctParents.size)} parents; keeping '${chosen}' from FY${String(winner?.fiscalYear ?? anchor.fiscalYear)}`,
        kind: level.kind,
        entityKey: key,
        parents: candidates.map((candidate) => ({
          fiscalYear: candidate.fiscalYear,
          parentKey: candidate.parentKey === ROOT ? null : candidate.parentKey,
        })),
        chosenParentKey: parentKey,
      });
    }

    const latestCoded = [...members].reverse().find((member) => member.code !== null);

    state.entities.push({
      key,
      kind: level.kind,
      code: latestCoded?.code ?? null,
      name: chooseName(members),
      parentKey,
      labels: collectLabels(members),
      fiscalYears: [...new Set(members.map((member) => member.fiscalYear))].sort((a, b) => a - b),
      attributes: collectAttributes(level.kind, members, state.options),
    });
  }

  const keyOf = (id: string): string => {
    const key = classKeys.get(unionFind.find(id));
    if (key === undefined) {
      throw new Error(`Element '${id}' has no resolved entity`);
    }
    return key;
  };

  recordElements.forEach((id, recordIndex) => {
    const keys = state.recordKeys[recordIndex];
    if (id !== null && keys !== undefined) {
      keys[levelIndex] = keyOf(id);
    }
  });

  for (const element of [...elements.values()].sort((a, b) => (a.id < b.id ? -1 : 1))) {
    state.codeMappings.push({
      fiscalYear: element.fiscalYear,
      kind: level.kind,
      code: element.code,
      name: primaryName(element),
      entityKey: keyOf(element.id),
    });
  }

  const describe = (id: string) => {
    const element = elements.get(id);
    return {
      fiscalYear: element?.fiscalYear ?? 0,
      code: element?.code ?? null,
      name: element === undefined ? null : primaryName(element),
    };
  };

  for (const alias of pending) {
    state.aliasLinks.push({
      kind: level.kind,
      entityKey: keyOf(alias.from),
      reason: alias.reason,
      from: describe(alias.from),
      to: describe(alias.to),
    });
  }
};

const leafKey = (keys: readonly (string | null)[], record: FiscalRecord): string => {
  const key = nearestParentKey(keys, keys.length);
  if (key === null) {
    throw new Error(
      `Record ${record.location.sourceId}#${String(record.location.row)} resolved to no entity`
    );
  }
  return key;
};

/**
 * Builds the canonical entity tree from all loaded records and resolves every
 * record to its line item entity. Pure and deterministic.
 */
export const resolveHierarchy = (
  records: readonly FiscalRecord[],
  options: HierarchyOptions
): HierarchyResolution => {
  const state: ResolutionState = {
    records,
    options,
    recordKeys: records.map(() => LEVELS.map(() => null)),
    usedKeys: new Set(),
    entities: [],
    codeMappings: [],
    aliasLinks: [],
    conflicts: [],
  };

  LEVELS.forEach((level, levelIndex) => {
    resolveLevel(state, level, levelIndex);
  });

  const resolved: ResolvedRecord[] = records.map((record, index) => ({
    ...record,
    entityKey: leafKey(state.recordKeys[index] ?? [], record),
  }));

  const levelOrder = new Map(LEVELS.map((level, index) => [level.kind, index]));
  const entities = [...state.entities].sort(
    (a, b) =>
      (levelOrder.get(a.kind) ?? 0) - (levelOrder.get(b.kind) ?? 0) || (a.key < b.key ? -1 : 1)
  );

  return {
    entities,
    codeMappings: state.codeMappings,
    aliasLinks: state.aliasLinks,
    conflicts: state.conflicts,
    records: resolved,
  };
};
