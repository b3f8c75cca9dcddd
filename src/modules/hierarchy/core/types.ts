import type { FiscalRecord } from '../../normalizer/index.js';
import type { EntityKind } from '../../pipeline-config/index.js';

export interface LabelUsage {
  code: string | null;
  name: string | null;
  fiscalYears: number[];
}

export interface EntityAttributes {
  serviceArea: string | null;
  district: string | null;
}

/**
 * Canonical node of the fund → department → program → line item tree.
 */
export interface Entity {
  key: string;
  kind: EntityKind;
  /** Code used in the latest fiscal year that had one */
  code: string | null;
  name: string;
  /** Null only for root funds and departments */
  parentKey: string | null;
  /** Every raw label merged into this entity */
  labels: LabelUsage[];
  fiscalYears: number[];
  attributes: EntityAttributes;
}

/**
 * (fiscal year, raw label) → canonical entity.
 */
export interface CodeMapping {
  fiscalYear: number;
  kind: EntityKind;
  code: string | null;
  name: string | null;
  entityKey: string;
}

export type AliasReason = 'declared' | 'name';

/**
 * Two raw labels resolved to the same entity by something other than a shared code.
 */
export interface AliasLink {
  kind: EntityKind;
  entityKey: string;
  reason: AliasReason;
  from: { fiscalYear: number; code: string | null; name: string | null };
  to: { fiscalYear: number; code: string | null; name: string | null };
}

/**
 * Non-fatal: an entity seen under more than one parent.
 * The parent from the latest fiscal year wins.
 */
export interface HierarchyConflict {
  type: 'HierarchyConflict';
  message: string;
  kind: EntityKind;
  entityKey: string;
  parents: { fiscalYear: number; parentKey: string | null }[];
  chosenParentKey: string | null;
}

export type ResolvedRecord = FiscalRecord & {
  /** Key of the record's line item entity */
  readonly entityKey: string;
};

export interface HierarchyResolution {
  entities: Entity[];
  codeMappings: CodeMapping[];
  aliasLinks: AliasLink[];
  conflicts: HierarchyConflict[];
  records: ResolvedRecord[];
}
