import type { AccountCategory, AmountType } from '../../pipeline-config/index.js';
import type { Decimal } from 'decimal.js';

/**
 * A delimited file as read from disk: one header row plus data rows.
 */
export interface RawExtract {
  sourceId: string;
  file: string;
  header: string[];
  rows: string[][];
}

/**
 * Code and display name of one hierarchy level on a raw row.
 * At least one of the two is non-null.
 */
export interface EntityLabel {
  readonly code: string | null;
  readonly name: string | null;
}

export interface RecordLocation {
  readonly sourceId: string;
  readonly file: string;
  /** 1-based data row, header excluded */
  readonly row: number;
}

/**
 * One normalized row. Immutable once parsed.
 */
export interface FiscalRecord {
  readonly location: RecordLocation;
  readonly fiscalYear: number;
  readonly fund: EntityLabel | null;
  readonly department: EntityLabel;
  readonly program: EntityLabel | null;
  readonly lineItem: EntityLabel;
  readonly category: AccountCategory;
  readonly amountType: AmountType;
  readonly amount: Decimal;
  readonly budgetCycle: string | null;
  readonly serviceArea: string | null;
  readonly district: string | null;
}

export interface NormalizedExtract {
  sourceId: string;
  file: string;
  /** Position of the source in the configuration; drives merge order */
  sourceIndex: number;
  records: FiscalRecord[];
  /** Rows dropped because their amount was blank and the source allows it */
  skippedRows: number;
  /** Mapped optional columns that the header does not contain */
  unmatchedColumns: string[];
}
