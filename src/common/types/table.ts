/**
 * Column types shared by views and published tables.
 * `decimal` values are exact strings with two places.
 */
export const COLUMN_TYPES = ['string', 'integer', 'decimal', 'boolean'] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export interface ColumnSpec {
  name: string;
  type: ColumnType;
}
