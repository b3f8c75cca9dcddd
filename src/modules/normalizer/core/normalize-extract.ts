import { err, ok, type Result } from 'neverthrow';

import { parseAmount } from './amount.js';
import { planColumns, type ColumnPlan } from './column-mapping.js';
import { createFormatError, type FormatError, type NormalizeError } from './errors.js';
import { parseFiscalYear } from './fiscal-year.js';
import { mapAccountCategory, mapAmountType } from './value-maps.js';

import type { CanonicalField, SourceConfig } from '../../pipeline-config/index.js';
import type { EntityLabel, FiscalRecord, NormalizedExtract, RawExtract } from './types.js';

interface Cell {
  value: string | null;
  column: string;
}

const readCell = (plan: ColumnPlan, row: readonly string[], field: CanonicalField): Cell | null => {
  const binding = plan.bindings.get(field);
  if (binding === undefined) {
    return null;
  }

  const raw = binding.kind === 'constant' ? binding.value : (row[binding.index] ?? '');
  const trimmed = raw.trim();
  return {
    value: trimmed === '' ? null : trimmed,
    column: binding.kind === 'constant' ? `constant:${field}` : binding.column,
  };
};

const readLabel = (
  plan: ColumnPlan,
  row: readonly string[],
  codeField: CanonicalField,
  nameField: CanonicalField
): EntityLabel | null => {
  const code = readCell(plan, row, codeField)?.value ?? null;
  const name = readCell(plan, row, nameField)?.value ?? null;
  return code === null && name === null ? null : { code, name };
};

type RowOutcome = { kind: 'record'; record: FiscalRecord } | { kind: 'skipped' };

const normalizeRow = (
  extract: RawExtract,
  source: SourceConfig,
  plan: ColumnPlan,
  row: readonly string[],
  rowNumber: number
): Result<RowOutcome, FormatError> => {
  const at = (column: string) => ({
    sourceId: extract.sourceId,
    file: extract.file,
    row: rowNumber,
    column,
  });

  // Required fields are guaranteed bound by planColumns
  const yearCell = readCell(plan, row, 'fiscal_year');
  const categoryCell = readCell(plan, row, 'account_category');
  const amountTypeCell = readCell(plan, row, 'amount_type');
  const amountCell = readCell(plan, row, 'amount');
  if (
    yearCell === null ||
    categoryCell === null ||
    amountTypeCell === null ||
    amountCell === null
  ) {
    return err(
      createFormatError(
        { sourceId: extract.sourceId, file: extract.file, row: rowNumber },
        'row is missing a required field binding'
      )
    );
  }

  const amount = parseAmount(amountCell.value ?? '');
  if (amount.isErr()) {
    if (amount.error === 'blank' && source.skipBlankAmounts) {
      return ok({ kind: 'skipped' });
    }
    return err(
      createFormatError(
        at(amountCell.column),
        amount.error === 'blank' ? 'amount is blank' : `cannot parse amount '${amountCell.value ?? ''}'`,
        amountCell.value ?? ''
      )
    );
  }

  const fiscalYear = parseFiscalYear(yearCell.value ?? '');
  if (fiscalYear === null) {
    return err(
      createFormatError(
        at(yearCell.column),
        `cannot parse fiscal year '${yearCell.value ?? ''}'`,
        yearCell.value ?? ''
      )
    );
  }

  const category = mapAccountCategory(categoryCell.value ?? '', source);
  if (category === undefined) {
    return err(
      createFormatError(
        at(categoryCell.column),
        `unknown account category '${categoryCell.value ?? ''}'`,
        categoryCell.value ?? ''
      )
    );
  }

  const amountType = mapAmountType(amountTypeCell.value ?? '', source);
  if (amountType === undefined) {
    return err(
      createFormatError(
        at(amountTypeCell.column),
        `unknown amount type '${amountTypeCell.value ?? ''}'`,
        amountTypeCell.value ?? ''
      )
    );
  }

  const department = readLabel(plan, row, 'department_code', 'department_name');
  if (department === null) {
    return err(
      createFormatError(
        at(plan.bindings.has('department_code') ? 'department_code' : 'department_name'),
        'row has neither a department code nor a department name'
      )
    );
  }

  const lineItem = readLabel(plan, row, 'line_item_code', 'line_item_name');
  if (lineItem === null) {
    return err(
      createFormatError(
        at(plan.bindings.has('line_item_code') ? 'line_item_code' : 'line_item_name'),
        'row has neither a line item code nor a line item name'
      )
    );
  }

  const budgetCycle = readCell(plan, row, 'budget_cycle')?.value ?? null;

  return ok({
    kind: 'record',
    record: {
      location: { sourceId: extract.sourceId, file: extract.file, row: rowNumber },
      fiscalYear,
      fund: readLabel(plan, row, 'fund_code', 'fund_name'),
      department,
      program: readLabel(plan, row, 'program_code', 'program_name'),
      lineItem,
      category,
      amountType,
      amount: amount.value,
      budgetCycle: budgetCycle === null ? null : budgetCycle.toLowerCase(),
      serviceArea: readCell(plan, row, 'service_area')?.value ?? null,
      district: readCell(plan, row, 'district')?.value ?? null,
    },
  });
};

/**
 * Maps one raw extract onto canonical FiscalRecords.
 * The first failing row aborts the extract.
 */
export const normalizeExtract = (
  extract: RawExtract,
  source: SourceConfig,
  sourceIndex = 0
): Result<NormalizedExtract, NormalizeError> => {
  const planResult = planColumns(extract, source);
  if (planResult.isErr()) {
    return err(planResult.error);
  }
  const plan = planResult.value;

  const records: FiscalRecord[] = [];
  let skippedRows = 0;

  for (const [index, row] of extract.rows.entries()) {
    const outcome = normalizeRow(extract, source, plan, row, index + 1);
    if (outcome.isErr()) {
      return err(outcome.error);
    }
    if (outcome.value.kind === 'skipped') {
      skippedRows += 1;
      continue;
    }
    records.push(outcome.value.record);
  }

  return ok({
    sourceId: extract.sourceId,
    file: extract.file,
    sourceIndex,
    records,
    skippedRows,
    unmatchedColumns: plan.unmatchedColumns,
  });
};
