import { err, ok, type Result } from 'neverthrow';

import { validateTree } from '../../hierarchy/index.js';
import { findRollupMismatches } from '../../reconciliation/index.js';
import { createQualityCheckError, type QualityCheckError } from './errors.js';

import type { QualityCheckOptions } from '../../pipeline-config/index.js';
import type {
  QualityCheckInput,
  QualityCheckName,
  QualityCheckResult,
  QualityCheckStatus,
} from './types.js';

/** Upper bound on rows a display view may carry, whatever its own maxRows says */
export const VIEW_ROW_CEILING = 50;

const result = (
  name: QualityCheckName,
  status: QualityCheckStatus,
  message: string,
  details: string[] = []
): QualityCheckResult => ({ name, status, message, details });

const checkEntityTree = (input: QualityCheckInput): QualityCheckResult => {
  const problems = validateTree(input.entities);
  return problems.length === 0
    ? result('entity_tree', 'pass', `${String(input.entities.length)} entities form a tree`)
    : result('entity_tree', 'fail', `${String(problems.length)} structural problems`, problems);
};

const checkRollups = (input: QualityCheckInput): QualityCheckResult => {
  const mismatches = findRollupMismatches(input.facts, input.entities);
  return mismatches.length === 0
    ? result('rollup_invariant', 'pass', 'every roll-up equals the sum of its children')
    : result(
        'rollup_invariant',
        'fail',
        `${String(mismatches.length)} roll-up mismatches`,
        mismatches
      );
};

const checkViewBounds = (input: QualityCheckInput): QualityCheckResult => {
  const oversized = input.views
    .filter((view) => view.rows.length > Math.min(view.maxRows, VIEW_ROW_CEILING))
    .map(
      (view) =>
        `${view.name}: ${String(view.rows.length)} rows, limit ${String(Math.min(view.maxRows, VIEW_ROW_CEILING))}`
    );

  return oversized.length === 0
    ? result('view_row_bounds', 'pass', `${String(input.views.length)} views within their row bounds`)
    : result('view_row_bounds', 'fail', `${String(oversized.length)} views over their row bound`, oversized);
};

const checkFiscalYears = (
  input: QualityCheckInput,
  options: QualityCheckOptions
): QualityCheckResult => {
  const outside = [...new Set(input.facts.map((fact) => fact.fiscalYear))]
    .filter((year) => year < options.minFiscalYear || year > options.maxFiscalYear)
    .sort((a, b) => a - b);

  const range = `${String(options.minFiscalYear)}-${String(options.maxFiscalYear)}`;
  return outside.length === 0
    ? result('fiscal_year_range', 'pass', `all fiscal years within ${range}`)
    : result(
        'fiscal_year_range',
        'fail',
        `fiscal years outside ${range}`,
        outside.map((year) => String(year))
      );
};

/**
 * Share of line item facts with a budget but no actual, per fiscal year.
 */
const checkMissingActuals = (
  input: QualityCheckInput,
  options: QualityCheckOptions
): QualityCheckResult => {
  const perYear = new Map<number, { total: number; missing: number }>();
  for (const fact of input.facts) {
    if (fact.derived) continue;
    const counts = perYear.get(fact.fiscalYear) ?? { total: 0, missing: 0 };
    counts.total += 1;
    if (fact.classification === 'missing_actual') counts.missing += 1;
    perYear.set(fact.fiscalYear, counts);
  }

  const above = [...perYear.entries()]
    .sort(([a], [b]) => a - b)
    .filter(([, counts]) => counts.missing / counts.total > options.maxMissingRate)
    .map(
      ([year, counts]) =>
        `${String(year)}: ${String(counts.missing)} of ${String(counts.total)} line items have no actual`
    );

  return above.length === 0
    ? result(
        'missing_actual_rate',
        'pass',
        `missing-actual rate at or below ${String(options.maxMissingRate)} in every year`
      )
    : result(
        'missing_actual_rate',
        'warn',
        `missing-actual rate above ${String(options.maxMissingRate)}`,
        above
      );
};

const checkBudgetCycles = (input: QualityCheckInput): QualityCheckResult => {
  const duplicated = Object.entries(input.stats.budgetCyclesByYear)
    .filter(([, cycles]) => cycles.length > 1)
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([year, cycles]) => `${year}: ${cycles.join(', ')}`);

  return duplicated.length === 0
    ? result('budget_cycle_duplication', 'pass', 'one budget cycle per fiscal year')
    : result(
        'budget_cycle_duplication',
        'warn',
        'budgeted amounts from several cycles were summed',
        duplicated
      );
};

/**
 * Runs every check; never short-circuits, so the report lists all findings.
 */
export const runQualityChecks = (
  input: QualityCheckInput,
  options: QualityCheckOptions
): QualityCheckResult[] => [
  checkEntityTree(input),
  checkRollups(input),
  checkViewBounds(input),
  checkFiscalYears(input, options),
  checkMissingActuals(input, options),
  checkBudgetCycles(input),
];

export const assertQualityChecks = (
  results: readonly QualityCheckResult[]
): Result<readonly QualityCheckResult[], QualityCheckError> => {
  const failures = results.filter((check) => check.status === 'fail');
  return failures.length === 0 ? ok(results) : err(createQualityCheckError(failures));
};
