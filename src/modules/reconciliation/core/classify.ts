import type { Classification } from './types.js';
import type { Decimal } from 'decimal.js';

export interface VarianceResult {
  variance: Decimal | null;
  variancePct: Decimal | null;
  classification: Classification;
}

/**
 * Missing sides take precedence; otherwise `on_target` when
 * |variance| ≤ tolerancePct% of budgeted, else over- or underspend by sign.
 */
export const classifyVariance = (
  budgeted: Decimal | null,
  actual: Decimal | null,
  tolerancePct: number
): VarianceResult => {
  if (budgeted === null) {
    return { variance: null, variancePct: null, classification: 'missing_budget' };
  }
  if (actual === null) {
    return { variance: null, variancePct: null, classification: 'missing_actual' };
  }

  const variance = actual.minus(budgeted);
  const variancePct = budgeted.isZero() ? null : variance.div(budgeted.abs()).times(100);
  const tolerance = budgeted.abs().times(tolerancePct).div(100);

  let classification: Classification;
  if (variance.abs().lte(tolerance)) {
    classification = 'on_target';
  } else if (variance.isPositive()) {
    classification = 'overspend';
  } else {
    classification = 'underspend';
  }

  return { variance, variancePct, classification };
};
