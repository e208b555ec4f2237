/**
 * Jain's Fairness Index
 *
 *   J(x) = (Σxᵢ)² / (n · Σxᵢ²)
 *
 * 1.0 when every value is equal, 1/n when a single value is non-zero.
 * Defined as 0 for an empty list or an all-zero list.
 */

import { safeDivide, sum, sumOfSquares } from '../utils/math-helpers.js';

export function jainsFairnessIndex(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  const total = sum(values);
  return safeDivide(total * total, values.length * sumOfSquares(values));
}
