/**
 * Math Helper Utilities
 *
 * Reductions over tick counts used by the metrics calculator and the
 * fairness helper.
 */

/**
 * Sum of values (0 for an empty list)
 */
export function sum(values: readonly number[]): number {
  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Sum of squared values (0 for an empty list)
 */
export function sumOfSquares(values: readonly number[]): number {
  return values.reduce((acc, val) => acc + val * val, 0);
}

/**
 * Arithmetic mean
 *
 * Returns undefined for an empty list: callers decide whether that is an
 * error or has a meaningful default.
 *
 * @example
 * ```typescript
 * mean([10, 15, 23])  // => 16
 * mean([])            // => undefined
 * ```
 */
export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) {
    return undefined;
  }
  return sum(values) / values.length;
}

/**
 * Division that yields `defaultValue` when the denominator is 0
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)       // => 5
 * safeDivide(10, 0)       // => 0
 * safeDivide(10, 0, 1)    // => 1
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }
  return numerator / denominator;
}
