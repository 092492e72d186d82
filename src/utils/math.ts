/**
 * Currency arithmetic helpers.
 * Amounts are plain numbers in reais; rounding happens only when formatting.
 */

/**
 * Sums a list of amounts.
 *
 * @example
 * ```ts
 * sumAmounts([1200, 150.5]) // returns 1350.5
 * ```
 */
export function sumAmounts(amounts: readonly number[]): number {
  return amounts.reduce((sum, amount) => sum + amount, 0);
}

/**
 * Arithmetic mean; 0 for an empty list.
 */
export function average(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return sumAmounts(values) / values.length;
}
