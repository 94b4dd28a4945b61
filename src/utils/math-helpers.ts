/**
 * Math Helper Utilities
 *
 * Small numeric building blocks shared by the permutation test, the
 * entropy ranking of dimensions and the reporting projections.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @param values - Array of numbers to average
 * @param defaultValue - Value to return if array is empty (default: 0)
 * @returns Average of values, or defaultValue if array is empty
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([])               // => 0
 * safeAverage([], NaN)          // => NaN
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return safeSum(values) / values.length;
}

export function safeSum(values: readonly number[]): number {
  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Number of ways to choose k of n items, as a float.
 *
 * Overflows to Infinity instead of losing the order of magnitude, which is
 * all the exact-enumeration guard needs.
 *
 * @example
 * ```typescript
 * binomialCoefficient(6, 3)     // => 20
 * binomialCoefficient(100, 50)  // => ~1.0089e29
 * ```
 */
export function binomialCoefficient(n: number, k: number): number {
  if (k < 0 || k > n) {
    return 0;
  }

  const r = Math.min(k, n - k);
  let result = 1;
  for (let i = 1; i <= r; i++) {
    result = (result * (n - r + i)) / i;
  }

  return Math.round(result);
}

/**
 * Shannon entropy (natural log) of the distribution given by raw counts.
 *
 * Counts are normalised first. They are summed in ascending order so that
 * two permutations of the same counts produce bit-identical entropies.
 *
 * @example
 * ```typescript
 * shannonEntropy([5])      // => 0
 * shannonEntropy([1, 1])   // => Math.LN2
 * ```
 */
export function shannonEntropy(counts: readonly number[]): number {
  const positive = counts.filter((count) => count > 0).sort((a, b) => a - b);
  const total = safeSum(positive);
  if (total === 0) {
    return 0;
  }

  let entropy = 0;
  for (const count of positive) {
    const p = count / total;
    entropy -= p * Math.log(p);
  }

  // -0 from a single bucket
  return entropy === 0 ? 0 : entropy;
}
