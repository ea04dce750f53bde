/**
 * Numeric helpers shared by the scheduler statistics and the built-in
 * embedding handler.
 */

/**
 * Mean of `values`, or `defaultValue` for an empty list.
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])   // => 2
 * safeAverage([], 100)     // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * `numerator / denominator`, or `defaultValue` when the denominator is 0.
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Scale a vector in place to unit Euclidean length. A zero vector is left
 * untouched.
 */
export function l2NormalizeInPlace(vector: number[]): number[] {
  let sumSquares = 0;
  for (const component of vector) {
    sumSquares += component * component;
  }

  if (sumSquares === 0) {
    return vector;
  }

  const norm = Math.sqrt(sumSquares);
  for (let i = 0; i < vector.length; i++) {
    vector[i] = vector[i] / norm;
  }
  return vector;
}
