// utils.ts
// Scalar helpers used by the segment length bookkeeping.

/**
 * Constrains a value to the inclusive range [min, max].
 * @param {number} x
 * @param {number} min
 * @param {number} max
 * @returns {number}
 */
export function clamp(x: number, min: number, max: number): number {
  if (x > max) return max;
  if (x < min) return min;
  return x;
}

/**
 * Larger of two numbers.
 * @param {number} a
 * @param {number} b
 * @returns {number}
 */
export function maxf(a: number, b: number): number {
  return a > b ? a : b;
}

/**
 * Smaller of two numbers.
 * @param {number} a
 * @param {number} b
 * @returns {number}
 */
export function minf(a: number, b: number): number {
  return a > b ? b : a;
}

/**
 * Compares two floats within an absolute tolerance.
 * @param {number} a
 * @param {number} b
 * @param {number} [eps=1e-4]
 * @returns {boolean}
 */
export function approxEqual(a: number, b: number, eps = 1e-4): boolean {
  return Math.abs(a - b) <= eps;
}
