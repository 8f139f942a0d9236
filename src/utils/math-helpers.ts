/**
 * Math Helper Utilities
 *
 * Safe mathematical operations that guard against division by zero,
 * NaN propagation, and other edge cases.
 */

/**
 * Calculate safe division that guards against division by zero
 *
 * @param defaultValue - Value to return if the quotient is not finite (default: 0)
 * @returns numerator / denominator, or defaultValue if denominator is 0
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, 0, 100)   // => 100
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  const quotient = numerator / denominator;
  return Number.isFinite(quotient) ? quotient : defaultValue;
}

/**
 * Round to a fixed number of decimals, returning a number (not a string)
 *
 * @example
 * ```typescript
 * roundTo(5.40184, 2)   // => 5.4
 * roundTo(1138.5, 0)    // => 1139
 * ```
 */
export function roundTo(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
