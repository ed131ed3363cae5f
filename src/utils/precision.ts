/**
 * Decimal rounding helpers for exchange price and quantity precision
 */

const EPSILON = 1e-9;

/**
 * Rounds down to the given number of decimal places
 */
export function roundDown(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.floor(value * factor + EPSILON) / factor;
}

export function roundToPrecision(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Formats a number for an exchange payload without exponent notation
 */
export function formatDecimal(value: number, decimals: number): string {
  return roundToPrecision(value, decimals).toFixed(decimals);
}

export function almostEqual(a: number, b: number, tolerance: number = EPSILON): boolean {
  return Math.abs(a - b) <= tolerance;
}
