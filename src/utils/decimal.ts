/**
 * Decimal.js Utilities for the Perp Liquidity Analyzer
 *
 * CRITICAL: Book walks accumulate across many levels. Keep every
 * intermediate value in Decimal and round only when formatting output.
 */

import { Decimal } from 'decimal.js';

// Re-export Decimal class and type for use throughout the codebase
export { Decimal };
export type DecimalInput = number | string | Decimal;

// Configure Decimal.js for financial calculations
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9,
  toExpPos: 21,
});

// ============================================================================
// CONVERSION UTILITIES
// ============================================================================

/**
 * Parse an untrusted numeric value. Returns null instead of throwing.
 */
export function parseDecimal(value: unknown): Decimal | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return null;
  }
  try {
    const parsed = new Decimal(typeof value === 'string' ? value.trim() : value);
    return parsed.isFinite() ? parsed : null;
  } catch (error) {
    if (error instanceof Error && error.message.includes('DecimalError')) {
      return null;
    }
    throw error;
  }
}

/**
 * Format a nullable metric, e.g. a slippage that could not be computed
 */
export function formatNullable(value: Decimal | null, decimals = 2, fallback = 'n/a'): string {
  return value === null ? fallback : value.toFixed(decimals);
}

// ============================================================================
// ROUNDING UTILITIES
// ============================================================================

/**
 * Round to a number of decimal places and return a plain number (export layer)
 */
export function roundToNumber(value: Decimal, decimals: number): number {
  return value.toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Same as roundToNumber, passing null through
 */
export function roundNullable(value: Decimal | null, decimals: number): number | null {
  return value === null ? null : roundToNumber(value, decimals);
}

// ============================================================================
// ARITHMETIC UTILITIES
// ============================================================================

/**
 * Sum an array of decimals
 */
export function decimalSum(values: Decimal[]): Decimal {
  return values.reduce((sum, val) => sum.plus(val), new Decimal(0));
}

/**
 * Average of the values that are present. Null when none are.
 */
export function averageAvailable(values: Array<Decimal | null>): Decimal | null {
  const present = values.filter((v): v is Decimal => v !== null);
  if (present.length === 0) return null;
  return decimalSum(present).dividedBy(present.length);
}

/**
 * Smallest of the given decimals
 */
export function decimalMin(first: Decimal, ...rest: Decimal[]): Decimal {
  return rest.reduce((min, val) => Decimal.min(min, val), first);
}

/**
 * Ratio expressed in basis points: (numerator / denominator) * 10000
 */
export function toBps(numerator: Decimal, denominator: Decimal): Decimal {
  return numerator.dividedBy(denominator).times(BPS);
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const ZERO = new Decimal(0);
export const TWO = new Decimal(2);
export const HUNDRED = new Decimal(100);
export const BPS = new Decimal(10_000);
