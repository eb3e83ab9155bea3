/**
 * Arithmetic Engine
 *
 * Pure operations over canonical magnitudes. Value classes wrap these and
 * return new instances; nothing here mutates.
 *
 * @module units/arithmetic
 */

import {
  DivideByZeroError,
  InvalidArgumentError,
  InvariantError,
} from '../errors/units-error.js';

// =============================================================================
// Constants
// =============================================================================

export const COMPARE_LT = -1;
export const COMPARE_EQ = 0;
export const COMPARE_GT = 1;

export type CompareResult = typeof COMPARE_LT | typeof COMPARE_EQ | typeof COMPARE_GT;

/** How per-operand results combine when comparing against a collection. */
export const MATCH_MODES = {
  ALL: 'all',
  ANY: 'any',
} as const;

export type MatchMode = (typeof MATCH_MODES)[keyof typeof MATCH_MODES];

// =============================================================================
// Operations
// =============================================================================

export function addMagnitudes(a: number, b: number): number {
  return a + b;
}

/**
 * `a - b`; a result below zero is an invariant violation, never clamped.
 */
export function subtractMagnitudes(a: number, b: number): number {
  if (b > a) {
    throw new InvariantError(
      `Value to decrement (${b}) cannot be greater than the current value (${a})`
    );
  }
  return a - b;
}

export function scaleMagnitude(a: number, factor: number): number {
  if (!Number.isFinite(factor)) {
    throw new InvalidArgumentError(`Factor must be a finite number, got ${factor}`);
  }
  return a * factor;
}

export function divideMagnitudes(a: number, b: number): number {
  if (b === 0) {
    throw new DivideByZeroError();
  }
  return a / b;
}

/**
 * Remainder with the sign of the dividend.
 */
export function moduloMagnitudes(a: number, b: number): number {
  if (b === 0) {
    throw new DivideByZeroError('Cannot take modulo by zero');
  }
  return a % b;
}

export function compareMagnitudes(a: number, b: number): CompareResult {
  if (a === b) return COMPARE_EQ;
  return a > b ? COMPARE_GT : COMPARE_LT;
}

export function isInRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

/**
 * Combine per-operand results. An empty collection is true under ALL and
 * false under ANY.
 */
export function combineResults(results: readonly boolean[], mode: MatchMode): boolean {
  switch (mode) {
    case MATCH_MODES.ALL:
      return results.every(Boolean);
    case MATCH_MODES.ANY:
      return results.some(Boolean);
    default:
      throw new InvalidArgumentError(`Invalid mode: ${String(mode)}`);
  }
}
