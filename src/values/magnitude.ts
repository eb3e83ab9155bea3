/**
 * Magnitude Base Class
 *
 * Shared arithmetic and comparison for Size and Rate. Subclasses decide how
 * operands are parsed and how a new instance is built from a canonical
 * value; every operation returns a new instance.
 *
 * @module values/magnitude
 */

import {
  MATCH_MODES,
  type CompareResult,
  type MatchMode,
  addMagnitudes,
  subtractMagnitudes,
  scaleMagnitude,
  divideMagnitudes,
  moduloMagnitudes,
  compareMagnitudes,
  combineResults,
  isInRange,
} from '../units/arithmetic.js';
import type { CanonicalValue } from '../units/parser.js';

// =============================================================================
// Types
// =============================================================================

export type Operand<T> = T | number | string;

/** One operand, or a collection compared under a MatchMode. */
export type OperandList<T> = Operand<T> | readonly Operand<T>[];

/** Inclusive [min, max] pair. */
export type RangeBounds<T> = readonly [Operand<T>, Operand<T>];

function isOperandCollection<T>(operands: OperandList<T>): operands is readonly Operand<T>[] {
  return Array.isArray(operands);
}

function toList<T>(operands: OperandList<T>): readonly Operand<T>[] {
  return isOperandCollection(operands) ? operands : [operands];
}

// =============================================================================
// Magnitude
// =============================================================================

export abstract class Magnitude<T extends Magnitude<T>> implements CanonicalValue {
  /** Canonical value: bytes for sizes, bits per second for rates. */
  readonly value: number;

  protected constructor(value: number) {
    this.value = value;
  }

  /** Build a sibling instance carrying `value`. */
  protected abstract withValue(value: number): T;

  /** Canonical value of an operand of the same family. */
  protected abstract parseOperand(operand: Operand<T>): number;

  // ---------------------------------------------------------------------------
  // Arithmetic
  // ---------------------------------------------------------------------------

  increment(operand: Operand<T>): T {
    return this.withValue(addMagnitudes(this.value, this.parseOperand(operand)));
  }

  /**
   * Throws InvariantError when the operand exceeds this value.
   */
  decrement(operand: Operand<T>): T {
    return this.withValue(subtractMagnitudes(this.value, this.parseOperand(operand)));
  }

  multiply(factor: number): T {
    return this.withValue(scaleMagnitude(this.value, factor));
  }

  divide(operand: Operand<T>): T {
    return this.withValue(divideMagnitudes(this.value, this.parseOperand(operand)));
  }

  modulo(operand: Operand<T>): T {
    return this.withValue(moduloMagnitudes(this.value, this.parseOperand(operand)));
  }

  abs(): T {
    return this.withValue(Math.abs(this.value));
  }

  min(operands: OperandList<T>): T {
    let result = this.value;
    for (const operand of toList(operands)) {
      result = Math.min(result, this.parseOperand(operand));
    }
    return this.withValue(result);
  }

  max(operands: OperandList<T>): T {
    let result = this.value;
    for (const operand of toList(operands)) {
      result = Math.max(result, this.parseOperand(operand));
    }
    return this.withValue(result);
  }

  // ---------------------------------------------------------------------------
  // Comparison
  // ---------------------------------------------------------------------------

  /**
   * 1 when this value is greater than the operand, -1 when smaller, 0 on ties
   * (whatever unit either side was written in).
   */
  compare(operand: Operand<T>): CompareResult {
    return compareMagnitudes(this.value, this.parseOperand(operand));
  }

  equalTo(operands: OperandList<T>, mode: MatchMode = MATCH_MODES.ALL): boolean {
    return this.matches(operands, mode, (v) => this.value === v);
  }

  lessThan(operands: OperandList<T>, mode: MatchMode = MATCH_MODES.ALL): boolean {
    return this.matches(operands, mode, (v) => this.value < v);
  }

  greaterThan(operands: OperandList<T>, mode: MatchMode = MATCH_MODES.ALL): boolean {
    return this.matches(operands, mode, (v) => this.value > v);
  }

  lessThanOrEqual(operands: OperandList<T>, mode: MatchMode = MATCH_MODES.ALL): boolean {
    return this.matches(operands, mode, (v) => this.value <= v);
  }

  greaterThanOrEqual(operands: OperandList<T>, mode: MatchMode = MATCH_MODES.ALL): boolean {
    return this.matches(operands, mode, (v) => this.value >= v);
  }

  /** Inclusive on both ends. */
  between(min: Operand<T>, max: Operand<T>): boolean {
    return isInRange(this.value, this.parseOperand(min), this.parseOperand(max));
  }

  inRanges(ranges: readonly RangeBounds<T>[], mode: MatchMode = MATCH_MODES.ANY): boolean {
    return combineResults(
      ranges.map(([min, max]) => this.between(min, max)),
      mode
    );
  }

  isZero(): boolean {
    return this.value === 0;
  }

  isPositive(): boolean {
    return this.value > 0;
  }

  isNegative(): boolean {
    return this.value < 0;
  }

  toJSON(): number {
    return this.value;
  }

  private matches(
    operands: OperandList<T>,
    mode: MatchMode,
    predicate: (value: number) => boolean
  ): boolean {
    if (!isOperandCollection(operands)) {
      return predicate(this.parseOperand(operands));
    }
    return combineResults(
      operands.map((operand) => predicate(this.parseOperand(operand))),
      mode
    );
  }
}
