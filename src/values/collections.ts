/**
 * Collection Helpers
 *
 * Canonical-value folds behind Size/Rate range, sum, average, maximum
 * and minimum.
 *
 * @module values/collections
 */

import { InvalidArgumentError } from '../errors/units-error.js';

const RANGE_TOLERANCE = 1e-9;

/**
 * start, start + step, ... up to and including end.
 */
export function rangeMagnitudes(start: number, end: number, step: number): number[] {
  if (end < start) {
    throw new InvalidArgumentError('End value cannot be less than start value');
  }
  if (step <= 0) {
    throw new InvalidArgumentError('Step value must be greater than zero');
  }

  // float error may leave `end` a hair past the last whole step
  const count = Math.floor((end - start) / step + RANGE_TOLERANCE) + 1;
  const result: number[] = [];
  for (let i = 0; i < count; i++) {
    result.push(Math.min(start + i * step, end));
  }
  return result;
}

export function sumMagnitudes(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function requireNonEmpty(values: readonly number[], operation: string): void {
  if (values.length === 0) {
    throw new InvalidArgumentError(`Cannot compute ${operation} of an empty collection`);
  }
}

export function averageMagnitudes(values: readonly number[]): number {
  requireNonEmpty(values, 'average');
  return sumMagnitudes(values) / values.length;
}

export function maximumMagnitude(values: readonly number[]): number {
  requireNonEmpty(values, 'maximum');
  return values.reduce((a, b) => Math.max(a, b));
}

export function minimumMagnitude(values: readonly number[]): number {
  requireNonEmpty(values, 'minimum');
  return values.reduce((a, b) => Math.min(a, b));
}
