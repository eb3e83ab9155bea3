/**
 * Magnitude Parser
 *
 * Turns a value object, a raw number, or a string such as "1.5 GB" or
 * "100Mbps" into a canonical magnitude (bytes for sizes, bits per second
 * for rates). Strings must be consumed entirely.
 *
 * @module units/parser
 */

import { ParseError } from '../errors/units-error.js';
import { findUnit, unitFactor, type MagnitudeFamily, type UnitSpec } from './unit-table.js';

/** Anything that already carries a canonical value. */
export interface CanonicalValue {
  readonly value: number;
}

export type MagnitudeInput<T extends CanonicalValue = CanonicalValue> = T | number | string;

const NUMERIC_PREFIX = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const UNIT_TOKEN = /^[A-Za-z]{1,4}$/;
const NUMERIC_TAIL = /^[\d.]/;

/** A parsed string before scaling: the literal and its unit, if any. */
export interface MagnitudeToken {
  amount: number;
  unit: UnitSpec | null;
}

/**
 * Split a string into its numeric literal and unit. A bare number
 * ("1536") has no unit; otherwise the unit token is 1-4 letters, with
 * optional whitespace before it.
 */
export function tokenizeMagnitude(input: string, family: MagnitudeFamily): MagnitudeToken {
  const text = input.trim();
  const numeric = NUMERIC_PREFIX.exec(text);
  if (!numeric) {
    throw new ParseError('invalid numeric portion', input);
  }

  const amount = Number(numeric[0]);
  if (!Number.isFinite(amount)) {
    throw new ParseError('invalid numeric portion', input);
  }

  const rest = text.slice(numeric[0].length).trimStart();
  if (rest === '') {
    return { amount, unit: null };
  }

  if (!UNIT_TOKEN.test(rest)) {
    const reason = NUMERIC_TAIL.test(rest) ? 'invalid numeric portion' : 'unrecognized unit';
    throw new ParseError(reason, input);
  }

  const unit = findUnit(rest, family);
  if (!unit) {
    throw new ParseError('unrecognized unit', input);
  }

  return { amount, unit };
}

/**
 * Parse a string into a canonical magnitude. A bare number is already
 * canonical.
 */
export function parseMagnitudeString(input: string, family: MagnitudeFamily): number {
  const { amount, unit } = tokenizeMagnitude(input, family);
  return unit ? amount * unitFactor(unit) : amount;
}

/**
 * Normalize any supported input to a canonical magnitude.
 *
 * Value objects return their stored value unchanged and numbers are taken
 * as already canonical, which lets every operation mix typed values with
 * raw numbers and strings.
 */
export function parseMagnitude<T extends CanonicalValue>(
  input: MagnitudeInput<T>,
  family: MagnitudeFamily
): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new ParseError('invalid numeric portion', String(input));
    }
    return input;
  }

  if (typeof input === 'string') {
    return parseMagnitudeString(input, family);
  }

  return input.value;
}
