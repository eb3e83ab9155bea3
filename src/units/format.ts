/**
 * Conversion and Humanization
 *
 * @module units/format
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { InvalidArgumentError } from '../errors/units-error.js';
import { unitFactor, unitsFor, type UnitFamily, type UnitSpec } from './unit-table.js';

export interface HumanizeOptions {
  /** Decimal places; null disables rounding. Defaults to the configured precision. */
  precision?: number | null;
  /** Defaults to the configured delimiter. */
  delimiter?: string;
}

const MAX_CORRECTED_SCALE = 1e15;

/**
 * Round half away from zero. Negative precision rounds to tens, hundreds, ...
 */
export function roundTo(value: number, precision: number): number {
  if (!Number.isInteger(precision)) {
    throw new InvalidArgumentError(`Precision must be an integer, got ${precision}`);
  }
  const factor = 10 ** precision;
  const scaled = Math.abs(value) * factor;
  if (Number.isInteger(scaled)) {
    return value === 0 ? 0 : value;
  }
  // toPrecision(15) absorbs binary noise such as 1.005 * 100 = 100.49999999999999;
  // above 10^15 it would cut integer digits
  const corrected = scaled < MAX_CORRECTED_SCALE ? Number(scaled.toPrecision(15)) : scaled;
  const rounded = (Math.sign(value) * Math.round(corrected)) / factor;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Value of `magnitude` expressed in `unit`.
 */
export function convertMagnitude(magnitude: number, unit: UnitSpec): number {
  return magnitude / unitFactor(unit);
}

/**
 * Largest unit of the family in which |magnitude| is at least 1, or the
 * base unit when there is none (including zero).
 */
export function pickUnit(magnitude: number, family: UnitFamily): UnitSpec {
  const units = unitsFor(family);
  const absolute = Math.abs(magnitude);

  for (let i = units.length - 1; i > 0; i--) {
    const unit = units[i];
    if (unit && absolute / unitFactor(unit) >= 1) {
      return unit;
    }
  }

  const [base] = units;
  if (!base) {
    throw new InvalidArgumentError(`No units registered for family "${family}"`);
  }
  return base;
}

/**
 * Render `<value><delimiter><symbol>`, rounding when precision is a number.
 * Trailing zeros are not padded ("1.5 kB", never "1.50 kB").
 */
export function renderValue(
  value: number,
  symbol: string,
  precision: number | null,
  delimiter: string
): string {
  const shown = precision === null ? value : roundTo(value, precision);
  return `${shown}${delimiter}${symbol}`;
}

/**
 * Render a magnitude in the largest fitting unit of `family`.
 */
export function humanizeMagnitude(
  magnitude: number,
  family: UnitFamily,
  options: HumanizeOptions = {}
): string {
  const defaults = getRuntimeConfig().formatting;
  const precision = options.precision === undefined ? defaults.precision : options.precision;
  const delimiter = options.delimiter ?? defaults.delimiter;

  if (magnitude === 0) {
    const base = pickUnit(0, family);
    return renderValue(0, base.symbol, precision, delimiter);
  }

  const unit = pickUnit(magnitude, family);
  return renderValue(convertMagnitude(magnitude, unit), unit.symbol, precision, delimiter);
}
