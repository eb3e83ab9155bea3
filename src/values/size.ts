/**
 * Size
 *
 * Immutable data size stored in bytes. Units are binary: 1 kB = 1024 B.
 *
 * @example
 * ```typescript
 * const file = Size.gb(1.5);
 * file.toString();            // "1.5 GB"
 * file.to('MB', 0);           // "1536 MB"
 * file.increment('512 MB');   // Size(2 GB)
 * new Size('1536').humanize() // "1.5 kB"
 * ```
 *
 * @module values/size
 */

import { Magnitude, type Operand } from './magnitude.js';
import {
  rangeMagnitudes,
  sumMagnitudes,
  averageMagnitudes,
  maximumMagnitude,
  minimumMagnitude,
} from './collections.js';
import { parseMagnitude } from '../units/parser.js';
import { requireUnit, unitFactor, BITS_PER_BYTE, type SizeUnit } from '../units/unit-table.js';
import { convertMagnitude, humanizeMagnitude, renderValue, roundTo } from '../units/format.js';
import { getDefaultTransferCalculator, type TransferCalculator } from '../transfer/calculator.js';
import type { RateInput } from './rate.js';

export type SizeInput = Size | number | string;

export class Size extends Magnitude<Size> {
  /**
   * @param value - bytes, a string such as "1.5 GB", or another Size
   */
  constructor(value: SizeInput) {
    super(parseMagnitude(value, 'size'));
  }

  /** Canonical bytes of any size input. */
  static parse(input: SizeInput): number {
    return parseMagnitude(input, 'size');
  }

  // ===========================================================================
  // Factories
  // ===========================================================================

  /**
   * @param unit - a size symbol (B, kB, MB, ... YB), matched case-insensitively
   */
  static fromUnit(amount: number, unit: SizeUnit | string): Size {
    return new Size(amount * unitFactor(requireUnit(unit, 'size')));
  }

  static fromHumanReadable(text: string): Size {
    return new Size(text);
  }

  static fromBits(bits: number): Size {
    return new Size(bits / BITS_PER_BYTE);
  }

  static bytes(amount: number): Size {
    return Size.fromUnit(amount, 'B');
  }

  static kb(amount: number): Size {
    return Size.fromUnit(amount, 'kB');
  }

  static mb(amount: number): Size {
    return Size.fromUnit(amount, 'MB');
  }

  static gb(amount: number): Size {
    return Size.fromUnit(amount, 'GB');
  }

  static tb(amount: number): Size {
    return Size.fromUnit(amount, 'TB');
  }

  static pb(amount: number): Size {
    return Size.fromUnit(amount, 'PB');
  }

  static eb(amount: number): Size {
    return Size.fromUnit(amount, 'EB');
  }

  static zb(amount: number): Size {
    return Size.fromUnit(amount, 'ZB');
  }

  static yb(amount: number): Size {
    return Size.fromUnit(amount, 'YB');
  }

  // ===========================================================================
  // Collections
  // ===========================================================================

  /** Inclusive of both ends. */
  static range(start: SizeInput, end: SizeInput, step: SizeInput = 1024): Size[] {
    return rangeMagnitudes(Size.parse(start), Size.parse(end), Size.parse(step)).map(
      (value) => new Size(value)
    );
  }

  static sum(sizes: readonly SizeInput[]): Size {
    return new Size(sumMagnitudes(sizes.map(Size.parse)));
  }

  static average(sizes: readonly SizeInput[]): Size {
    return new Size(averageMagnitudes(sizes.map(Size.parse)));
  }

  static maximum(sizes: readonly SizeInput[]): Size {
    return new Size(maximumMagnitude(sizes.map(Size.parse)));
  }

  static minimum(sizes: readonly SizeInput[]): Size {
    return new Size(minimumMagnitude(sizes.map(Size.parse)));
  }

  // ===========================================================================
  // Conversion
  // ===========================================================================

  /**
   * Render in a given unit. Without precision the value is not rounded.
   */
  to(unit: SizeUnit | string, precision: number | null = null, delimiter = ' '): string {
    const spec = requireUnit(unit, 'size');
    return renderValue(convertMagnitude(this.value, spec), spec.symbol, precision, delimiter);
  }

  getValue(unit: SizeUnit | string, precision?: number): number {
    const converted = convertMagnitude(this.value, requireUnit(unit, 'size'));
    return precision === undefined ? converted : roundTo(converted, precision);
  }

  toBytes(): number {
    return this.value;
  }

  toBits(): number {
    return this.value * BITS_PER_BYTE;
  }

  /**
   * Largest unit in which the value is at least 1, e.g. "1.5 kB".
   * Precision and delimiter default to the configured formatting.
   */
  humanize(precision?: number | null, delimiter?: string): string {
    return humanizeMagnitude(this.value, 'size', { precision, delimiter });
  }

  toString(precision?: number | null, delimiter?: string): string {
    return this.humanize(precision, delimiter);
  }

  // ===========================================================================
  // Transfer
  // ===========================================================================

  /** Seconds needed to move this size at `rate`. */
  getTransferTime(rate: RateInput, calculator: TransferCalculator = getDefaultTransferCalculator()): number {
    return calculator.transferTime(this, rate);
  }

  getFormattedTransferTime(
    rate: RateInput,
    language?: string,
    calculator: TransferCalculator = getDefaultTransferCalculator()
  ): string {
    return calculator.formattedTransferTime(this, rate, language);
  }

  protected withValue(value: number): Size {
    return new Size(value);
  }

  protected parseOperand(operand: Operand<Size>): number {
    return Size.parse(operand);
  }
}
