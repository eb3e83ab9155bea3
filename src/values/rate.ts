/**
 * Rate
 *
 * Immutable data-transfer rate stored in bits per second. Units are
 * decimal (1 kbps = 1000 bps); byte units (kBps, MBps, ...) are worth
 * 8 bits each. `displayAsBits` only picks the family used by toString().
 *
 * @example
 * ```typescript
 * const link = Rate.mbps(50);
 * link.toString();          // "50 Mbps"
 * link.toString('byte');    // "6.25 MBps"
 * Rate.MBps(10).to('Mbps'); // "80 Mbps"
 * ```
 *
 * @module values/rate
 */

import { Magnitude, type Operand } from './magnitude.js';
import {
  rangeMagnitudes,
  sumMagnitudes,
  averageMagnitudes,
  maximumMagnitude,
  minimumMagnitude,
} from './collections.js';
import { parseMagnitude, tokenizeMagnitude } from '../units/parser.js';
import {
  requireUnit,
  unitFactor,
  BITS_PER_BYTE,
  type RateUnit,
  type UnitFamily,
} from '../units/unit-table.js';
import { convertMagnitude, humanizeMagnitude, renderValue, roundTo } from '../units/format.js';
import { InvalidArgumentError } from '../errors/units-error.js';
import { getDefaultTransferCalculator, type TransferCalculator } from '../transfer/calculator.js';
import type { Size, SizeInput } from './size.js';

export type RateInput = Rate | number | string;

/** Unit family used when rendering without an explicit unit. */
export type RateDisplay = 'bit' | 'byte';

function displayFamily(display: RateDisplay): UnitFamily {
  switch (display) {
    case 'bit':
      return 'rate-bit';
    case 'byte':
      return 'rate-byte';
    default:
      throw new InvalidArgumentError(`Invalid type: ${String(display)}. Must be 'bit' or 'byte'`);
  }
}

export class Rate extends Magnitude<Rate> {
  readonly displayAsBits: boolean;

  /**
   * @param value - a number, a string such as "100 Mbps" or "12.5 MBps", or another Rate
   * @param isBits - whether a numeric value is bits (true) or bytes (false) per second
   * @param displayAsBits - render in bit units (true) or byte units (false) by default
   */
  constructor(value: RateInput, isBits = true, displayAsBits = true) {
    super(Rate.parse(value, isBits));
    this.displayAsBits = displayAsBits;
  }

  /**
   * Canonical bits per second of any rate input. `isBits` only affects
   * plain numbers; strings carry their own unit.
   */
  static parse(input: RateInput, isBits = true): number {
    const value = parseMagnitude(input, 'rate');
    return typeof input === 'number' && !isBits ? value * BITS_PER_BYTE : value;
  }

  // ===========================================================================
  // Factories
  // ===========================================================================

  /**
   * Build from an amount in any rate unit. The display family defaults to
   * the family of `unit`.
   */
  static fromUnit(amount: number, unit: RateUnit | string, displayAsBits?: boolean): Rate {
    const spec = requireUnit(unit, 'rate');
    return new Rate(
      amount * unitFactor(spec),
      true,
      displayAsBits ?? spec.family === 'rate-bit'
    );
  }

  /**
   * Parse a string, guessing the display family from its unit when not given.
   */
  static fromHumanReadable(text: string, displayAsBits?: boolean): Rate {
    const { unit } = tokenizeMagnitude(text, 'rate');
    const display = displayAsBits ?? (unit === null || unit.family === 'rate-bit');
    return new Rate(text, true, display);
  }

  static bps(amount: number, displayAsBits = true): Rate {
    return Rate.fromUnit(amount, 'bps', displayAsBits);
  }

  static kbps(amount: number, displayAsBits = true): Rate {
    return Rate.fromUnit(amount, 'kbps', displayAsBits);
  }

  static mbps(amount: number, displayAsBits = true): Rate {
    return Rate.fromUnit(amount, 'Mbps', displayAsBits);
  }

  static gbps(amount: number, displayAsBits = true): Rate {
    return Rate.fromUnit(amount, 'Gbps', displayAsBits);
  }

  static tbps(amount: number, displayAsBits = true): Rate {
    return Rate.fromUnit(amount, 'Tbps', displayAsBits);
  }

  static Bps(amount: number, displayAsBits = false): Rate {
    return Rate.fromUnit(amount, 'Bps', displayAsBits);
  }

  static kBps(amount: number, displayAsBits = false): Rate {
    return Rate.fromUnit(amount, 'kBps', displayAsBits);
  }

  static MBps(amount: number, displayAsBits = false): Rate {
    return Rate.fromUnit(amount, 'MBps', displayAsBits);
  }

  static GBps(amount: number, displayAsBits = false): Rate {
    return Rate.fromUnit(amount, 'GBps', displayAsBits);
  }

  static TBps(amount: number, displayAsBits = false): Rate {
    return Rate.fromUnit(amount, 'TBps', displayAsBits);
  }

  // ===========================================================================
  // Collections
  // ===========================================================================

  /** Inclusive of both ends. */
  static range(
    start: RateInput,
    end: RateInput,
    step: RateInput = 1000,
    displayAsBits = true
  ): Rate[] {
    return rangeMagnitudes(Rate.parse(start), Rate.parse(end), Rate.parse(step)).map(
      (value) => new Rate(value, true, displayAsBits)
    );
  }

  static sum(rates: readonly RateInput[], displayAsBits = true): Rate {
    return new Rate(sumMagnitudes(rates.map((r) => Rate.parse(r))), true, displayAsBits);
  }

  static average(rates: readonly RateInput[], displayAsBits = true): Rate {
    return new Rate(averageMagnitudes(rates.map((r) => Rate.parse(r))), true, displayAsBits);
  }

  static maximum(rates: readonly RateInput[], displayAsBits = true): Rate {
    return new Rate(maximumMagnitude(rates.map((r) => Rate.parse(r))), true, displayAsBits);
  }

  static minimum(rates: readonly RateInput[], displayAsBits = true): Rate {
    return new Rate(minimumMagnitude(rates.map((r) => Rate.parse(r))), true, displayAsBits);
  }

  // ===========================================================================
  // Conversion
  // ===========================================================================

  toBits(): number {
    return this.value;
  }

  toBytes(): number {
    return this.value / BITS_PER_BYTE;
  }

  /**
   * Render in a given bit or byte unit. Without precision the value is not rounded.
   */
  to(unit: RateUnit | string, precision: number | null = null, delimiter = ' '): string {
    const spec = requireUnit(unit, 'rate');
    return renderValue(convertMagnitude(this.value, spec), spec.symbol, precision, delimiter);
  }

  /**
   * Numeric value in `unit`; 'bit' and 'byte' give bits or bytes per second.
   */
  getValue(unit: RateUnit | RateDisplay | string, precision?: number): number {
    let converted: number;
    if (unit === 'bit') {
      converted = this.toBits();
    } else if (unit === 'byte') {
      converted = this.toBytes();
    } else {
      converted = convertMagnitude(this.value, requireUnit(unit, 'rate'));
    }
    return precision === undefined ? converted : roundTo(converted, precision);
  }

  humanize(display?: RateDisplay, precision?: number | null, delimiter?: string): string {
    const family = displayFamily(display ?? (this.displayAsBits ? 'bit' : 'byte'));
    return humanizeMagnitude(this.value, family, { precision, delimiter });
  }

  toString(display?: RateDisplay, precision?: number | null, delimiter?: string): string {
    return this.humanize(display, precision, delimiter);
  }

  withDisplayAs(displayAsBits: boolean): Rate {
    return new Rate(this.value, true, displayAsBits);
  }

  /**
   * Scale down by a factor in [0, 1].
   */
  throttle(factor: number): Rate {
    if (!(factor >= 0 && factor <= 1)) {
      throw new InvalidArgumentError('Throttle factor must be between 0 and 1');
    }
    return this.multiply(factor);
  }

  // ===========================================================================
  // Transfer
  // ===========================================================================

  calculateTransferTime(
    size: SizeInput,
    calculator: TransferCalculator = getDefaultTransferCalculator()
  ): number {
    return calculator.transferTime(size, this);
  }

  getFormattedTransferTime(
    size: SizeInput,
    language?: string,
    calculator: TransferCalculator = getDefaultTransferCalculator()
  ): string {
    return calculator.formattedTransferTime(size, this, language);
  }

  calculateTransferAmount(
    seconds: number,
    calculator: TransferCalculator = getDefaultTransferCalculator()
  ): Size {
    return calculator.transferAmount(this, seconds);
  }

  estimateFileSize(
    seconds: number,
    calculator: TransferCalculator = getDefaultTransferCalculator()
  ): Size {
    return calculator.estimateFileSize(this, seconds);
  }

  protected withValue(value: number): Rate {
    return new Rate(value, true, this.displayAsBits);
  }

  protected parseOperand(operand: Operand<Rate>): number {
    return Rate.parse(operand);
  }
}
