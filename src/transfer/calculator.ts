/**
 * Transfer Calculator
 *
 * Joins sizes and rates: how long a transfer takes, and how much data a
 * rate moves in a given time.
 *
 * Sizes are binary and rates decimal, so transfer times go through a
 * convention (see TransferConvention). Under `nominal` a size moves at its
 * labelled unit count on the decimal scale. Amounts are always
 * `bits / 8` whatever the convention.
 *
 * @module transfer/calculator
 */

import { getRuntimeConfig } from '../config/runtime.js';
import type { TransferConvention } from '../config/schema/index.js';
import { InvalidArgumentError } from '../errors/units-error.js';
import { getDefaultDurationFormatter, type DurationFormatter } from '../i18n/duration.js';
import { pickUnit } from '../units/format.js';
import { BITS_PER_BYTE } from '../units/unit-table.js';
import { Size, type SizeInput } from '../values/size.js';
import { Rate, type RateInput } from '../values/rate.js';

const DECIMAL_BASE = 1000;

// =============================================================================
// Conventions
// =============================================================================

/**
 * Bytes on the wire for a size read at its labelled unit count:
 * 1 GB (2^30 bytes) -> 10^9.
 */
export function nominalBytes(bytes: number): number {
  if (bytes === 0) return 0;
  const unit = pickUnit(bytes, 'size');
  return (bytes / unit.base ** unit.exponent) * DECIMAL_BASE ** unit.exponent;
}

// =============================================================================
// Calculator
// =============================================================================

export interface TransferCalculatorOptions {
  /** Defaults to the configured transfer.convention, read on each call */
  convention?: TransferConvention;
  /** Used by formattedTransferTime(); defaults to the shared formatter */
  durations?: DurationFormatter;
}

export class TransferCalculator {
  private convention: TransferConvention | undefined;
  private durations: DurationFormatter | undefined;

  constructor(options: TransferCalculatorOptions = {}) {
    this.convention = options.convention;
    this.durations = options.durations;
  }

  getConvention(): TransferConvention {
    return this.convention ?? getRuntimeConfig().transfer.convention;
  }

  /**
   * Seconds needed to move `size` at `rate`. Numeric rates are bits per second.
   *
   * @throws InvalidArgumentError when the rate is not positive
   */
  transferTime(size: SizeInput, rate: RateInput): number {
    const bitsPerSecond = Rate.parse(rate);
    if (bitsPerSecond <= 0) {
      throw new InvalidArgumentError('Rate must be positive to calculate transfer time');
    }

    const bytes = Size.parse(size);
    const wireBytes = this.getConvention() === 'nominal' ? nominalBytes(bytes) : bytes;
    return (wireBytes * BITS_PER_BYTE) / bitsPerSecond;
  }

  formattedTransferTime(size: SizeInput, rate: RateInput, language?: string): string {
    const durations = this.durations ?? getDefaultDurationFormatter();
    return durations.format(this.transferTime(size, rate), language);
  }

  /**
   * Bytes moved at `rate` over `seconds`. The convention does not apply.
   *
   * @throws InvalidArgumentError for negative or non-finite seconds
   */
  transferAmount(rate: RateInput, seconds: number): Size {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new InvalidArgumentError(`Seconds must be a non-negative finite number, got ${seconds}`);
    }

    return new Size((Rate.parse(rate) * seconds) / BITS_PER_BYTE);
  }

  /** Same as transferAmount(). */
  estimateFileSize(rate: RateInput, seconds: number): Size {
    return this.transferAmount(rate, seconds);
  }
}

let defaultCalculator: TransferCalculator | null = null;

/**
 * Shared calculator following the runtime config, created on first use.
 */
export function getDefaultTransferCalculator(): TransferCalculator {
  if (!defaultCalculator) {
    defaultCalculator = new TransferCalculator();
  }
  return defaultCalculator;
}
