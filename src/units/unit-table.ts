/**
 * Unit Table
 *
 * Fixed unit symbols for the two magnitude families. Sizes are binary
 * (base 1024) and counted in bytes; rates are decimal (base 1000) and
 * counted in bits per second, with a byte sub-family worth 8 bits per unit.
 *
 * @module units/unit-table
 */

import { UnknownUnitError } from '../errors/units-error.js';

// =============================================================================
// Types
// =============================================================================

export type UnitFamily = 'size' | 'rate-bit' | 'rate-byte';

/** The two value types; rate spans both rate sub-families. */
export type MagnitudeFamily = 'size' | 'rate';

export interface UnitSpec {
  readonly symbol: string;
  readonly exponent: number;
  readonly base: 1024 | 1000;
  readonly family: UnitFamily;
}

export const SIZE_UNIT_SYMBOLS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB'] as const;

export const RATE_BIT_UNIT_SYMBOLS = [
  'bps', 'kbps', 'Mbps', 'Gbps', 'Tbps', 'Pbps', 'Ebps', 'Zbps', 'Ybps',
] as const;

export const RATE_BYTE_UNIT_SYMBOLS = [
  'Bps', 'kBps', 'MBps', 'GBps', 'TBps', 'PBps', 'EBps', 'ZBps', 'YBps',
] as const;

export type SizeUnit = (typeof SIZE_UNIT_SYMBOLS)[number];
export type RateBitUnit = (typeof RATE_BIT_UNIT_SYMBOLS)[number];
export type RateByteUnit = (typeof RATE_BYTE_UNIT_SYMBOLS)[number];
export type RateUnit = RateBitUnit | RateByteUnit;

/** Bits per byte; rate byte units scale by this on top of 1000^exponent. */
export const BITS_PER_BYTE = 8;

// =============================================================================
// Tables
// =============================================================================

function buildUnits(
  symbols: readonly string[],
  base: 1024 | 1000,
  family: UnitFamily
): readonly UnitSpec[] {
  return Object.freeze(
    symbols.map((symbol, exponent) => Object.freeze({ symbol, exponent, base, family }))
  );
}

/** Ordered by exponent, smallest first. */
export const SIZE_UNITS = buildUnits(SIZE_UNIT_SYMBOLS, 1024, 'size');
export const RATE_BIT_UNITS = buildUnits(RATE_BIT_UNIT_SYMBOLS, 1000, 'rate-bit');
export const RATE_BYTE_UNITS = buildUnits(RATE_BYTE_UNIT_SYMBOLS, 1000, 'rate-byte');

const UNITS_BY_FAMILY: Record<UnitFamily, readonly UnitSpec[]> = {
  size: SIZE_UNITS,
  'rate-bit': RATE_BIT_UNITS,
  'rate-byte': RATE_BYTE_UNITS,
};

/**
 * Lookup order per value type. For rates the bit family comes first, so a
 * case-insensitive "mbps" resolves to Mbps rather than MBps.
 */
export const FAMILY_LOOKUP_ORDER: Record<MagnitudeFamily, readonly UnitFamily[]> = {
  size: ['size'],
  rate: ['rate-bit', 'rate-byte'],
};

export function unitsFor(family: UnitFamily): readonly UnitSpec[] {
  return UNITS_BY_FAMILY[family];
}

/**
 * Canonical units (bytes, or bits per second) in one of `unit`.
 */
export function unitFactor(unit: UnitSpec): number {
  const scale = unit.base ** unit.exponent;
  return unit.family === 'rate-byte' ? scale * BITS_PER_BYTE : scale;
}

// =============================================================================
// Lookup
// =============================================================================

/**
 * Find a unit by symbol. An exact-case match wins; otherwise the first
 * case-insensitive match in lookup order.
 */
export function findUnit(symbol: string, family: MagnitudeFamily): UnitSpec | undefined {
  const families = FAMILY_LOOKUP_ORDER[family];

  for (const f of families) {
    const exact = UNITS_BY_FAMILY[f].find((u) => u.symbol === symbol);
    if (exact) return exact;
  }

  const lower = symbol.toLowerCase();
  for (const f of families) {
    const loose = UNITS_BY_FAMILY[f].find((u) => u.symbol.toLowerCase() === lower);
    if (loose) return loose;
  }

  return undefined;
}

export function requireUnit(symbol: string, family: MagnitudeFamily): UnitSpec {
  const unit = findUnit(symbol, family);
  if (!unit) {
    throw new UnknownUnitError(symbol);
  }
  return unit;
}
