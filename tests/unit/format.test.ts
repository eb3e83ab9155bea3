import { afterEach, describe, expect, it } from 'vitest';

import { humanizeMagnitude, pickUnit, renderValue, roundTo } from '../../src/units/format.js';
import { InvalidArgumentError } from '../../src/errors/units-error.js';
import { resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';
import {
  RATE_BIT_UNITS,
  RATE_BYTE_UNITS,
  SIZE_UNITS,
  unitFactor,
  type UnitSpec,
} from '../../src/units/unit-table.js';
import { Size } from '../../src/values/size.js';
import { Rate } from '../../src/values/rate.js';

describe('units/format', () => {
  afterEach(() => {
    resetRuntimeConfig();
  });

  describe('roundTo', () => {
    it('rounds half away from zero', () => {
      expect(roundTo(2.5, 0)).toBe(3);
      expect(roundTo(-2.5, 0)).toBe(-3);
      expect(roundTo(1.005, 2)).toBe(1.01);
    });

    it('never returns negative zero', () => {
      expect(Object.is(roundTo(-0.001, 2), 0)).toBe(true);
    });

    it('leaves values that are already at the precision untouched', () => {
      expect(roundTo(Number.MAX_SAFE_INTEGER, 0)).toBe(Number.MAX_SAFE_INTEGER);
      expect(roundTo(1234567890123456, 2)).toBe(1234567890123456);
      expect(roundTo(-42.5, 1)).toBe(-42.5);
    });

    it('rejects fractional precision', () => {
      expect(() => roundTo(1.5, 1.5)).toThrow(InvalidArgumentError);
    });
  });

  describe('pickUnit', () => {
    it('picks the largest unit with a value of at least one', () => {
      expect(pickUnit(1536, 'size').symbol).toBe('kB');
      expect(pickUnit(1023, 'size').symbol).toBe('B');
      expect(pickUnit(-2048, 'size').symbol).toBe('kB');
      expect(pickUnit(100_000_000, 'rate-bit').symbol).toBe('Mbps');
    });

    it('falls back to the base unit for zero', () => {
      expect(pickUnit(0, 'rate-byte').symbol).toBe('Bps');
    });
  });

  describe('renderValue', () => {
    it('does not pad trailing zeros', () => {
      expect(renderValue(1.5, 'kB', 2, ' ')).toBe('1.5 kB');
      expect(renderValue(2, 'MB', 2, '')).toBe('2MB');
    });

    it('leaves the value alone without precision', () => {
      expect(renderValue(1 / 3, 'B', null, ' ')).toBe(`${1 / 3} B`);
    });
  });

  describe('humanizeMagnitude', () => {
    it('renders sizes', () => {
      expect(humanizeMagnitude(1536, 'size')).toBe('1.5 kB');
      expect(humanizeMagnitude(1024, 'size')).toBe('1 kB');
      expect(humanizeMagnitude(1310720, 'size')).toBe('1.25 MB');
      expect(humanizeMagnitude(-2048, 'size')).toBe('-2 kB');
    });

    it('renders values below one unit in the base unit', () => {
      expect(humanizeMagnitude(0, 'size')).toBe('0 B');
      expect(humanizeMagnitude(0.5, 'size')).toBe('0.5 B');
      expect(humanizeMagnitude(1023, 'size')).toBe('1023 B');
    });

    it('renders rates in either family', () => {
      expect(humanizeMagnitude(100_000_000, 'rate-bit')).toBe('100 Mbps');
      expect(humanizeMagnitude(100_000_000, 'rate-byte')).toBe('12.5 MBps');
    });

    it('honours explicit precision and delimiter', () => {
      expect(humanizeMagnitude(1500, 'rate-bit', { precision: 0 })).toBe('2 kbps');
      expect(humanizeMagnitude(1000, 'size', { precision: null })).toBe('1000 B');
      expect(humanizeMagnitude(1536, 'size', { delimiter: '' })).toBe('1.5kB');
      expect(humanizeMagnitude(1024 / 3, 'size')).toBe('341.33 B');
    });

    it('uses the configured defaults', () => {
      setRuntimeConfig({ formatting: { precision: 1, delimiter: '_' } });
      expect(humanizeMagnitude(1600, 'size')).toBe('1.6_kB');
    });
  });

  describe('round trips', () => {
    const precision = 2;
    const tolerance = (unit: UnitSpec) => 0.5 * 10 ** -precision * unitFactor(unit);

    const size = new Size(1234567.891);
    it.each(SIZE_UNITS.map((unit): [string, UnitSpec] => [unit.symbol, unit]))(
      'reparses a size rendered in %s within precision',
      (symbol, unit) => {
        const reparsed = Size.parse(size.to(symbol, precision));
        expect(Math.abs(reparsed - size.value)).toBeLessThanOrEqual(tolerance(unit));
      }
    );

    const rate = new Rate(1234567.891);
    const rateUnits = [...RATE_BIT_UNITS, ...RATE_BYTE_UNITS];
    it.each(rateUnits.map((unit): [string, UnitSpec] => [unit.symbol, unit]))(
      'reparses a rate rendered in %s within precision',
      (symbol, unit) => {
        const reparsed = Rate.parse(rate.to(symbol, precision));
        expect(Math.abs(reparsed - rate.value)).toBeLessThanOrEqual(tolerance(unit));
      }
    );

    it('keeps every digit of large values', () => {
      expect(new Size(1234567890123456).to('B', 2)).toBe('1234567890123456 B');
      expect(Size.parse(new Size(1234567890123456).to('B', 2))).toBe(1234567890123456);
      expect(new Size(Number.MAX_SAFE_INTEGER).getValue('B', 0)).toBe(Number.MAX_SAFE_INTEGER);
      expect(new Rate(Number.MAX_SAFE_INTEGER).getValue('bps', 0)).toBe(Number.MAX_SAFE_INTEGER);
    });

    it.each([1, 1536, 1310720, 123456789, 9e9, 5e15])(
      'humanizes %d bytes the same after reparsing',
      (bytes) => {
        const once = new Size(bytes).humanize();
        expect(new Size(once).humanize()).toBe(once);
      }
    );

    it.each([1, 1500, 12345678, 100_000_000, 2.5e12])(
      'humanizes %d bits per second the same after reparsing',
      (bits) => {
        const asBits = new Rate(bits).humanize();
        expect(Rate.fromHumanReadable(asBits).humanize()).toBe(asBits);

        const asBytes = new Rate(bits, true, false).humanize();
        expect(Rate.fromHumanReadable(asBytes).humanize()).toBe(asBytes);
      }
    );
  });
});
