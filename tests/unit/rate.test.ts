import { describe, expect, it } from 'vitest';

import { Rate } from '../../src/values/rate.js';
import { InvalidArgumentError, UnknownUnitError } from '../../src/errors/units-error.js';

describe('values/rate', () => {
  describe('construction', () => {
    it('stores bits per second', () => {
      expect(new Rate(1000).value).toBe(1000);
      expect(new Rate('100 Mbps').value).toBe(100_000_000);
      expect(new Rate('12.5 MBps').value).toBe(100_000_000);
    });

    it('multiplies numeric byte input by 8', () => {
      expect(new Rate(1000, false).value).toBe(8000);
      expect(new Rate('1 kBps', false).value).toBe(8000);
    });

    it('builds from named factories', () => {
      expect(Rate.kbps(1).value).toBe(1000);
      expect(Rate.gbps(1).value).toBe(1_000_000_000);
      expect(Rate.MBps(1).value).toBe(8_000_000);
      expect(Rate.mbps(1).displayAsBits).toBe(true);
      expect(Rate.MBps(1).displayAsBits).toBe(false);
      expect(Rate.fromUnit(3, 'kBps').displayAsBits).toBe(false);
      expect(Rate.fromUnit(3, 'kBps', true).displayAsBits).toBe(true);
    });

    it('guesses the display family from the unit', () => {
      expect(Rate.fromHumanReadable('12.5 MBps').displayAsBits).toBe(false);
      expect(Rate.fromHumanReadable('100 Mbps').displayAsBits).toBe(true);
      expect(Rate.fromHumanReadable('1000').displayAsBits).toBe(true);
      expect(Rate.fromHumanReadable('12.5 MBps', true).toString()).toBe('100 Mbps');
    });
  });

  describe('conversion', () => {
    it('renders in the display family', () => {
      expect(Rate.mbps(50).toString()).toBe('50 Mbps');
      expect(Rate.MBps(10).toString()).toBe('10 MBps');
    });

    it('renders in an explicit family', () => {
      expect(Rate.mbps(50).toString('byte')).toBe('6.25 MBps');
      expect(Rate.MBps(10).humanize('bit')).toBe('80 Mbps');
      expect(Rate.kbps(1500).humanize('bit', 0, '')).toBe('2Mbps');
    });

    it('renders in a requested unit', () => {
      expect(Rate.MBps(10).to('Mbps')).toBe('80 Mbps');
      expect(Rate.mbps(8).to('MBps')).toBe('1 MBps');
      expect(() => Rate.mbps(8).to('MB')).toThrow(UnknownUnitError);
    });

    it('returns numeric values', () => {
      expect(Rate.kbps(8).getValue('bit')).toBe(8000);
      expect(Rate.kbps(8).getValue('byte')).toBe(1000);
      expect(Rate.kbps(8).getValue('kBps')).toBe(1);
      expect(Rate.bps(1234).getValue('kbps', 1)).toBe(1.2);
      expect(Rate.kbps(8).toBits()).toBe(8000);
      expect(Rate.kbps(8).toBytes()).toBe(1000);
    });

    it('switches display family without changing the value', () => {
      const rate = Rate.mbps(8).withDisplayAs(false);
      expect(rate.value).toBe(8_000_000);
      expect(rate.toString()).toBe('1 MBps');
    });
  });

  describe('arithmetic', () => {
    it('keeps the display family through operations', () => {
      const sum = Rate.MBps(1).increment('1 MBps');
      expect(sum.displayAsBits).toBe(false);
      expect(sum.toString()).toBe('2 MBps');
    });

    it('compares across families', () => {
      expect(Rate.mbps(8).equalTo('1 MBps')).toBe(true);
      expect(Rate.mbps(8).compare('1 Mbps')).toBe(1);
    });

    it('throttles by a factor in [0, 1]', () => {
      expect(Rate.mbps(100).throttle(0.5).value).toBe(50_000_000);
      expect(Rate.mbps(100).throttle(0).isZero()).toBe(true);
      expect(() => Rate.mbps(100).throttle(1.5)).toThrow(InvalidArgumentError);
      expect(() => Rate.mbps(100).throttle(-0.1)).toThrow('Throttle factor must be between 0 and 1');
    });
  });

  describe('collections', () => {
    it('builds inclusive ranges', () => {
      const rates = Rate.range('1 Mbps', '3 Mbps', '1 Mbps').map((r) => r.toString());
      expect(rates).toEqual(['1 Mbps', '2 Mbps', '3 Mbps']);
    });

    it('folds mixed units', () => {
      expect(Rate.sum(['1 MBps', '8 Mbps']).toString()).toBe('16 Mbps');
      expect(Rate.average(['1 Mbps', '3 Mbps']).toString()).toBe('2 Mbps');
      expect(Rate.maximum(['1 Mbps', '1 MBps']).value).toBe(8_000_000);
      expect(Rate.minimum(['1 Mbps', '1 MBps'], false).toString()).toBe('125 kBps');
    });

    it('rejects empty averages', () => {
      expect(() => Rate.average([])).toThrow(InvalidArgumentError);
    });
  });
});
