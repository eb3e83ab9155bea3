import { afterEach, describe, expect, it } from 'vitest';

import {
  DEFAULT_UNITS_CONFIG,
  createUnitsConfig,
  getRuntimeConfig,
  mergeUnitsConfig,
  resetRuntimeConfig,
  setRuntimeConfig,
  validateUnitsConfig,
} from '../../src/config/index.js';
import { getLogLevel } from '../../src/debug/index.js';
import { InvalidArgumentError } from '../../src/errors/units-error.js';

describe('config', () => {
  afterEach(() => {
    resetRuntimeConfig();
  });

  describe('createUnitsConfig', () => {
    it('returns the defaults without overrides', () => {
      expect(createUnitsConfig()).toEqual(DEFAULT_UNITS_CONFIG);
      expect(DEFAULT_UNITS_CONFIG.formatting).toEqual({ precision: 2, delimiter: ' ' });
      expect(DEFAULT_UNITS_CONFIG.transfer.convention).toBe('nominal');
      expect(DEFAULT_UNITS_CONFIG.i18n.defaultLanguage).toBe('en');
      expect(DEFAULT_UNITS_CONFIG.debug.logLevel.defaultLogLevel).toBe('info');
    });

    it('deep merges nested overrides', () => {
      const config = createUnitsConfig({
        formatting: { precision: 3 },
        debug: { logHistory: { maxLogHistoryEntries: 10 } },
      });
      expect(config.formatting).toEqual({ precision: 3, delimiter: ' ' });
      expect(config.debug.logHistory.maxLogHistoryEntries).toBe(10);
      expect(config.debug.logLevel.defaultLogLevel).toBe('info');
    });

    it('replaces arrays instead of merging them', () => {
      const config = createUnitsConfig({ i18n: { bundledLanguages: ['de'] } });
      expect(config.i18n.bundledLanguages).toEqual(['de']);
      expect(config.i18n.defaultLanguage).toBe('en');
    });

    it('does not share state with the defaults', () => {
      const config = createUnitsConfig();
      config.formatting.precision = 5;
      config.i18n.bundledLanguages.push('xx');
      expect(DEFAULT_UNITS_CONFIG.formatting.precision).toBe(2);
      expect(DEFAULT_UNITS_CONFIG.i18n.bundledLanguages).not.toContain('xx');
    });

    it('merges over any base', () => {
      const base = createUnitsConfig({ formatting: { delimiter: '' } });
      expect(mergeUnitsConfig(base, { formatting: { precision: 0 } }).formatting).toEqual({
        precision: 0,
        delimiter: '',
      });
    });
  });

  describe('runtime config', () => {
    it('applies overrides over the defaults', () => {
      setRuntimeConfig({ transfer: { convention: 'exact' } });
      expect(getRuntimeConfig().transfer.convention).toBe('exact');
      expect(getRuntimeConfig().formatting.precision).toBe(2);
    });

    it('applies the log level', () => {
      setRuntimeConfig({ debug: { logLevel: { defaultLogLevel: 'warn' } } });
      expect(getLogLevel()).toBe('warn');
      resetRuntimeConfig();
      expect(getLogLevel()).toBe('info');
    });

    it('rejects invalid values and keeps the previous config', () => {
      setRuntimeConfig({ formatting: { precision: 4 } });
      expect(() => setRuntimeConfig({ formatting: { precision: -1 } })).toThrow(
        'formatting.precision must be a non-negative integer, got -1'
      );
      expect(() => setRuntimeConfig({ formatting: { precision: 1.5 } })).toThrow(
        InvalidArgumentError
      );
      expect(() => setRuntimeConfig({ i18n: { defaultLanguage: ' ' } })).toThrow(
        'i18n.defaultLanguage must not be empty'
      );
      expect(() =>
        setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: -1 } } })
      ).toThrow(InvalidArgumentError);
      expect(getRuntimeConfig().formatting.precision).toBe(4);
    });
  });

  describe('validateUnitsConfig', () => {
    it('accepts the defaults', () => {
      expect(() => validateUnitsConfig(createUnitsConfig())).not.toThrow();
    });
  });
});
