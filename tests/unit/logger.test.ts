import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  clearLogHistory,
  disableModules,
  enableModules,
  getLogHistory,
  getLogLevel,
  log,
  resetModuleFilters,
  setLogLevel,
} from '../../src/debug/index.js';
import { formatMessage } from '../../src/debug/logger.js';
import { resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';

describe('debug/logger', () => {
  beforeEach(() => {
    for (const method of ['debug', 'log', 'warn', 'error'] as const) {
      vi.spyOn(console, method).mockImplementation(() => {});
    }
    clearLogHistory();
  });

  afterEach(() => {
    setLogLevel('info');
    resetModuleFilters();
    resetRuntimeConfig();
    clearLogHistory();
    vi.restoreAllMocks();
  });

  it('formats messages with a timestamp and module tag', () => {
    expect(formatMessage('I18n', 'loaded')).toMatch(/^\[\d+\.\dms\]\[I18n\] loaded$/);
  });

  it('records entries with their data', () => {
    log.info('Test', 'hello', { a: 1 });

    const [entry] = getLogHistory();
    expect(entry?.level).toBe('INFO');
    expect(entry?.module).toBe('Test');
    expect(entry?.message).toBe('hello');
    expect(entry?.data).toEqual({ a: 1 });
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('filters by level', () => {
    log.debug('Test', 'hidden');
    log.warn('Test', 'shown');
    expect(getLogHistory().map((e) => e.message)).toEqual(['shown']);

    setLogLevel('debug');
    log.debug('Test', 'now shown');
    expect(getLogHistory({ level: 'debug' }).map((e) => e.message)).toContain('now shown');
    expect(getLogLevel()).toBe('debug');
  });

  it('silences everything but always()', () => {
    setLogLevel('silent');
    log.error('Test', 'dropped');
    log.always('Test', 'kept');
    expect(getLogHistory().map((e) => e.message)).toEqual(['kept']);
  });

  it('falls back to info for unknown levels', () => {
    setLogLevel('loud');
    expect(getLogLevel()).toBe('info');
    expect(getLogHistory({ level: 'warn' })[0]?.message).toBe('Unknown log level "loud", using INFO');
  });

  it('filters by module', () => {
    enableModules('I18n');
    log.info('i18n', 'kept');
    log.info('Config', 'dropped');
    expect(getLogHistory().map((e) => e.message)).toEqual(['kept']);

    resetModuleFilters();
    disableModules('Config');
    log.info('Config', 'dropped again');
    log.info('Transfer', 'kept again');
    expect(getLogHistory({ module: 'transfer' }).map((e) => e.message)).toEqual(['kept again']);
    expect(getLogHistory({ module: 'config' })).toEqual([]);
  });

  it('bounds the history by the configured limit', () => {
    setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: 3 } } });
    clearLogHistory();
    for (let i = 0; i < 5; i++) {
      log.always('Test', `m${i}`);
    }
    expect(getLogHistory().map((e) => e.message)).toEqual(['m2', 'm3', 'm4']);
    expect(getLogHistory({ last: 1 }).map((e) => e.message)).toEqual(['m4']);
  });

  it('filters the history by level and module', () => {
    clearLogHistory();
    log.warn('Test', 'w');
    log.error('Other', 'e');
    expect(getLogHistory({ level: 'warn' }).map((e) => e.message)).toEqual(['w']);
    expect(getLogHistory({ module: 'oth' }).map((e) => e.message)).toEqual(['e']);
  });
});
