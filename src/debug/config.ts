/**
 * Debug Module - Configuration
 *
 * Manages the log level and module filters.
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';
import { LOG_LEVELS, LOG_LEVEL_NAMES, type LogLevelName, type LogLevelValue } from './types.js';
import {
  currentLogLevel,
  enabledModules,
  disabledModules,
  setCurrentLogLevel,
  setEnabledModules,
} from './state.js';
import { log } from './logger.js';

const LEVEL_MAP: Record<LogLevelName, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

export function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

/**
 * Set the global log level. Unknown names fall back to 'info'.
 */
export function setLogLevel(level: string): void {
  const name = level.toLowerCase();
  if (!isLogLevelName(name)) {
    setCurrentLogLevel(LOG_LEVELS.INFO);
    log.warn('Debug', `Unknown log level "${level}", using INFO`);
    return;
  }
  setCurrentLogLevel(LEVEL_MAP[name]);
  log.debug('Debug', `Log level set to: ${name.toUpperCase()}`);
}

/**
 * Get current log level name.
 */
export function getLogLevel(): LogLevelName {
  for (const name of LOG_LEVEL_NAMES) {
    if (LEVEL_MAP[name] === currentLogLevel) return name;
  }
  return 'info';
}

/**
 * Apply the debug section of the config to the logger.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  const desired = config.logLevel.defaultLogLevel;
  if (desired !== getLogLevel()) {
    setLogLevel(desired);
  }
}

/**
 * Enable logging for specific modules only.
 */
export function enableModules(...modules: string[]): void {
  setEnabledModules(new Set(modules.map((m) => m.toLowerCase())));
  log.debug('Debug', `Enabled modules: ${modules.join(', ')}`);
}

/**
 * Disable logging for specific modules.
 */
export function disableModules(...modules: string[]): void {
  for (const m of modules) {
    disabledModules.add(m.toLowerCase());
  }
}

/**
 * Reset module filters.
 */
export function resetModuleFilters(): void {
  enabledModules.clear();
  disabledModules.clear();
}
