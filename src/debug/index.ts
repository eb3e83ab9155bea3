/**
 * Debug Module - Logging
 *
 * Single source of truth for all library logging.
 *
 * ## Log Levels (verbosity - how much to show)
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Usage
 *   import { log, setLogLevel } from '../debug/index.js';
 *
 *   log.info('I18n', 'Loaded 11 languages');
 *   log.debug('Transfer', `bits=${bits}`);
 *
 *   setLogLevel('verbose');
 *   enableModules('I18n');          // only I18n logs
 *   disableModules('Config');       // everything but Config
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  LOG_LEVEL_NAMES,
  type LogLevel,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type LogHistoryFilter,
} from './types.js';

export { log } from './logger.js';

export {
  setLogLevel,
  getLogLevel,
  isLogLevelName,
  applyDebugConfig,
  enableModules,
  disableModules,
  resetModuleFilters,
} from './config.js';

export { getLogHistory, clearLogHistory } from './history.js';
