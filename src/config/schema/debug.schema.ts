/**
 * Debug Config Schema
 *
 * Configuration for the debug module: log history limits and the
 * default log level.
 *
 * @module config/schema/debug
 */

import type { LogLevelName } from '../../debug/types.js';

// =============================================================================
// Log History Config
// =============================================================================

/**
 * Configuration for log history retention.
 *
 * Controls how many log entries are kept in memory for debugging
 * and diagnostic purposes.
 */
export interface LogHistoryConfigSchema {
  /** Maximum number of log entries to retain in memory */
  maxLogHistoryEntries: number;
}

/** Default log history configuration */
export const DEFAULT_LOG_HISTORY_CONFIG: LogHistoryConfigSchema = {
  maxLogHistoryEntries: 1000,
};

// =============================================================================
// Log Level Config
// =============================================================================

/**
 * Configuration for default log level.
 */
export interface LogLevelConfigSchema {
  /** Default log level (debug, verbose, info, warn, error, silent) */
  defaultLogLevel: LogLevelName;
}

/** Default log level configuration */
export const DEFAULT_LOG_LEVEL_CONFIG: LogLevelConfigSchema = {
  defaultLogLevel: 'info',
};

// =============================================================================
// Complete Debug Config
// =============================================================================

export interface DebugConfigSchema {
  logHistory: LogHistoryConfigSchema;
  logLevel: LogLevelConfigSchema;
}

export const DEFAULT_DEBUG_CONFIG: DebugConfigSchema = {
  logHistory: DEFAULT_LOG_HISTORY_CONFIG,
  logLevel: DEFAULT_LOG_LEVEL_CONFIG,
};
