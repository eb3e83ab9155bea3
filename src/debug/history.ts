/**
 * Debug Module - Log History
 *
 * @module debug/history
 */

import type { LogEntry, LogHistoryFilter } from './types.js';
import { logHistory, clearHistory } from './state.js';

/**
 * Get log history for debugging.
 */
export function getLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  let history = [...logHistory];

  const level = filter.level?.toUpperCase();
  if (level) {
    history = history.filter((h) => h.level === level);
  }

  if (filter.module) {
    const m = filter.module.toLowerCase();
    history = history.filter((h) => h.module.toLowerCase().includes(m));
  }

  if (filter.last) {
    history = history.slice(-filter.last);
  }

  return history;
}

/**
 * Clear log history.
 */
export function clearLogHistory(): void {
  clearHistory();
}
