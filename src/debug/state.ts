/**
 * Debug Module Global State
 *
 * @module debug/state
 */

import { LOG_LEVELS, type LogLevelValue, type LogEntry } from './types.js';

// Global state variables
export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export let enabledModules = new Set<string>();
export const disabledModules = new Set<string>();
export let logHistory: LogEntry[] = [];

// Importers see live bindings but cannot reassign them
export function setCurrentLogLevel(level: LogLevelValue): void {
  currentLogLevel = level;
}

export function setEnabledModules(modules: Set<string>): void {
  enabledModules = modules;
}

export function clearHistory(): void {
  logHistory = [];
}

export function pushHistory(entry: LogEntry): void {
  logHistory.push(entry);
}

export function shiftHistory(): LogEntry | undefined {
  return logHistory.shift();
}
