/**
 * CLI Types - Shared type definitions for the bitunits CLI
 */

import type { LogLevelName } from '../../src/debug/index.js';

export const COMMANDS = ['humanize', 'convert', 'rate', 'transfer', 'amount', 'languages'] as const;

export type Command = (typeof COMMANDS)[number];

export interface CLIOptions {
  command: Command | null;
  /** Arguments after the command, in order */
  positionals: string[];
  /** Decimal places; null keeps the configured precision */
  precision: number | null;
  delimiter: string | null;
  /** Render rates in byte units (MBps) instead of bit units (Mbps) */
  bytes: boolean;
  /** Language for transfer durations */
  lang: string | null;
  /** Use canonical bytes in transfer math instead of the nominal convention */
  exact: boolean;
  logLevel: LogLevelName | null;
  help: boolean;
}

/** Where the CLI writes; console by default, captured in tests. */
export interface CLIOutput {
  out(line: string): void;
  err(line: string): void;
}
