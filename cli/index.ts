#!/usr/bin/env node
/**
 * bitunits CLI - Quick size, rate and transfer-time conversions
 *
 * Usage:
 *   bitunits humanize <size>                 # 1536 -> 1.5 kB
 *   bitunits convert <value> <unit>          # 1 GB MB -> 1024 MB
 *   bitunits rate <rate> [--bytes]           # 100000000 -> 100 Mbps
 *   bitunits transfer <size> <rate> [--lang] # 1 GB at 100 Mbps -> 1 minute, 20 seconds
 *   bitunits amount <rate> <seconds>         # 50Mbps for 1800 s -> 10.48 GB
 *   bitunits languages                       # bundled duration languages
 */

import { realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

import type { CLIOptions, CLIOutput, Command } from './helpers/types.js';
import { COMMANDS } from './helpers/types.js';
import { Size } from '../src/values/size.js';
import { Rate } from '../src/values/rate.js';
import { findUnit } from '../src/units/unit-table.js';
import { TransferCalculator } from '../src/transfer/calculator.js';
import { createLanguageRegistry, listBundledLanguages } from '../src/i18n/bundled.js';
import { setRuntimeConfig, type UnitsConfigOverrides } from '../src/config/index.js';
import { log, isLogLevelName } from '../src/debug/index.js';
import { InvalidArgumentError, isUnitsError } from '../src/errors/units-error.js';

// ============================================================================
// Argument Parsing
// ============================================================================

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new InvalidArgumentError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CLIOptions {
  const opts: CLIOptions = {
    command: null,
    positionals: [],
    precision: null,
    delimiter: null,
    bytes: false,
    lang: null,
    exact: false,
    logLevel: null,
    help: false,
  };

  const tokens = [...argv];

  while (tokens.length) {
    const arg = tokens.shift();
    if (arg === undefined) break;

    switch (arg) {
      case '--help':
      case '-h':
        opts.help = true;
        break;
      case '--precision':
      case '-p': {
        const raw = requireValue(arg, tokens.shift());
        const precision = Number(raw);
        if (raw.trim() === '' || !Number.isInteger(precision) || precision < 0) {
          throw new InvalidArgumentError(`--precision must be a non-negative integer, got "${raw}"`);
        }
        opts.precision = precision;
        break;
      }
      case '--delimiter':
        opts.delimiter = requireValue(arg, tokens.shift());
        break;
      case '--bytes':
        opts.bytes = true;
        break;
      case '--lang':
      case '-l':
        opts.lang = requireValue(arg, tokens.shift());
        break;
      case '--exact':
        opts.exact = true;
        break;
      case '--log-level': {
        const level = requireValue(arg, tokens.shift());
        if (!isLogLevelName(level)) {
          throw new InvalidArgumentError(`Unknown log level "${level}"`);
        }
        opts.logLevel = level;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new InvalidArgumentError(`Unknown option "${arg}"`);
        }
        if (opts.command === null) {
          if (!isCommand(arg)) {
            throw new InvalidArgumentError(
              `Unknown command "${arg}". Available: ${COMMANDS.join(', ')}`
            );
          }
          opts.command = arg;
        } else {
          opts.positionals.push(arg);
        }
    }
  }

  return opts;
}

function toConfigOverrides(opts: CLIOptions): UnitsConfigOverrides {
  const overrides: UnitsConfigOverrides = {};
  if (opts.precision !== null || opts.delimiter !== null) {
    overrides.formatting = {
      ...(opts.precision !== null ? { precision: opts.precision } : {}),
      ...(opts.delimiter !== null ? { delimiter: opts.delimiter } : {}),
    };
  }
  if (opts.exact) {
    overrides.transfer = { convention: 'exact' };
  }
  if (opts.logLevel) {
    overrides.debug = { logLevel: { defaultLogLevel: opts.logLevel } };
  }
  return overrides;
}

// ============================================================================
// Help
// ============================================================================

export const HELP_TEXT = `
bitunits - data sizes, transfer rates and transfer times

Commands:
  humanize <size>              Largest fitting unit (1536 -> 1.5 kB)
  convert <value> <unit>       Convert a size or rate to a unit (1GB MB -> 1024 MB)
  rate <rate>                  Humanize a rate (100000000 -> 100 Mbps)
  transfer <size> <rate>       Time to move a size at a rate
  amount <rate> <seconds>      Data moved at a rate over a time
  languages                    List bundled duration languages

Options:
  --precision, -p <n>    Decimal places (default: 2)
  --delimiter <s>        Text between value and unit (default: " ")
  --bytes                Show rates in byte units (MBps)
  --lang, -l <code>      Language for transfer times (default: en)
  --exact                Transfer math on exact binary bytes
  --log-level <level>    debug, verbose, info, warn, error, silent
  --help, -h             Show this help
`;

// ============================================================================
// Commands
// ============================================================================

function takePositionals(opts: CLIOptions, count: number, usage: string): string[] {
  if (opts.positionals.length !== count) {
    throw new InvalidArgumentError(`Usage: bitunits ${usage}`);
  }
  return opts.positionals;
}

function parseSeconds(raw: string): number {
  const seconds = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(seconds)) {
    throw new InvalidArgumentError(`Seconds must be a number, got "${raw}"`);
  }
  return seconds;
}

function runCommand(command: Command, opts: CLIOptions, io: CLIOutput): void {
  switch (command) {
    case 'humanize': {
      const [value = ''] = takePositionals(opts, 1, 'humanize <size>');
      io.out(new Size(value).humanize());
      return;
    }
    case 'convert': {
      const [value = '', unit = ''] = takePositionals(opts, 2, 'convert <value> <unit>');
      const precision = opts.precision;
      const delimiter = opts.delimiter ?? ' ';
      io.out(
        findUnit(unit, 'size')
          ? new Size(value).to(unit, precision, delimiter)
          : Rate.fromHumanReadable(value).to(unit, precision, delimiter)
      );
      return;
    }
    case 'rate': {
      const [value = ''] = takePositionals(opts, 1, 'rate <rate>');
      io.out(Rate.fromHumanReadable(value).humanize(opts.bytes ? 'byte' : 'bit'));
      return;
    }
    case 'transfer': {
      const [size = '', rate = ''] = takePositionals(opts, 2, 'transfer <size> <rate>');
      io.out(new TransferCalculator().formattedTransferTime(size, rate, opts.lang ?? undefined));
      return;
    }
    case 'amount': {
      const [rate = '', seconds = ''] = takePositionals(opts, 2, 'amount <rate> <seconds>');
      const amount = new TransferCalculator().transferAmount(rate, parseSeconds(seconds));
      io.out(amount.humanize());
      return;
    }
    case 'languages': {
      takePositionals(opts, 0, 'languages');
      const registry = createLanguageRegistry({ languages: listBundledLanguages() });
      for (const code of registry.getLoadedLanguages()) {
        io.out(`${code.padEnd(4)}${registry.getLanguage(code)?.name ?? ''}`);
      }
      return;
    }
  }
}

// ============================================================================
// Entry
// ============================================================================

const consoleOutput: CLIOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Run the CLI and return its exit code.
 */
export function runCli(argv: readonly string[], io: CLIOutput = consoleOutput): number {
  try {
    const opts = parseArgs(argv);

    if (opts.help || opts.command === null) {
      io.out(HELP_TEXT);
      return opts.help ? 0 : 1;
    }

    setRuntimeConfig(toConfigOverrides(opts));
    log.debug('CLI', `Running ${opts.command}`, opts.positionals);
    runCommand(opts.command, opts, io);
    return 0;
  } catch (err) {
    if (isUnitsError(err)) {
      io.err(`Error [${err.code}]: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(resolve(entry)) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  process.exitCode = runCli(process.argv.slice(2));
}
