/**
 * Config Validator
 *
 * Structural checks for a merged runtime config. Throws on the first
 * invalid value.
 *
 * @module config/validator
 */

import type { UnitsConfigSchema } from './schema/index.js';
import { TRANSFER_CONVENTIONS } from './schema/index.js';
import { isLogLevelName } from '../debug/config.js';
import { InvalidArgumentError } from '../errors/units-error.js';

export function validateUnitsConfig(config: UnitsConfigSchema): void {
  const { formatting, transfer, i18n, debug } = config;

  if (!Number.isInteger(formatting.precision) || formatting.precision < 0) {
    throw new InvalidArgumentError(
      `formatting.precision must be a non-negative integer, got ${formatting.precision}`
    );
  }
  if (typeof formatting.delimiter !== 'string') {
    throw new InvalidArgumentError('formatting.delimiter must be a string');
  }

  if (!TRANSFER_CONVENTIONS.includes(transfer.convention)) {
    throw new InvalidArgumentError(
      `transfer.convention must be one of ${TRANSFER_CONVENTIONS.join(', ')}, got "${transfer.convention}"`
    );
  }

  if (i18n.defaultLanguage.trim() === '') {
    throw new InvalidArgumentError('i18n.defaultLanguage must not be empty');
  }

  if (!isLogLevelName(debug.logLevel.defaultLogLevel)) {
    throw new InvalidArgumentError(
      `debug.logLevel.defaultLogLevel is not a log level: "${debug.logLevel.defaultLogLevel}"`
    );
  }

  const maxEntries = debug.logHistory.maxLogHistoryEntries;
  if (!Number.isInteger(maxEntries) || maxEntries < 0) {
    throw new InvalidArgumentError(
      `debug.logHistory.maxLogHistoryEntries must be a non-negative integer, got ${maxEntries}`
    );
  }
}
