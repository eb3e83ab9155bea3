/**
 * Schema Index
 *
 * Re-exports all schema definitions for easy importing.
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 *
 * @module config/schema
 */

export {
  type FormattingConfigSchema,
  DEFAULT_FORMATTING_CONFIG,
} from './formatting.schema.js';

export {
  type TransferConvention,
  type TransferConfigSchema,
  TRANSFER_CONVENTIONS,
  DEFAULT_TRANSFER_CONFIG,
} from './transfer.schema.js';

export {
  type I18nConfigSchema,
  DEFAULT_I18N_CONFIG,
} from './i18n.schema.js';

export {
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type DebugConfigSchema,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from './debug.schema.js';

export {
  type UnitsConfigSchema,
  type UnitsConfigOverrides,
  type DeepPartial,
  DEFAULT_UNITS_CONFIG,
  createUnitsConfig,
  mergeUnitsConfig,
} from './bitunits.schema.js';
