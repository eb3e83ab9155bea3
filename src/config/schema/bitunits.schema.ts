/**
 * Master Config Schema
 *
 * Composes the per-domain configs into one runtime config. Individual
 * configs remain importable for subsystems that only need their domain.
 *
 * @module config/schema/bitunits
 */

import type { FormattingConfigSchema } from './formatting.schema.js';
import type { TransferConfigSchema } from './transfer.schema.js';
import type { I18nConfigSchema } from './i18n.schema.js';
import type { DebugConfigSchema } from './debug.schema.js';

import { DEFAULT_FORMATTING_CONFIG } from './formatting.schema.js';
import { DEFAULT_TRANSFER_CONFIG } from './transfer.schema.js';
import { DEFAULT_I18N_CONFIG } from './i18n.schema.js';
import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

export interface UnitsConfigSchema {
  /** humanize()/toString() defaults */
  formatting: FormattingConfigSchema;

  /** Size/rate convention for transfer math */
  transfer: TransferConfigSchema;

  /** Language registry defaults */
  i18n: I18nConfigSchema;

  /** Logging */
  debug: DebugConfigSchema;
}

/** Deep partial type for overrides */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

export type UnitsConfigOverrides = DeepPartial<UnitsConfigSchema>;

export const DEFAULT_UNITS_CONFIG: UnitsConfigSchema = {
  formatting: DEFAULT_FORMATTING_CONFIG,
  transfer: DEFAULT_TRANSFER_CONFIG,
  i18n: DEFAULT_I18N_CONFIG,
  debug: DEFAULT_DEBUG_CONFIG,
};

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create a config with optional overrides, deep-merged over defaults.
 *
 * @example
 * ```typescript
 * const config = createUnitsConfig({
 *   formatting: { precision: 3 },
 *   transfer: { convention: 'exact' },
 * });
 * ```
 */
export function createUnitsConfig(overrides?: UnitsConfigOverrides): UnitsConfigSchema {
  return mergeUnitsConfig(DEFAULT_UNITS_CONFIG, overrides ?? {});
}

/**
 * Merge overrides into a base config. Missing nested objects fall back to base.
 */
export function mergeUnitsConfig(
  base: UnitsConfigSchema,
  overrides: UnitsConfigOverrides
): UnitsConfigSchema {
  return {
    formatting: { ...base.formatting, ...overrides.formatting },
    transfer: { ...base.transfer, ...overrides.transfer },
    i18n: {
      defaultLanguage: overrides.i18n?.defaultLanguage ?? base.i18n.defaultLanguage,
      bundledLanguages: [...(overrides.i18n?.bundledLanguages ?? base.i18n.bundledLanguages)],
    },
    debug: {
      logHistory: { ...base.debug.logHistory, ...overrides.debug?.logHistory },
      logLevel: { ...base.debug.logLevel, ...overrides.debug?.logLevel },
    },
  };
}
