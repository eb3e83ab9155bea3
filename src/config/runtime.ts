/**
 * Runtime Config Registry
 *
 * Stores the active UnitsConfigSchema for the current process.
 * Call setRuntimeConfig() early to apply overrides.
 *
 * @module config/runtime
 */

import type { UnitsConfigSchema, UnitsConfigOverrides } from './schema/index.js';
import { createUnitsConfig } from './schema/index.js';
import { validateUnitsConfig } from './validator.js';
import { log, applyDebugConfig } from '../debug/index.js';

let runtimeConfig: UnitsConfigSchema = createUnitsConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): UnitsConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults; the debug section
 * is applied to the logger immediately.
 */
export function setRuntimeConfig(overrides?: UnitsConfigOverrides): UnitsConfigSchema {
  const merged = createUnitsConfig(overrides);
  validateUnitsConfig(merged);

  runtimeConfig = merged;
  applyDebugConfig(merged.debug);
  log.debug('Config', 'Runtime config updated', overrides);
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): UnitsConfigSchema {
  runtimeConfig = createUnitsConfig();
  applyDebugConfig(runtimeConfig.debug);
  return runtimeConfig;
}
