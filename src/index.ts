/**
 * bitunits
 *
 * Data sizes and transfer rates as immutable values: parsing, arithmetic,
 * conversion, humanized output and localized transfer-time estimates.
 *
 * @module bitunits
 */

// Values
export { Size, type SizeInput } from './values/size.js';
export { Rate, type RateInput, type RateDisplay } from './values/rate.js';
export { Magnitude, type Operand, type OperandList, type RangeBounds } from './values/magnitude.js';

// Units
export {
  SIZE_UNITS,
  RATE_BIT_UNITS,
  RATE_BYTE_UNITS,
  SIZE_UNIT_SYMBOLS,
  RATE_BIT_UNIT_SYMBOLS,
  RATE_BYTE_UNIT_SYMBOLS,
  BITS_PER_BYTE,
  findUnit,
  type UnitSpec,
  type UnitFamily,
  type MagnitudeFamily,
  type SizeUnit,
  type RateUnit,
  type RateBitUnit,
  type RateByteUnit,
} from './units/unit-table.js';
export { parseMagnitude, tokenizeMagnitude, type MagnitudeToken } from './units/parser.js';
export { roundTo, humanizeMagnitude, type HumanizeOptions } from './units/format.js';
export {
  MATCH_MODES,
  COMPARE_LT,
  COMPARE_EQ,
  COMPARE_GT,
  type MatchMode,
  type CompareResult,
} from './units/arithmetic.js';

// Transfer
export {
  TransferCalculator,
  getDefaultTransferCalculator,
  type TransferCalculatorOptions,
} from './transfer/index.js';

// Localization
export * from './i18n/index.js';

// Errors
export {
  ERROR_CODES,
  UnitsError,
  ParseError,
  UnknownUnitError,
  InvariantError,
  DivideByZeroError,
  InvalidArgumentError,
  UnknownLanguageError,
  MissingFormKeyError,
  isUnitsError,
  type ErrorCode,
  type ParseFailureReason,
} from './errors/units-error.js';

// Config
export {
  getRuntimeConfig,
  setRuntimeConfig,
  resetRuntimeConfig,
  createUnitsConfig,
  DEFAULT_UNITS_CONFIG,
  type UnitsConfigSchema,
  type UnitsConfigOverrides,
  type TransferConvention,
} from './config/index.js';

// Debug
export {
  log,
  setLogLevel,
  getLogLevel,
  enableModules,
  disableModules,
  resetModuleFilters,
  getLogHistory,
  clearLogHistory,
  type LogLevelName,
  type LogEntry,
} from './debug/index.js';
