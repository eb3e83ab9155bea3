/**
 * Error taxonomy
 *
 * Every failure surfaced by the library is a UnitsError carrying a stable
 * `code`, so callers can branch on codes instead of message text.
 *
 * @module errors/units-error
 */

export const ERROR_CODES = {
  PARSE_FAILED: 'BITUNITS_PARSE_FAILED',
  UNKNOWN_UNIT: 'BITUNITS_UNKNOWN_UNIT',
  INVARIANT_VIOLATED: 'BITUNITS_INVARIANT_VIOLATED',
  DIVIDE_BY_ZERO: 'BITUNITS_DIVIDE_BY_ZERO',
  INVALID_ARGUMENT: 'BITUNITS_INVALID_ARGUMENT',
  UNKNOWN_LANGUAGE: 'BITUNITS_UNKNOWN_LANGUAGE',
  MISSING_FORM_KEY: 'BITUNITS_MISSING_FORM_KEY',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for all library errors.
 */
export class UnitsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export function isUnitsError(value: unknown): value is UnitsError {
  return value instanceof UnitsError;
}

// =============================================================================
// Parsing and units
// =============================================================================

export type ParseFailureReason = 'invalid numeric portion' | 'unrecognized unit';

/**
 * Input string could not be fully consumed as `<number><unit>`.
 */
export class ParseError extends UnitsError {
  readonly reason: ParseFailureReason;
  readonly input: string;

  constructor(reason: ParseFailureReason, input: string) {
    super(ERROR_CODES.PARSE_FAILED, `Failed to parse "${input}": ${reason}`);
    this.reason = reason;
    this.input = input;
  }
}

export class UnknownUnitError extends UnitsError {
  readonly unit: string;

  constructor(unit: string) {
    super(ERROR_CODES.UNKNOWN_UNIT, `Unsupported unit: ${unit}`);
    this.unit = unit;
  }
}

// =============================================================================
// Arithmetic
// =============================================================================

export class InvariantError extends UnitsError {
  constructor(message: string) {
    super(ERROR_CODES.INVARIANT_VIOLATED, message);
  }
}

export class DivideByZeroError extends UnitsError {
  constructor(message = 'Cannot divide by zero') {
    super(ERROR_CODES.DIVIDE_BY_ZERO, message);
  }
}

export class InvalidArgumentError extends UnitsError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_ARGUMENT, message);
  }
}

// =============================================================================
// Localization
// =============================================================================

export class UnknownLanguageError extends UnitsError {
  readonly language: string;

  constructor(language: string) {
    super(
      ERROR_CODES.UNKNOWN_LANGUAGE,
      `Language '${language}' is not loaded. Use loadLanguage() first.`
    );
    this.language = language;
  }
}

export class MissingFormKeyError extends UnitsError {
  readonly language: string;
  readonly formKey: string;

  constructor(language: string, formKey: string) {
    super(
      ERROR_CODES.MISSING_FORM_KEY,
      `Language '${language}' has no form for "${formKey}"`
    );
    this.language = language;
    this.formKey = formKey;
  }
}
