/**
 * Language Tables
 *
 * A language table holds the strings DurationFormatter needs for one
 * language. Tables arrive either as typed objects or as raw JSON, and both
 * go through normalizeLanguageTable() before they reach a registry.
 *
 * @module i18n/language-table
 */

import { InvalidArgumentError } from '../errors/units-error.js';
import { findPluralRule, type PluralRule } from './plural-rules.js';

// =============================================================================
// Types
// =============================================================================

export interface TimeLocalization {
  /** Template with `{value}` and `{unit}` placeholders */
  readonly format: string;
  /** Joins the two units of a duration */
  readonly separator: string;
  readonly lessThanSecond: string;
  /** Unit forms keyed by plural form key (`second`, `seconds`, `second_few`, ...) */
  readonly forms: Readonly<Record<string, string>>;
  /** Absent means `second` for 1 and `seconds` otherwise */
  readonly plural?: PluralRule;
}

export interface LanguageTable {
  readonly code: string;
  readonly name?: string;
  readonly time: TimeLocalization;
}

/**
 * Table as written by hand or read from JSON. `plural` may name a
 * built-in rule by id.
 */
export interface LanguageTableInput {
  code?: string;
  name?: string;
  time: {
    format?: string;
    separator?: string;
    lessThanSecond: string;
    forms: Record<string, string>;
    plural?: string | PluralRule;
  };
}

export const DEFAULT_TIME_FORMAT = '{value} {unit}';
export const DEFAULT_TIME_SEPARATOR = ', ';

// =============================================================================
// Validation
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPluralRule(value: unknown): value is PluralRule {
  return isRecord(value) && typeof value.id === 'string' && typeof value.formKey === 'function';
}

function optionalString(value: unknown, field: string, label: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`${label}: "${field}" must be a string`);
  }
  return value;
}

function readForms(value: unknown, label: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new InvalidArgumentError(`${label}: "time.forms" must be an object`);
  }
  const forms: Record<string, string> = {};
  for (const [key, form] of Object.entries(value)) {
    if (typeof form !== 'string') {
      throw new InvalidArgumentError(`${label}: form "${key}" must be a string`);
    }
    forms[key] = form;
  }
  return Object.freeze(forms);
}

function readPlural(value: unknown, label: string): PluralRule | undefined {
  if (value === undefined) return undefined;
  if (isPluralRule(value)) return value;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`${label}: "time.plural" must be a rule id or a plural rule`);
  }
  const rule = findPluralRule(value);
  if (!rule) {
    throw new InvalidArgumentError(`${label}: unknown plural rule "${value}"`);
  }
  return rule;
}

/**
 * Validate a raw or typed table and fill in defaults.
 *
 * @param raw - table object, usually parsed JSON
 * @param code - overrides the table's own `code`
 * @throws InvalidArgumentError when the table is malformed or has no code
 */
export function normalizeLanguageTable(raw: unknown, code?: string): LanguageTable {
  const label = code ? `Language table '${code}'` : 'Language table';
  if (!isRecord(raw)) {
    throw new InvalidArgumentError(`${label} must be an object`);
  }

  const resolvedCode = code ?? optionalString(raw.code, 'code', label);
  if (!resolvedCode) {
    throw new InvalidArgumentError(`${label} has no language code. Pass one explicitly.`);
  }

  const time = raw.time;
  if (!isRecord(time)) {
    throw new InvalidArgumentError(`${label}: "time" must be an object`);
  }

  const lessThanSecond = optionalString(time.lessThanSecond, 'time.lessThanSecond', label);
  if (lessThanSecond === undefined) {
    throw new InvalidArgumentError(`${label}: "time.lessThanSecond" is required`);
  }

  const format = optionalString(time.format, 'time.format', label) ?? DEFAULT_TIME_FORMAT;
  if (!format.includes('{value}') || !format.includes('{unit}')) {
    throw new InvalidArgumentError(`${label}: "time.format" must contain {value} and {unit}`);
  }

  const plural = readPlural(time.plural, label);
  const name = optionalString(raw.name, 'name', label);

  return Object.freeze({
    code: resolvedCode,
    ...(name !== undefined ? { name } : {}),
    time: Object.freeze({
      format,
      separator: optionalString(time.separator, 'time.separator', label) ?? DEFAULT_TIME_SEPARATOR,
      lessThanSecond,
      forms: readForms(time.forms, label),
      ...(plural ? { plural } : {}),
    }),
  });
}
