/**
 * Duration Formatter
 *
 * Renders a number of seconds as at most two localized units, e.g.
 * "2 minutes, 10 seconds" or "1 час и 1 минута". Seconds are truncated.
 *
 * @module i18n/duration
 */

import { getRuntimeConfig } from '../config/runtime.js';
import type { I18nConfigSchema } from '../config/schema/index.js';
import { InvalidArgumentError, MissingFormKeyError } from '../errors/units-error.js';
import { createLanguageRegistry } from './bundled.js';
import type { LanguageTable } from './language-table.js';
import { defaultPluralRule, type TimeUnitName } from './plural-rules.js';
import type { LanguageRegistry } from './registry.js';

const PLACEHOLDER = /\{(value|unit)\}/g;

const SECONDS_PER_MINUTE = 60;
const MINUTES_PER_HOUR = 60;
const HOURS_PER_DAY = 24;

export class DurationFormatter {
  readonly registry: LanguageRegistry;

  /**
   * @param registry - defaults to a registry preloaded with the bundled languages
   */
  constructor(registry: LanguageRegistry = createLanguageRegistry()) {
    this.registry = registry;
  }

  /**
   * Anything under one second, negatives included, is the table's
   * `lessThanSecond` phrase.
   *
   * @param language - defaults to the registry's default language
   * @throws InvalidArgumentError for non-finite seconds
   * @throws UnknownLanguageError when neither the language nor English is loaded
   */
  format(seconds: number, language?: string): string {
    if (!Number.isFinite(seconds)) {
      throw new InvalidArgumentError(`Seconds must be a finite number, got ${seconds}`);
    }

    const table = this.registry.resolve(language);
    if (seconds < 1) {
      return table.time.lessThanSecond;
    }

    const totalSeconds = Math.floor(seconds);
    const minutes = Math.floor(totalSeconds / SECONDS_PER_MINUTE);
    const remainingSeconds = totalSeconds % SECONDS_PER_MINUTE;
    if (minutes < 1) {
      return this.formatUnit(remainingSeconds, 'second', table);
    }

    const hours = Math.floor(minutes / MINUTES_PER_HOUR);
    const remainingMinutes = minutes % MINUTES_PER_HOUR;
    if (hours < 1) {
      return this.join(table, [minutes, 'minute'], [remainingSeconds, 'second']);
    }

    const days = Math.floor(hours / HOURS_PER_DAY);
    const remainingHours = hours % HOURS_PER_DAY;
    if (days < 1) {
      return this.join(table, [hours, 'hour'], [remainingMinutes, 'minute']);
    }

    return this.join(table, [days, 'day'], [remainingHours, 'hour']);
  }

  /**
   * Render `count` with the form chosen by the table's plural rule.
   *
   * @throws MissingFormKeyError when the table lacks the chosen form
   */
  formatUnit(count: number, unit: TimeUnitName, table: LanguageTable): string {
    const rule = table.time.plural ?? defaultPluralRule;
    const key = rule.formKey(count, unit);
    const forms = table.time.forms;
    const form = Object.prototype.hasOwnProperty.call(forms, key) ? forms[key] : undefined;
    if (form === undefined) {
      throw new MissingFormKeyError(table.code, key);
    }
    return table.time.format.replace(PLACEHOLDER, (_match, name: string) =>
      name === 'value' ? String(count) : form
    );
  }

  private join(
    table: LanguageTable,
    [major, majorUnit]: [number, TimeUnitName],
    [minor, minorUnit]: [number, TimeUnitName]
  ): string {
    const head = this.formatUnit(major, majorUnit, table);
    if (minor <= 0) {
      return head;
    }
    return head + table.time.separator + this.formatUnit(minor, minorUnit, table);
  }
}

let defaultFormatter: { formatter: DurationFormatter; i18n: I18nConfigSchema } | null = null;

/**
 * Shared formatter over the bundled languages. Rebuilt whenever the
 * runtime i18n config changes.
 */
export function getDefaultDurationFormatter(): DurationFormatter {
  const { i18n } = getRuntimeConfig();
  if (!defaultFormatter || defaultFormatter.i18n !== i18n) {
    defaultFormatter = { formatter: new DurationFormatter(), i18n };
  }
  return defaultFormatter.formatter;
}

export function formatDuration(seconds: number, language?: string): string {
  return getDefaultDurationFormatter().format(seconds, language);
}
