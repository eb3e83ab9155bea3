/**
 * Language Registry
 *
 * Holds the language tables a DurationFormatter can use. Registries are
 * plain instances; create one per context and pass it where needed.
 *
 * @module i18n/registry
 */

import { log } from '../debug/index.js';
import { UnknownLanguageError } from '../errors/units-error.js';
import {
  normalizeLanguageTable,
  type LanguageTable,
  type LanguageTableInput,
} from './language-table.js';

/** Language every unresolved code falls back to, when loaded. */
export const FALLBACK_LANGUAGE = 'en';

/** Produces a table lazily, e.g. from a file. */
export type LanguageLoader = () => unknown;

export interface LanguageRegistryOptions {
  /** Becomes the default as soon as it is loaded; until then the first language added is */
  defaultLanguage?: string;
}

function isLanguageLoader(value: unknown): value is LanguageLoader {
  return typeof value === 'function';
}

export class LanguageRegistry {
  private languages = new Map<string, LanguageTable>();
  private defaultLanguage: string | undefined;
  private preferredLanguage: string | undefined;

  constructor(options: LanguageRegistryOptions = {}) {
    this.preferredLanguage = options.defaultLanguage;
  }

  /**
   * Register or replace a table under `code`. The first language added
   * becomes the default, unless the preferred default is added later.
   */
  addLanguage(code: string, table: LanguageTableInput | LanguageTable): void {
    this.store(normalizeLanguageTable(table, code));
  }

  /**
   * Validate and register a table, or the result of a loader.
   *
   * @param code - overrides the table's own `code`
   * @returns the code the table was registered under
   */
  loadLanguage(source: unknown, code?: string): string {
    const raw = isLanguageLoader(source) ? source() : source;
    const table = normalizeLanguageTable(raw, code);
    this.store(table);
    return table.code;
  }

  /**
   * @throws UnknownLanguageError when `code` is not loaded
   */
  setDefaultLanguage(code: string): void {
    if (!this.languages.has(code)) {
      throw new UnknownLanguageError(code);
    }
    this.defaultLanguage = code;
    this.preferredLanguage = code;
    log.debug('I18n', `Default language set to '${code}'`);
  }

  /** Before anything is loaded: the preferred default, else English. */
  getDefaultLanguage(): string {
    return this.defaultLanguage ?? this.preferredLanguage ?? FALLBACK_LANGUAGE;
  }

  isLanguageLoaded(code: string): boolean {
    return this.languages.has(code);
  }

  /** Codes in load order. */
  getLoadedLanguages(): string[] {
    return [...this.languages.keys()];
  }

  getLanguage(code: string): LanguageTable | undefined {
    return this.languages.get(code);
  }

  /**
   * Table for `code`, or for the default language when omitted. A code
   * that is not loaded falls back to English.
   *
   * @throws UnknownLanguageError when neither the code nor English is loaded
   */
  resolve(code?: string): LanguageTable {
    const requested = code ?? this.getDefaultLanguage();
    const table = this.languages.get(requested);
    if (table) {
      return table;
    }

    const fallback = this.languages.get(FALLBACK_LANGUAGE);
    if (requested !== FALLBACK_LANGUAGE && fallback) {
      log.warn('I18n', `Language '${requested}' is not loaded, falling back to '${FALLBACK_LANGUAGE}'`);
      return fallback;
    }

    throw new UnknownLanguageError(requested);
  }

  private store(table: LanguageTable): void {
    const isDefault = this.languages.size === 0 || table.code === this.preferredLanguage;
    this.languages.set(table.code, table);
    if (isDefault) {
      this.defaultLanguage = table.code;
    }
    log.debug('I18n', `Loaded language '${table.code}'`, { isDefault });
  }
}
