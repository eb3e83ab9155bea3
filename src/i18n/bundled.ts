/**
 * Bundled Languages
 *
 * @module i18n/bundled
 */

import en from './languages/en.json' with { type: 'json' };
import ru from './languages/ru.json' with { type: 'json' };
import de from './languages/de.json' with { type: 'json' };
import fr from './languages/fr.json' with { type: 'json' };
import es from './languages/es.json' with { type: 'json' };
import it from './languages/it.json' with { type: 'json' };
import pt from './languages/pt.json' with { type: 'json' };
import nl from './languages/nl.json' with { type: 'json' };
import zh from './languages/zh.json' with { type: 'json' };
import ja from './languages/ja.json' with { type: 'json' };
import ar from './languages/ar.json' with { type: 'json' };
import { getRuntimeConfig } from '../config/runtime.js';
import { InvalidArgumentError } from '../errors/units-error.js';
import { LanguageRegistry } from './registry.js';

/** Raw tables shipped with the package, validated on load. */
export const BUNDLED_LANGUAGES: Readonly<Record<string, unknown>> = Object.freeze({
  en, ru, de, fr, es, it, pt, nl, zh, ja, ar,
});

export function listBundledLanguages(): string[] {
  return Object.keys(BUNDLED_LANGUAGES);
}

export interface CreateLanguageRegistryOptions {
  /** Bundled codes to preload, in order. Defaults to the configured i18n.bundledLanguages */
  languages?: readonly string[];
  /** Defaults to the configured i18n.defaultLanguage, when it is among the loaded codes */
  defaultLanguage?: string;
}

/**
 * Registry preloaded with bundled tables.
 *
 * @throws InvalidArgumentError for a code that is not bundled
 */
export function createLanguageRegistry(options: CreateLanguageRegistryOptions = {}): LanguageRegistry {
  const i18n = getRuntimeConfig().i18n;
  const registry = new LanguageRegistry({
    defaultLanguage: options.defaultLanguage ?? i18n.defaultLanguage,
  });

  for (const code of options.languages ?? i18n.bundledLanguages) {
    if (!Object.prototype.hasOwnProperty.call(BUNDLED_LANGUAGES, code)) {
      throw new InvalidArgumentError(`No bundled table for language '${code}'`);
    }
    registry.loadLanguage(BUNDLED_LANGUAGES[code], code);
  }
  return registry;
}
