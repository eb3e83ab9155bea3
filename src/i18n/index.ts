/**
 * Localization - Public API
 *
 * @module i18n
 */

export {
  TIME_UNITS,
  PLURAL_RULES,
  defaultPluralRule,
  eastSlavicPluralRule,
  arabicPluralRule,
  invariantPluralRule,
  findPluralRule,
  type TimeUnitName,
  type PluralRule,
} from './plural-rules.js';

export {
  DEFAULT_TIME_FORMAT,
  DEFAULT_TIME_SEPARATOR,
  normalizeLanguageTable,
  type TimeLocalization,
  type LanguageTable,
  type LanguageTableInput,
} from './language-table.js';

export {
  LanguageRegistry,
  FALLBACK_LANGUAGE,
  type LanguageLoader,
  type LanguageRegistryOptions,
} from './registry.js';

export {
  BUNDLED_LANGUAGES,
  listBundledLanguages,
  createLanguageRegistry,
  type CreateLanguageRegistryOptions,
} from './bundled.js';

export {
  DurationFormatter,
  getDefaultDurationFormatter,
  formatDuration,
} from './duration.js';

export {
  loadLanguageFile,
  loadLanguagesFromDirectory,
  type SkippedLanguageFile,
  type DirectoryLoadResult,
  type DirectoryLoadOptions,
} from './node-loader.js';
