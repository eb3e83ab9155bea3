/**
 * Localization Config Schema
 *
 * @module config/schema/i18n
 */

export interface I18nConfigSchema {
  /** Language used when no code is passed and none was loaded yet */
  defaultLanguage: string;
  /** Bundled tables preloaded by createLanguageRegistry(), in load order */
  bundledLanguages: string[];
}

export const DEFAULT_I18N_CONFIG: I18nConfigSchema = {
  defaultLanguage: 'en',
  bundledLanguages: ['en', 'ru', 'de', 'fr', 'es', 'it', 'pt', 'nl', 'zh', 'ja', 'ar'],
};
