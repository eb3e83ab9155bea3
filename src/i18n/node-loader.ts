/**
 * Language File Loader
 *
 * Reads language tables from JSON files on disk into a registry.
 *
 * @module i18n/node-loader
 */

import { readFile, readdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import { log } from '../debug/index.js';
import { InvalidArgumentError } from '../errors/units-error.js';
import type { LanguageRegistry } from './registry.js';

// =============================================================================
// Types
// =============================================================================

export interface SkippedLanguageFile {
  path: string;
  reason: string;
}

export interface DirectoryLoadResult {
  /** Codes registered, in file name order */
  loaded: string[];
  skipped: SkippedLanguageFile[];
}

export interface DirectoryLoadOptions {
  /** File name filter (default: *.json) */
  pattern?: RegExp;
}

// =============================================================================
// Helpers
// =============================================================================

/** `en`, `pt-BR`, `zh_TW` */
const LANGUAGE_FILE_NAME = /^[a-z]{2}(?:[-_][a-zA-Z]{2})?$/;
const DEFAULT_PATTERN = /\.json$/i;

function hasOwnCode(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'code' in raw && raw.code !== undefined;
}

function codeFromFileName(path: string): string {
  const name = basename(path, extname(path));
  if (!LANGUAGE_FILE_NAME.test(name)) {
    throw new InvalidArgumentError(
      `Cannot determine language code from file ${path}. Please specify it explicitly.`
    );
  }
  return name;
}

async function readJson(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new InvalidArgumentError(
      `Language file cannot be read: ${path} (${err instanceof Error ? err.message : String(err)})`
    );
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    throw new InvalidArgumentError(`Language file is not valid JSON: ${path}`);
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load one JSON table. Without `code`, the table's own code is used, then
 * the file name (`de.json` -> `de`).
 *
 * @returns the code the table was registered under
 */
export async function loadLanguageFile(
  registry: LanguageRegistry,
  path: string,
  code?: string
): Promise<string> {
  const raw = await readJson(path);
  const resolvedCode = code ?? (hasOwnCode(raw) ? undefined : codeFromFileName(path));
  return registry.loadLanguage(raw, resolvedCode);
}

/**
 * Load every matching file in `directory`. Files that fail to load are
 * skipped and reported rather than aborting the batch.
 */
export async function loadLanguagesFromDirectory(
  registry: LanguageRegistry,
  directory: string,
  options: DirectoryLoadOptions = {}
): Promise<DirectoryLoadResult> {
  const pattern = options.pattern ?? DEFAULT_PATTERN;
  const entries = await readdir(directory);
  const files = entries.filter((name) => pattern.test(name)).sort();

  const result: DirectoryLoadResult = { loaded: [], skipped: [] };
  for (const file of files) {
    const path = join(directory, file);
    try {
      result.loaded.push(await loadLanguageFile(registry, path));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn('I18n', `Skipping language file ${file}: ${reason}`);
      result.skipped.push({ path, reason });
    }
  }

  log.debug('I18n', `Loaded ${result.loaded.length} language(s) from ${directory}`);
  return result;
}
