import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';

import { loadLanguageFile, loadLanguagesFromDirectory } from '../../src/i18n/node-loader.js';
import { LanguageRegistry } from '../../src/i18n/registry.js';
import { DurationFormatter } from '../../src/i18n/duration.js';
import { InvalidArgumentError } from '../../src/errors/units-error.js';

const TABLE = {
  time: {
    separator: ' & ',
    lessThanSecond: 'blink',
    forms: { second: 'tick', seconds: 'ticks', minute: 'turn', minutes: 'turns' },
  },
};

const BUNDLED_DIR = fileURLToPath(new URL('../../src/i18n/languages', import.meta.url));

describe('i18n/node-loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bitunits-lang-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeTable(name: string, content: unknown): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  }

  describe('loadLanguageFile', () => {
    it('takes the code from the file name', async () => {
      const registry = new LanguageRegistry();
      const path = await writeTable('de.json', TABLE);
      expect(await loadLanguageFile(registry, path)).toBe('de');
      expect(new DurationFormatter(registry).format(61, 'de')).toBe('1 turn & 1 tick');
    });

    it('accepts region-qualified file names', async () => {
      const registry = new LanguageRegistry();
      expect(await loadLanguageFile(registry, await writeTable('pt-BR.json', TABLE))).toBe('pt-BR');
    });

    it('prefers the code inside the table', async () => {
      const registry = new LanguageRegistry();
      const path = await writeTable('swedish.json', { ...TABLE, code: 'sv' });
      expect(await loadLanguageFile(registry, path)).toBe('sv');
    });

    it('prefers an explicit code', async () => {
      const registry = new LanguageRegistry();
      const path = await writeTable('swedish.json', { ...TABLE, code: 'sv' });
      expect(await loadLanguageFile(registry, path, 'se')).toBe('se');
    });

    it('fails without any code', async () => {
      const registry = new LanguageRegistry();
      const path = await writeTable('swedish.json', TABLE);
      await expect(loadLanguageFile(registry, path)).rejects.toThrow(
        `Cannot determine language code from file ${path}. Please specify it explicitly.`
      );
    });

    it('fails on invalid JSON', async () => {
      const registry = new LanguageRegistry();
      const path = await writeTable('de.json', '{ not json');
      await expect(loadLanguageFile(registry, path)).rejects.toThrow(
        `Language file is not valid JSON: ${path}`
      );
    });

    it('fails on a missing file', async () => {
      const registry = new LanguageRegistry();
      await expect(loadLanguageFile(registry, join(dir, 'missing.json'))).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
    });
  });

  describe('loadLanguagesFromDirectory', () => {
    it('loads valid files and reports the rest', async () => {
      const registry = new LanguageRegistry();
      await writeTable('de.json', TABLE);
      await writeTable('broken.json', '{ not json');
      await writeTable('notes.txt', 'ignored');

      const result = await loadLanguagesFromDirectory(registry, dir);
      expect(result.loaded).toEqual(['de']);
      expect(result.skipped).toHaveLength(1);
      expect(result.skipped[0]?.path).toBe(join(dir, 'broken.json'));
      expect(registry.getLoadedLanguages()).toEqual(['de']);
    });

    it('honours a custom file pattern', async () => {
      const registry = new LanguageRegistry();
      await writeTable('de.json', TABLE);
      await writeTable('fr.json', TABLE);

      const result = await loadLanguagesFromDirectory(registry, dir, { pattern: /^fr\./ });
      expect(result.loaded).toEqual(['fr']);
    });

    it('loads the bundled tables from disk', async () => {
      const registry = new LanguageRegistry();
      const result = await loadLanguagesFromDirectory(registry, BUNDLED_DIR);
      expect(result.loaded).toEqual(['ar', 'de', 'en', 'es', 'fr', 'it', 'ja', 'nl', 'pt', 'ru', 'zh']);
      expect(result.skipped).toEqual([]);
      expect(new DurationFormatter(registry).format(130, 'ru')).toBe('2 минуты и 10 секунд');
    });
  });
});
