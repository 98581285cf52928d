/**
 * @fileoverview Spelling Dictionary Store
 *
 * Word sets per language, loaded once from a directory tree laid out as
 * `<root>/<language>/<any word list files>`, one word per line. Words found
 * under `<root>/global/` are added to every language lookup.
 */

import { readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { logInfo, logWarning } from '../telemetry/logger.js';

export const GLOBAL_DICTIONARY = 'global';

export class SpellingDictionaryStore {
  private readonly languages = new Map<string, Set<string>>();

  addWords(language: string, words: Iterable<string>): void {
    let set = this.languages.get(language);
    if (!set) {
      set = new Set();
      this.languages.set(language, set);
    }
    for (const word of words) {
      const normalized = word.trim().toLowerCase();
      if (normalized.length > 0) {
        set.add(normalized);
      }
    }
  }

  languageTags(): string[] {
    return [...this.languages.keys()].sort();
  }

  /**
   * Words for `language` merged with the global words, or undefined when no
   * dictionary exists for the language. Stored sets are never modified.
   */
  lookup(language: string): ReadonlySet<string> | undefined {
    const own = this.languages.get(language);
    if (!own) return undefined;
    const shared = this.languages.get(GLOBAL_DICTIONARY);
    if (!shared || language === GLOBAL_DICTIONARY) return own;
    return new Set([...own, ...shared]);
  }
}

export function parseWordList(content: string): string[] {
  return content.split(/\r?\n/);
}

export async function loadSpellingDictionaries(root: string): Promise<SpellingDictionaryStore> {
  const store = new SpellingDictionaryStore();

  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      logWarning(`[spelling] dictionary root is not a directory: ${root}`);
      return store;
    }
  } catch {
    logWarning(`[spelling] dictionary root not found: ${root}`);
    return store;
  }

  const files = await glob('*/**/*', {
    cwd: root,
    nodir: true,
    follow: true,
    posix: true,
  });

  for (const file of files.sort()) {
    const language = path.posix.basename(path.posix.dirname(file));
    const content = await readFile(path.join(root, file), 'utf8');
    store.addWords(language, parseWordList(content));
    logInfo(`[spelling] loaded dictionary ${path.posix.basename(file)} for ${language}`);
  }

  return store;
}
