// datelex/data/registry - LRU cache of Language instances keyed by code

import { LRUCache } from 'lru-cache';
import { Language, dp } from '@datelex/core';
import { LANGUAGES_DIR, loadLanguageInfo } from './load-language.js';

const DEFAULT_CAPACITY = 32;

let languageCache: LRUCache<string, Language> = new LRUCache({ max: DEFAULT_CAPACITY });
let languageCacheHits = 0;
let languageCacheMisses = 0;
let languagesDir = LANGUAGES_DIR;

/**
 * Get the Language for a code, loading its file on first use. An evicted
 * language is rebuilt from disk and loses its derived caches.
 */
export function getLanguage(code: string): Language {
  const key = code.trim().toLowerCase();

  let language = languageCache.get(key);
  if (!language) {
    language = new Language(key, loadLanguageInfo(key, languagesDir));
    languageCache.set(key, language);
    languageCacheMisses++;
    dp(`Language cache miss: ${key}`);
  } else {
    languageCacheHits++;
  }

  return language;
}

/** Drop every cached language and reset the statistics. */
export function clearLanguageCache(): void {
  languageCache.clear();
  languageCacheHits = 0;
  languageCacheMisses = 0;
}

export function setLanguageCacheCapacity(capacity: number): void {
  if (Number.isFinite(capacity) && capacity > 0) {
    languageCache = new LRUCache({ max: Math.floor(capacity) });
  }
}

/** Point the registry at another directory of language files (clears the cache). */
export function setLanguagesDir(dir: string): void {
  languagesDir = dir;
  clearLanguageCache();
}

export function getLanguagesDir(): string {
  return languagesDir;
}

export function getLanguageCacheStats(): { hits: number; misses: number; size: number } {
  return { hits: languageCacheHits, misses: languageCacheMisses, size: languageCache.size };
}
