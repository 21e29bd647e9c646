// datelex/language/translator - Dictionary translation of tokens and the "in" rule

import type { DictionaryLookup } from '../dict/dictionary.js';
import { TIME_UNIT_WORDS } from '../dict/tokens.js';

/**
 * Replace every token found in the dictionary by its canonical value. Tokens
 * mapped to null become empty strings; unknown tokens pass through.
 */
export function translateTokens(tokens: readonly string[], dictionary: DictionaryLookup): string[] {
  return tokens.map(token => {
    const word = token.toLowerCase();
    return dictionary.has(word) ? (dictionary.get(word) ?? '') : token;
  });
}

/**
 * Drop the first "in" unless a time-unit word is present: "in 3 day" keeps
 * it for the relative-offset grammar, while a stray preposition translated to
 * "in" ("12 in march") loses it.
 */
export function clearFutureWords<T extends string | null>(words: readonly T[]): T[] {
  const result = [...words];
  const index = result.findIndex(word => word === 'in');
  if (index === -1) return result;
  if (result.some(word => word !== null && TIME_UNIT_WORDS.has(word))) return result;
  result.splice(index, 1);
  return result;
}
