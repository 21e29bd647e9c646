// datelex/language/tokenizer - Digit-run and dictionary-phrase tokenization

import { isDigits, splitDigitRuns } from '../characters.js';
import type { DictionaryLookup } from '../dict/dictionary.js';

/**
 * Split a simplified string into tokens: digit runs stay whole, every other
 * fragment is split by the dictionary (longest known word first). Without
 * `keepFormatting`, punctuation/whitespace tokens that are not always-kept are
 * dropped.
 */
export function splitTokens(text: string, dictionary: DictionaryLookup, keepFormatting: boolean): string[] {
  const tokens: string[] = [];
  for (const fragment of splitDigitRuns(text)) {
    if (isDigits(fragment)) {
      tokens.push(fragment);
    } else {
      tokens.push(...dictionary.split(fragment, keepFormatting));
    }
  }
  return tokens;
}
