// datelex/language/splitters - Word-character set and splitter sets derived from the dictionary

import type { LanguageInfo, Splitters } from '../types.js';
import { ALWAYS_KEEP_TOKENS } from '../dict/tokens.js';
import { hasNoLetters, isNonWord } from '../characters.js';

const DIGIT_CHARS = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'];

/**
 * Characters that occur inside dictionary words (words with at least one
 * letter), without the space, plus the ASCII digits.
 */
export function buildWordchars(words: Iterable<string>): Set<string> {
  const wordchars = new Set<string>();
  for (const word of words) {
    if (hasNoLetters(word)) continue;
    for (const char of word) {
      wordchars.add(char.toLowerCase());
    }
  }
  wordchars.delete(' ');
  for (const digit of DIGIT_CHARS) wordchars.add(digit);
  return wordchars;
}

/**
 * `capturing`: the always-kept tokens. `wordchars`: punctuation-only skip (or
 * capturing) tokens that also appear inside dictionary words, so they only
 * split text when not surrounded by word characters.
 */
export function buildSplitters(info: LanguageInfo, wordchars: ReadonlySet<string>): Splitters {
  const capturing = new Set<string>(ALWAYS_KEEP_TOKENS);
  const wordcharSplitters = new Set<string>();

  const candidates = new Set([...(info.skip ?? []), ...capturing]);
  for (const token of candidates) {
    if (!isNonWord(token)) continue;
    if (wordchars.has(token)) {
      wordcharSplitters.add(token);
    }
  }

  return { wordchars: wordcharSplitters, capturing };
}
