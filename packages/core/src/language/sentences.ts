// datelex/language/sentences - Script-family sentence boundary strategies

import type { SentenceSplitterGroup } from '../types.js';

export const DEFAULT_SENTENCE_SPLITTER_GROUP: SentenceSplitterGroup = 1;

const sentenceSplitters = new Map<number, RegExp>([
  // Most European languages, Tagalog, Hebrew, Georgian, Indonesian, Vietnamese
  [1, /[.!?;…\r\n]+\s*/u],
  // Spanish: inverted marks open a sentence
  [2, /(?:[¡¿]+|[.!?;…\r\n]+(?:\s|$))+/u],
  // Hindi and Bangla
  [3, /[|।!?;\r\n]+\s*/u],
  // Japanese and Chinese
  [4, /[。…‥.!?？！;\r\n]+\s*/u],
  // Thai
  [5, /[\r\n]+/u],
  // Arabic and Farsi
  [6, /[\r\n؟!.…]+\s*/u],
]);

/**
 * Register (or replace) the boundary pattern for a script family. The pattern
 * must not match the empty string.
 */
export function registerSentenceSplitter(group: number, pattern: RegExp): void {
  if (!Number.isInteger(group) || group < 1) {
    throw new RangeError(`Sentence splitter group must be a positive integer, got ${group}`);
  }
  if (pattern.test('')) {
    throw new RangeError(`Sentence splitter for group ${group} matches the empty string`);
  }
  sentenceSplitters.set(group, pattern);
}

export function unregisterSentenceSplitter(group: number): boolean {
  return sentenceSplitters.delete(group);
}

export function getSentenceSplitter(group: number): RegExp | undefined {
  return sentenceSplitters.get(group);
}

export function registeredSentenceSplitterGroups(): number[] {
  return [...sentenceSplitters.keys()].sort((a, b) => a - b);
}

export function splitSentences(text: string, splitter: RegExp): string[] {
  return text.split(splitter).filter(Boolean);
}
