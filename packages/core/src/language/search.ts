// datelex/language/search - Free-text scanning for date-like spans

import type { SearchResult } from '../types.js';
import type { DictionaryLookup, Translation } from '../dict/dictionary.js';
import { SEARCH_DASHES, SEARCH_STRIP_CHARS } from '../dict/tokens.js';
import { hasDigit, splitWhitespace, stripChars } from '../characters.js';
import { splitSentences } from './sentences.js';
import { clearFutureWords } from './translator.js';

export interface SearchContext {
  dictionary: DictionaryLookup;
  noWordSpacing: boolean;
  sentenceSplitter: RegExp;
  simplify(text: string): string;
  /** Tokenize without simplification (used to find words in unspaced scripts). */
  split(text: string, keepFormatting: boolean): string[];
  join(tokens: readonly string[], separator: string): string;
}

const NUMERIC_LOOKING_UNSPACED = /[\p{Nd}.:\-/]/u;

/** Digit-bearing; unspaced scripts also accept date punctuation (`. : - /`). */
export function looksNumeric(word: string, noWordSpacing: boolean): boolean {
  return noWordSpacing ? NUMERIC_LOOKING_UNSPACED.test(word) : hasDigit(word);
}

function splitWords(sentence: string, ctx: SearchContext): string[] {
  return ctx.noWordSpacing ? ctx.split(sentence, true) : splitWhitespace(sentence);
}

function joinChunk(chunk: readonly string[], ctx: SearchContext): string {
  return ctx.noWordSpacing ? ctx.join(chunk, '') : chunk.join(' ');
}

/**
 * Find the maximal runs of recognized or numeric words in `text`. Returns the
 * translation of each run and, at the same index, its original surface text.
 */
export function translateSearch(text: string, ctx: SearchContext): SearchResult {
  const translatedChunks: Translation[][] = [];
  const originalChunks: string[][] = [];

  for (const sentence of splitSentences(text, ctx.sentenceSplitter)) {
    let translatedChunk: Translation[] = [];
    let originalChunk: string[] = [];

    for (const original of splitWords(sentence, ctx)) {
      const word = ctx.simplify(original.toLowerCase());
      const stripped = stripChars(word, SEARCH_STRIP_CHARS);

      if (ctx.dictionary.has(stripped) && !SEARCH_DASHES.has(word)) {
        translatedChunk.push(ctx.dictionary.get(stripped) ?? null);
        originalChunk.push(original);
      } else if (looksNumeric(word, ctx.noWordSpacing)) {
        translatedChunk.push(word);
        originalChunk.push(original);
      } else if (translatedChunk.length > 0) {
        translatedChunks.push(translatedChunk);
        originalChunks.push(originalChunk);
        translatedChunk = [];
        originalChunk = [];
      }
    }

    if (translatedChunk.length > 0) {
      translatedChunks.push(translatedChunk);
      originalChunks.push(originalChunk);
    }
  }

  const translated = translatedChunks.map(chunk =>
    joinChunk(clearFutureWords(chunk).filter((word): word is string => Boolean(word)), ctx)
  );
  const original = originalChunks.map(chunk => joinChunk(chunk.filter(Boolean), ctx));

  return { translated, original };
}
