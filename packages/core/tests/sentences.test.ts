// Sentence splitting and splitter-set tests
import { describe, test, expect, afterEach } from 'vitest';
import {
  getSentenceSplitter,
  registerSentenceSplitter,
  registeredSentenceSplitterGroups,
  splitSentences,
  unregisterSentenceSplitter
} from '@datelex/core';
import { englishInfo, makeLanguage, rawSettings } from '../../../test-utils/fixtures.js';

function splitterFor(group: number): RegExp {
  const splitter = getSentenceSplitter(group);
  if (!splitter) throw new Error(`no splitter for group ${group}`);
  return splitter;
}

describe('splitSentences', () => {
  test('default punctuation', () => {
    expect(splitSentences('Hello. World! Ok', splitterFor(1))).toEqual(['Hello', 'World', 'Ok']);
  });

  test('inverted marks open a sentence', () => {
    expect(splitSentences('¿Vienes el lunes? Sí', splitterFor(2))).toEqual(['Vienes el lunes', 'Sí']);
  });

  test('full-width stops', () => {
    expect(splitSentences('今日は。明日も', splitterFor(4))).toEqual(['今日は', '明日も']);
  });

  test('line breaks only', () => {
    expect(splitSentences('a. b\nc', splitterFor(5))).toEqual(['a. b', 'c']);
  });

  test('six groups are built in', () => {
    expect(registeredSentenceSplitterGroups()).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe('registerSentenceSplitter', () => {
  afterEach(() => {
    unregisterSentenceSplitter(7);
  });

  test('adds a group', () => {
    registerSentenceSplitter(7, /\|\|/u);
    expect(splitSentences('a||b', splitterFor(7))).toEqual(['a', 'b']);
    expect(registeredSentenceSplitterGroups()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  test('a language file can select a registered group', () => {
    registerSentenceSplitter(7, /\|\|/u);
    const info = { ...englishInfo, name: 'xx', sentence_splitter_group: 7 };
    const lang = makeLanguage(info);
    expect(lang.validateInfo()).toEqual({ valid: true, issues: [] });
    expect(lang.translateSearch('monday||march', rawSettings)).toEqual({
      translated: ['monday', 'march'],
      original: ['monday', 'march'],
    });
  });

  test('unregistering removes only that group', () => {
    registerSentenceSplitter(7, /\|\|/u);
    expect(unregisterSentenceSplitter(7)).toBe(true);
    expect(unregisterSentenceSplitter(7)).toBe(false);
    expect(registeredSentenceSplitterGroups()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  test('rejects patterns that match the empty string', () => {
    expect(() => registerSentenceSplitter(8, /x*/u)).toThrow(RangeError);
  });

  test('rejects invalid group numbers', () => {
    expect(() => registerSentenceSplitter(0, /x/u)).toThrow(RangeError);
    expect(() => registerSentenceSplitter(1.5, /x/u)).toThrow(RangeError);
  });
});

describe('splitters', () => {
  const en = makeLanguage(englishInfo);

  test('wordchars hold the letters of dictionary words and digits, not spaces', () => {
    const wordchars = en.getWordchars(rawSettings);
    expect(wordchars.has('m')).toBe(true);
    expect(wordchars.has('.')).toBe(true);
    expect(wordchars.has('0')).toBe(true);
    expect(wordchars.has(' ')).toBe(false);
  });

  test('punctuation used inside words splits only between non-word characters', () => {
    const splitters = en.getSplitters(rawSettings);
    expect([...splitters.wordchars]).toEqual(['.']);
    expect([...splitters.capturing].sort()).toEqual([' ', '+', '-', '.', '/', ':']);
  });

  test('splitters are memoized', () => {
    expect(en.getSplitters(rawSettings)).toBe(en.getSplitters(rawSettings));
  });
});
