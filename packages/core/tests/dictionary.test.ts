// Dictionary tests
import { describe, test, expect } from 'vitest';
import { Dictionary, NormalizedDictionary, createSettings } from '@datelex/core';
import { englishInfo, spanishInfo, makeLanguage, rawSettings, normalizedSettings } from '../../../test-utils/fixtures.js';

describe('Dictionary lookups', () => {
  const en = makeLanguage(englishInfo);
  const dictionary = en.getDictionary(rawSettings);

  test('configured words map to their canonical token', () => {
    expect(dictionary.get('mon')).toBe('monday');
    expect(dictionary.get('days')).toBe('day');
    expect(dictionary.get('yesterday')).toBe('1 day ago');
  });

  test('skip and pertain words translate to null', () => {
    expect(dictionary.has('the')).toBe(true);
    expect(dictionary.get('the')).toBeNull();
    expect(dictionary.get('of')).toBeNull();
  });

  test('grammar tokens are always present', () => {
    expect(dictionary.get('utc')).toBe('UTC');
    expect(dictionary.get('z')).toBe('Z');
    expect(dictionary.get('+')).toBe('+');
    expect(dictionary.get(' ')).toBe(' ');
  });

  test('unknown words are absent', () => {
    expect(dictionary.has('meeting')).toBe(false);
    expect(dictionary.get('meeting')).toBeUndefined();
  });

  test('skip tokens come from settings', () => {
    expect(dictionary.has('t')).toBe(true);
    expect(dictionary.get('t')).toBeNull();
    expect(en.getDictionary(createSettings({ skipTokens: [] })).has('t')).toBe(false);
  });

  test('views are memoized per settings object', () => {
    expect(en.getDictionary(rawSettings)).toBe(dictionary);
  });
});

describe('Dictionary.split', () => {
  const dictionary = makeLanguage(englishInfo).getDictionary(rawSettings);

  test('prefers the longest known word', () => {
    expect(dictionary.split('monday', false)).toEqual(['monday']);
    expect(dictionary.split('the day before yesterday', false)).toEqual(['the', ' ', 'day before yesterday']);
  });

  test('known words need a boundary on both sides', () => {
    expect(dictionary.split('mars', false)).toEqual(['mars']);
  });

  test('punctuation outside the dictionary is dropped unless formatting is kept', () => {
    expect(dictionary.split('monday; ', false)).toEqual(['monday', ' ']);
    expect(dictionary.split('monday; ', true)).toEqual(['monday', ';', ' ']);
  });
});

describe('NormalizedDictionary', () => {
  test('accented keys are reachable unaccented', () => {
    const es = makeLanguage(spanishInfo);
    expect(es.getDictionary(normalizedSettings).get('miercoles')).toBe('wednesday');
    expect(es.getDictionary(rawSettings).has('miercoles')).toBe(false);
    expect(es.getDictionary(normalizedSettings).normalized).toBe(true);
  });

  test('a colliding key is dropped unless it is a skip word', () => {
    const dictionary = new NormalizedDictionary({
      name: 'xx',
      skip: ['dé'],
      day: ['de'],
      monday: ['lúnes'],
      tuesday: ['lunes'],
    });
    const view = dictionary.bind(rawSettings);
    expect(view.get('de')).toBeNull();
    expect(view.get('lunes')).toBe('tuesday');
  });

  test('the plain dictionary keeps keys as written', () => {
    const dictionary = new Dictionary({ name: 'xx', wednesday: ['Miércoles'] });
    expect(dictionary.words()).toContain('miércoles');
    expect(dictionary.normalized).toBe(false);
  });
});
