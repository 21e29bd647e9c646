// Grammar-engine descriptor tests
import { describe, test, expect } from 'vitest';
import { ConfigurationError, assertParserInfoArity } from '@datelex/core';
import { englishInfo, japaneseInfo, makeLanguage } from '../../../test-utils/fixtures.js';

describe('toParserInfo', () => {
  test('collects name lists in calendar order', () => {
    const descriptor = makeLanguage(englishInfo).toParserInfo();
    expect(descriptor.name).toBe('en');
    expect(descriptor.jump).toEqual(['at', 'the', ',']);
    expect(descriptor.pertain).toEqual(['of']);
    expect(descriptor.weekdays).toHaveLength(7);
    expect(descriptor.weekdays[0]).toEqual(['monday', 'mon']);
    expect(descriptor.months).toHaveLength(12);
    expect(descriptor.months[4]).toEqual(['may']);
    expect(descriptor.hms).toEqual([
      ['hour', 'hours', 'h'],
      ['minute', 'minutes', 'min'],
      ['second', 'seconds', 'sec'],
    ]);
  });

  test('missing lists are a configuration error', () => {
    const ja = makeLanguage(japaneseInfo);
    expect(() => ja.toParserInfo()).toThrow(
      '[ja] Weekdays needs 7 name lists, missing: tuesday, wednesday, thursday, friday, saturday, sunday'
    );
    expect(() => ja.toParserInfo()).toThrow(ConfigurationError);
  });
});

describe('assertParserInfoArity', () => {
  test('accepts a complete descriptor', () => {
    expect(() => assertParserInfoArity(makeLanguage(englishInfo).toParserInfo())).not.toThrow();
  });

  test('rejects a short month list', () => {
    const descriptor = makeLanguage(englishInfo).toParserInfo();
    expect(() => assertParserInfoArity({ ...descriptor, months: descriptor.months.slice(1) }))
      .toThrow('[en] months must have 12 entries, got 11');
  });
});
