// Language configuration validation tests
import { describe, test, expect } from 'vitest';
import { ConfigurationError, LanguageValidator, parseLanguageInfo } from '@datelex/core';
import { englishInfo, japaneseInfo, makeLanguage } from '../../../test-utils/fixtures.js';

function issuePaths(info: unknown): string[] {
  return LanguageValidator.validateInfo('xx', info).issues.map(issue => issue.path);
}

describe('LanguageValidator', () => {
  test('fixtures are valid', () => {
    expect(LanguageValidator.validateInfo('en', englishInfo)).toEqual({ valid: true, issues: [] });
    expect(makeLanguage(japaneseInfo).validateInfo().valid).toBe(true);
  });

  test('empty name lists', () => {
    expect(issuePaths({ name: 'xx', monday: [] })).toEqual(['monday']);
  });

  test('simplifications need exactly one compiling pattern', () => {
    expect(issuePaths({ name: 'xx', simplifications: [{ a: '1', b: '2' }] })).toEqual(['simplifications.0']);
    expect(issuePaths({ name: 'xx', simplifications: [{ '(': 'x' }] })).toEqual(['simplifications.0']);
  });

  test('unknown keys and out-of-range groups', () => {
    expect(issuePaths({ name: 'xx', mondays: ['mon'] })).toEqual(['(root)']);
    expect(issuePaths({ name: 'xx', sentence_splitter_group: 0 })).toEqual(['sentence_splitter_group']);
    expect(issuePaths({ name: 'xx', sentence_splitter_group: 1.5 })).toEqual(['sentence_splitter_group']);
  });

  test('groups past the built-in six are accepted', () => {
    expect(issuePaths({ name: 'xx', sentence_splitter_group: 7 })).toEqual([]);
  });

  test('a custom validator can be supplied', () => {
    const report = makeLanguage(englishInfo).validateInfo({
      validateInfo: () => ({ valid: false, issues: [{ path: 'name', message: 'reserved' }] }),
    });
    expect(report.issues).toEqual([{ path: 'name', message: 'reserved' }]);
  });
});

describe('parseLanguageInfo', () => {
  test('returns the parsed configuration', () => {
    expect(parseLanguageInfo('en', englishInfo)).toEqual(englishInfo);
  });

  test('throws a ConfigurationError listing the issues', () => {
    expect(() => parseLanguageInfo('xx', { name: 'xx', monday: [] })).toThrow(ConfigurationError);
    expect(() => parseLanguageInfo('xx', { name: 'xx', monday: [] })).toThrow(/\[xx\] Invalid language configuration: monday: /);
  });
});
