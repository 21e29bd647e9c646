// CLI tests through the programmatic interface
import { describe, test, expect } from 'vitest';
import { LanguageNotFoundError } from '@datelex/data';
import { runCli } from '../src/index.js';

describe('runCli', () => {
  test('translates in English by default', () => {
    expect(runCli('in 3 days')).toBe('in 3 day');
  });

  test('language option', () => {
    expect(runCli('hace 2 días', { language: 'es' })).toBe('ago 2 day');
  });

  test('keep formatting', () => {
    expect(runCli('monday; 12 march')).toBe('monday 12 march');
    expect(runCli('monday; 12 march', { keepFormatting: true })).toBe('monday; 12 march');
  });

  test('search prints JSON', () => {
    expect(runCli('Meeting on monday and then lunch', { mode: 'search' }))
      .toBe('{"translated":["monday"],"original":["monday"]}');
  });

  test('applicability, with and without the timezone', () => {
    expect(runCli('12 mars', { language: 'fr', mode: 'applicable' })).toBe('true');
    expect(runCli('monday 10:30 CET', { mode: 'applicable' })).toBe('false');
    expect(runCli('monday 10:30 CET', { mode: 'applicable', stripTimezone: true })).toBe('true');
  });

  test('normalize matches unaccented words and strips accents from the input', () => {
    expect(runCli('miercoles', { language: 'es' })).toBe('miercoles');
    expect(runCli('miercoles', { language: 'es', normalize: true })).toBe('wednesday');
    expect(runCli('miércoles', { language: 'es', normalize: true })).toBe('wednesday');
  });

  test('parser info ignores the input', () => {
    const descriptor: unknown = JSON.parse(runCli('', { mode: 'parser-info' }));
    expect(descriptor).toMatchObject({ name: 'en', weekdays: expect.arrayContaining([['monday', 'mon']]) });
  });

  test('unknown language', () => {
    expect(() => runCli('x', { language: 'xx' })).toThrow(LanguageNotFoundError);
  });
});
