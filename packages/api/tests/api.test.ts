// API routing tests (no server is started)
import { describe, test, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { LANGUAGES_DIR, setLanguagesDir } from '@datelex/data';
import {
  JsonBodyError,
  MAX_JSON_BODY_SIZE,
  checkBodySize,
  parseJsonBody,
  parseJsonText,
  routeRequest
} from '../src/index.js';

describe('GET routes', () => {
  test('health', () => {
    const result = routeRequest('GET', '/health');
    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ status: 'ok' });
  });

  test('languages', () => {
    expect(routeRequest('GET', '/api/languages')).toEqual({
      status: 200,
      body: { languages: ['ar', 'de', 'en', 'es', 'fr', 'hi', 'ja', 'ru', 'th', 'zh'] },
    });
  });

  test('parser info', () => {
    const result = routeRequest('GET', '/api/languages/fr/parser-info');
    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ language: 'fr', parserInfo: { name: 'fr', months: expect.arrayContaining([['mars']]) } });
  });

  test('docs', () => {
    expect(routeRequest('get', '/api').body).toMatchObject({ name: 'datelex REST API' });
  });

  test('unknown language is 404', () => {
    expect(routeRequest('GET', '/api/languages/xx/parser-info')).toEqual({
      status: 404,
      body: { error: 'Unknown language: xx' },
    });
  });

  test('malformed escape in the language code is 400', () => {
    expect(routeRequest('GET', '/api/languages/%E0/parser-info')).toEqual({
      status: 400,
      body: { error: 'Malformed path segment: %E0' },
    });
  });

  test('unknown route is 404', () => {
    expect(routeRequest('GET', '/nope')).toEqual({ status: 404, body: { error: 'Not found' } });
    expect(routeRequest('GET', '/api/translate').status).toBe(404);
  });
});

describe('POST routes', () => {
  test('translate', () => {
    expect(routeRequest('POST', '/api/translate', { text: 'hace 2 días', language: 'es' })).toEqual({
      status: 200,
      body: { text: 'hace 2 días', language: 'es', translated: 'ago 2 day' },
    });
  });

  test('translate defaults to English', () => {
    expect(routeRequest('POST', '/api/translate', { text: 'in 3 days' }).body)
      .toEqual({ text: 'in 3 days', language: 'en', translated: 'in 3 day' });
  });

  test('translate with normalization', () => {
    expect(routeRequest('POST', '/api/translate', { text: 'miércoles', language: 'es', normalize: true }).body)
      .toMatchObject({ translated: 'wednesday' });
  });

  test('search', () => {
    expect(routeRequest('POST', '/api/search', { text: 'Meeting on monday and then lunch' }).body).toEqual({
      text: 'Meeting on monday and then lunch',
      language: 'en',
      translated: ['monday'],
      original: ['monday'],
    });
  });

  test('applicable', () => {
    expect(routeRequest('POST', '/api/applicable', { text: '12 mars', language: 'fr' }).body)
      .toMatchObject({ applicable: true });
    expect(routeRequest('POST', '/api/applicable', { text: 'monday 10:30 CET', stripTimezone: true }).body)
      .toMatchObject({ applicable: true });
  });

  test('missing text is 400', () => {
    expect(routeRequest('POST', '/api/translate', {})).toEqual({
      status: 400,
      body: { error: 'Invalid request body: text: Required' },
    });
  });
});

describe('configuration errors', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    setLanguagesDir(LANGUAGES_DIR);
  });

  test('are reported as 500', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'datelex-api-'));
    fs.writeFileSync(path.join(dir, 'xx.json'), JSON.stringify({ name: 'xx', monday: ['mon'] }));
    setLanguagesDir(dir);

    const result = routeRequest('GET', '/api/languages/xx/parser-info');
    expect(result.status).toBe(500);
    expect(result.body).toEqual({
      error: '[xx] Weekdays needs 7 name lists, missing: tuesday, wednesday, thursday, friday, saturday, sunday',
    });
  });
});

describe('request bodies', () => {
  test('empty and malformed JSON', () => {
    expect(() => parseJsonText('')).toThrow('Empty body');
    expect(() => parseJsonText('{')).toThrow(JsonBodyError);
    expect(parseJsonText('{"text":"x"}')).toEqual({ text: 'x' });
  });

  test('size limit', () => {
    expect(() => checkBodySize(MAX_JSON_BODY_SIZE)).not.toThrow();
    try {
      checkBodySize(MAX_JSON_BODY_SIZE + 1);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(JsonBodyError);
      if (error instanceof JsonBodyError) expect(error.status).toBe(413);
    }
  });

  test('a character split across chunks is decoded whole', async () => {
    const bytes = Buffer.from('{"text":"3日前","language":"ja"}', 'utf8');
    // 日 occupies bytes 10-12
    const req = Object.assign(Readable.from([bytes.subarray(0, 11), bytes.subarray(11)]), { headers: {} });
    await expect(parseJsonBody(req)).resolves.toEqual({ text: '3日前', language: 'ja' });
  });

  test('an oversized content-length is rejected before reading', async () => {
    const req = Object.assign(Readable.from([]), { headers: { 'content-length': String(MAX_JSON_BODY_SIZE + 1) } });
    await expect(parseJsonBody(req)).rejects.toThrow('Payload too large');
  });
});
