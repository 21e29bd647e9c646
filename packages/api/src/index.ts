#!/usr/bin/env node

/**
 * REST API server for datelex
 * Exposes translation, search and applicability over HTTP
 */

import { createServer, IncomingHttpHeaders, IncomingMessage, ServerResponse } from 'http';
import type { Readable } from 'stream';
import { z } from 'zod';
import { config } from 'dotenv';
import {
  ConfigurationError,
  createSettings,
  normalizeUnicode,
  printPerfCountersAndReset,
  settingsFromEnv,
  type Language,
  type Settings
} from '@datelex/core';
import { LanguageNotFoundError, availableLanguages, getLanguage } from '@datelex/data';

// Parse environment variables
config();

const PORT = parseInt(process.env.PORT || '3000', 10);
export const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB

export class HttpError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export class JsonBodyError extends HttpError {
  constructor(message: string, status = 400) {
    super(message, status);
    this.name = 'JsonBodyError';
  }
}

export interface RouteResult {
  status: number;
  body: unknown;
}

const requestSchema = z.object({
  text: z.string(),
  language: z.string().min(1).default('en'),
  keepFormatting: z.boolean().optional(),
  normalize: z.boolean().optional(),
  stripTimezone: z.boolean().optional(),
});

type TextRequest = z.infer<typeof requestSchema>;

const baseSettings = settingsFromEnv();
const settingsByMode: Record<'raw' | 'normalized', Settings> = {
  raw: createSettings({ ...baseSettings, normalize: false }),
  normalized: createSettings({ ...baseSettings, normalize: true }),
};

function settingsFor(normalize: boolean | undefined): Settings {
  return (normalize ?? baseSettings.normalize) ? settingsByMode.normalized : settingsByMode.raw;
}

function parseTextRequest(body: unknown): TextRequest {
  const result = requestSchema.safeParse(body);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new HttpError(`Invalid request body: ${details}`);
  }
  return result.data;
}

interface PreparedRequest {
  request: TextRequest;
  language: Language;
  settings: Settings;
  text: string;
}

function prepare(body: unknown): PreparedRequest {
  const request = parseTextRequest(body);
  const settings = settingsFor(request.normalize);
  return {
    request,
    language: getLanguage(request.language),
    settings,
    text: settings.normalize ? normalizeUnicode(request.text) : request.text,
  };
}

const API_DOCS = {
  name: 'datelex REST API',
  version: '0.1.0',
  endpoints: {
    'GET /health': 'Health check',
    'GET /api/languages': 'Available language codes',
    'GET /api/languages/:code/parser-info': 'Name lists for the date grammar',
    'POST /api/translate': 'Translate a date string (body: {text, language?, keepFormatting?, normalize?})',
    'POST /api/search': 'Find date-like spans in free text (body: {text, language?, normalize?})',
    'POST /api/applicable': 'Check whether text reads in a language (body: {text, language?, normalize?, stripTimezone?})'
  },
  examples: {
    translate: { url: '/api/translate', body: { text: 'hace 2 días', language: 'es' } },
    search: { url: '/api/search', body: { text: 'Meeting on monday and then lunch' } },
    applicable: { url: '/api/applicable', body: { text: '12 mars', language: 'fr' } }
  }
};

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(`Malformed path segment: ${segment}`);
  }
}

const PARSER_INFO_PATH = /^\/api\/languages\/([^/]+)\/parser-info$/;

function route(method: string, path: string, body: unknown): RouteResult {
  if (method === 'GET') {
    if (path === '/health') {
      return { status: 200, body: { status: 'ok', timestamp: new Date().toISOString() } };
    }
    if (path === '/api') {
      return { status: 200, body: API_DOCS };
    }
    if (path === '/api/languages') {
      return { status: 200, body: { languages: availableLanguages() } };
    }
    const parserInfo = PARSER_INFO_PATH.exec(path);
    if (parserInfo) {
      const code = decodePathSegment(parserInfo[1]);
      return { status: 200, body: { language: code, parserInfo: getLanguage(code).toParserInfo() } };
    }
  }

  if (method === 'POST') {
    if (path === '/api/translate') {
      const { request, language, settings, text } = prepare(body);
      const translated = language.translate(text, settings, { keepFormatting: request.keepFormatting });
      return { status: 200, body: { text: request.text, language: language.shortname, translated } };
    }
    if (path === '/api/search') {
      const { request, language, settings, text } = prepare(body);
      const { translated, original } = language.translateSearch(text, settings);
      return { status: 200, body: { text: request.text, language: language.shortname, translated, original } };
    }
    if (path === '/api/applicable') {
      const { request, language, settings, text } = prepare(body);
      const applicable = language.isApplicable(text, settings, { stripTimezone: request.stripTimezone });
      return { status: 200, body: { text: request.text, language: language.shortname, applicable } };
    }
  }

  return { status: 404, body: { error: 'Not found' } };
}

/**
 * Dispatch one request. Known failures become error responses; anything else
 * propagates to the server's handler.
 */
export function routeRequest(method: string, path: string, body?: unknown): RouteResult {
  try {
    return route(method.toUpperCase(), path, body);
  } catch (error) {
    if (error instanceof HttpError) {
      return { status: error.status, body: { error: error.message } };
    }
    if (error instanceof LanguageNotFoundError) {
      return { status: 404, body: { error: error.message } };
    }
    if (error instanceof ConfigurationError) {
      return { status: 500, body: { error: error.message } };
    }
    throw error;
  }
}

/** Reject bodies over MAX_JSON_BODY_SIZE bytes with 413. */
export function checkBodySize(bytes: number): void {
  if (Number.isFinite(bytes) && bytes > MAX_JSON_BODY_SIZE) {
    throw new JsonBodyError('Payload too large', 413);
  }
}

/**
 * Parse a request body's text as JSON
 */
export function parseJsonText(text: string): unknown {
  if (!text) {
    throw new JsonBodyError('Empty body');
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new JsonBodyError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export type RequestStream = Readable & { headers: IncomingHttpHeaders };

/**
 * Parse JSON body from request. Chunks are decoded together so a multi-byte
 * character split across chunks survives.
 */
export async function parseJsonBody(req: RequestStream): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const contentLengthHeader = req.headers['content-length'];
    try {
      if (contentLengthHeader) checkBodySize(Number(contentLengthHeader));
    } catch (error) {
      reject(error);
      return;
    }

    req.on('data', (chunk: Buffer) => {
      received += chunk.length;
      try {
        checkBodySize(received);
      } catch (error) {
        req.destroy();
        reject(error);
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      try {
        resolve(parseJsonText(Buffer.concat(chunks).toString('utf8')));
      } catch (error) {
        reject(error);
      }
    });

    req.on('error', (err) => {
      reject(err instanceof JsonBodyError ? err : new JsonBodyError(String(err), 400));
    });
  });
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, data: unknown, status = 200, requestId?: string): void {
  const json = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(json);
  if (requestId) {
    console.log(`[${requestId}] Response sent: ${json.length} bytes, status ${status}`);
  }
}

/**
 * Main request handler
 */
async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const requestId = Math.random().toString(36).substring(7);
  const startTime = Date.now();
  const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
  const method = req.method ?? 'GET';

  console.log(`[${requestId}] START ${method} ${url.pathname}`);

  // CORS headers
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

  // Handle OPTIONS for CORS preflight
  if (method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    console.log(`[${requestId}] END OPTIONS ${url.pathname} - ${Date.now() - startTime}ms`);
    return;
  }

  try {
    const body = method === 'POST' ? await parseJsonBody(req) : undefined;
    const { status, body: payload } = routeRequest(method, url.pathname, body);
    sendJson(res, payload, status, requestId);
    console.log(`[${requestId}] END ${url.pathname} - ${Date.now() - startTime}ms`);
  } catch (error) {
    console.error(`[${requestId}] Request error:`, error);
    if (error instanceof HttpError) {
      sendJson(res, { error: error.message }, error.status, requestId);
    } else {
      const message = error instanceof Error ? error.message : 'Internal server error';
      sendJson(res, { error: message }, 500, requestId);
    }
    console.log(`[${requestId}] END ${url.pathname} ERROR - ${Date.now() - startTime}ms`);
  }
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
  });

  const server = createServer((req, res) => {
    handleRequest(req, res).catch((error) => {
      console.error('Handler failure:', error);
      if (!res.headersSent) {
        sendJson(res, { error: 'Internal server error' }, 500);
      }
    });
  });

  server.listen(PORT, '0.0.0.0', () => {
    console.log(`datelex API server listening on http://0.0.0.0:${PORT}`);
    console.log(`Health check: http://0.0.0.0:${PORT}/health`);
    console.log(`API docs: http://0.0.0.0:${PORT}/api`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('Server closed');
      printPerfCountersAndReset();
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Run server if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
