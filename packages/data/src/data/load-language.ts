// datelex/data/load-language - Read and validate language configuration files

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError, dp, parseLanguageInfo, type LanguageInfo } from '@datelex/core';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Directory holding `<code>.json` language files. */
export const LANGUAGES_DIR = path.resolve(__dirname, '../../languages');

const LANGUAGE_CODE = /^[a-z]{2,3}(?:-[a-z0-9]{2,8})*$/;

export class LanguageNotFoundError extends Error {
  readonly code: string;

  constructor(code: string) {
    super(`Unknown language: ${code}`);
    this.name = 'LanguageNotFoundError';
    this.code = code;
  }
}

/** Language codes with a configuration file, sorted. */
export function availableLanguages(dir: string = LANGUAGES_DIR): string[] {
  return fs.readdirSync(dir)
    .filter(file => file.endsWith('.json'))
    .map(file => path.basename(file, '.json'))
    .sort();
}

/**
 * Load `<dir>/<code>.json` and validate it. The file's `name` must equal the
 * code it is stored under.
 */
export function loadLanguageInfo(code: string, dir: string = LANGUAGES_DIR): LanguageInfo {
  if (!LANGUAGE_CODE.test(code)) {
    throw new LanguageNotFoundError(code);
  }
  const file = path.join(dir, `${code}.json`);
  if (!fs.existsSync(file)) {
    throw new LanguageNotFoundError(code);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      code,
      `Cannot read ${path.basename(file)}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const info = parseLanguageInfo(code, raw);
  if (info.name !== code) {
    throw new ConfigurationError(code, `File declares name "${info.name}"`);
  }
  dp(`Loaded language ${code} from ${file}`);
  return info;
}
