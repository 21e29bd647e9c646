// datelex/settings - Settings passed explicitly to every Language operation

import type { Settings } from './types.js';

export const DEFAULT_SETTINGS: Settings = Object.freeze({
  normalize: false,
  skipTokens: Object.freeze(['t']),
});

export function createSettings(overrides: Partial<Settings> = {}): Settings {
  return Object.freeze({
    normalize: overrides.normalize ?? DEFAULT_SETTINGS.normalize,
    skipTokens: Object.freeze((overrides.skipTokens ?? DEFAULT_SETTINGS.skipTokens).map(t => t.toLowerCase())),
  });
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Invalid boolean flag: ${value}`);
}

/**
 * Build settings from environment variables:
 *   DATELEX_NORMALIZE   - 1/true to use the Unicode-normalized caches
 *   DATELEX_SKIP_TOKENS - comma-separated skip tokens (empty string for none)
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): Settings {
  const skipTokensRaw = env.DATELEX_SKIP_TOKENS;
  return createSettings({
    normalize: parseFlag(env.DATELEX_NORMALIZE),
    skipTokens: skipTokensRaw === undefined
      ? undefined
      : skipTokensRaw.split(',').map(t => t.trim()).filter(Boolean),
  });
}
