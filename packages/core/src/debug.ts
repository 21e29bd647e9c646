// datelex/debug - Debug logging
// Enable with: DATELEX_DEBUG=1 or setDebug(true)

export let DEBUG = process.env.DATELEX_DEBUG === '1' || process.env.DATELEX_DEBUG === 'true';

export function setDebug(value: boolean) {
  DEBUG = value;
}

export function dp(...args: unknown[]) {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}
