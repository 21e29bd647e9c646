// datelex/errors - Error types

/**
 * Malformed language configuration: wrong-arity name lists, an unparsable
 * simplification pattern, a file that fails validation. Never retried.
 */
export class ConfigurationError extends Error {
  readonly languageId: string;

  constructor(languageId: string, message: string, options?: { cause?: unknown }) {
    super(`[${languageId}] ${message}`, options);
    this.name = 'ConfigurationError';
    this.languageId = languageId;
  }
}
