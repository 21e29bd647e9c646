// datelex/dict/tokens - Fixed token sets shared by the dictionary and the language pipeline

/** Separators the downstream grammar relies on; always kept as tokens. */
export const PARSER_HARDCODED_TOKENS = [':', '.', ' ', '-', '/'] as const;

/** Tokens the grammar understands as-is, keyed by their lowercase form. */
export const PARSER_KNOWN_TOKENS = ['am', 'pm', 'UTC', 'GMT', 'Z'] as const;

export const ALWAYS_KEEP_TOKENS: readonly string[] = ['+', ...PARSER_HARDCODED_TOKENS];

/** Words whose presence keeps a leading "in" ("in 3 days"). */
export const TIME_UNIT_WORDS: ReadonlySet<string> = new Set([
  'day', 'week', 'month', 'year', 'hour', 'minute', 'second'
]);

/** Dash-like words never treated as dictionary hits while scanning free text. */
export const SEARCH_DASHES: ReadonlySet<string> = new Set(['-', '——', '—', '～']);

/** Characters stripped from both ends of a free-text word before lookup. */
export const SEARCH_STRIP_CHARS = '()"{}[],.';
