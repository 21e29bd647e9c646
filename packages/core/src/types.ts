// datelex/types - Shared types for language configuration and settings

/**
 * Keys of a language configuration whose value is a list of surface forms
 * translating to the key itself (e.g. `monday: ["lunes", "lun"]`).
 */
export const KNOWN_WORD_TOKENS = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
  'decade', 'year', 'month', 'week', 'day', 'hour', 'minute', 'second',
  'ago', 'in', 'am', 'pm'
] as const;

export type KnownWordToken = typeof KNOWN_WORD_TOKENS[number];

/** A single-entry pattern → replacement map. Numbers render as decimal strings. */
export type SimplificationEntry = Record<string, string | number>;

/** A simplification after compilation: replacement is always text. */
export interface SimplificationRule {
  pattern: string;
  replacement: string;
}

export type SentenceSplitterGroup = 1 | 2 | 3 | 4 | 5 | 6;

export type LanguageInfo = {
  name: string;
  skip?: string[];
  pertain?: string[];
  simplifications?: SimplificationEntry[];
  sentence_splitter_group?: number;
  no_word_spacing?: boolean;
  'relative-type'?: Record<string, string[]>;
} & Partial<Record<KnownWordToken, string[]>>;

export interface Settings {
  /** Select the Unicode-normalized cache family (dictionary + simplifications). */
  readonly normalize: boolean;
  /** Tokens that always count as dictionary members translating to nothing. */
  readonly skipTokens: readonly string[];
}

export interface SearchResult {
  translated: string[];
  original: string[];
}

export interface Splitters {
  /** Punctuation skip tokens that occur inside dictionary words. */
  wordchars: ReadonlySet<string>;
  /** Tokens kept through tokenization and glued to their neighbours on join. */
  capturing: ReadonlySet<string>;
}
