// @datelex/core - Language model, simplifier, tokenizer, translator and search segmenter

// Shared types
export type * from './types.js';
export { KNOWN_WORD_TOKENS } from './types.js';

// Language
export { Language, type CacheMode, type TranslateOptions, type ApplicabilityOptions } from './language/language.js';
export { PatternCache, PATTERN_FLAGS } from './language/patternCache.js';
export { compileSimplifications, simplify, wrapPattern, wrapReplacement } from './language/simplifier.js';
export { splitTokens } from './language/tokenizer.js';
export { translateTokens, clearFutureWords } from './language/translator.js';
export { joinTokens } from './language/joiner.js';
export { buildWordchars, buildSplitters } from './language/splitters.js';
export {
  DEFAULT_SENTENCE_SPLITTER_GROUP,
  registerSentenceSplitter,
  unregisterSentenceSplitter,
  getSentenceSplitter,
  registeredSentenceSplitterGroups,
  splitSentences
} from './language/sentences.js';
export { translateSearch, looksNumeric, type SearchContext } from './language/search.js';

// Dictionary
export { Dictionary, NormalizedDictionary, type DictionaryLookup, type Translation } from './dict/dictionary.js';
export {
  ALWAYS_KEEP_TOKENS,
  PARSER_HARDCODED_TOKENS,
  PARSER_KNOWN_TOKENS,
  TIME_UNIT_WORDS,
  SEARCH_DASHES,
  SEARCH_STRIP_CHARS
} from './dict/tokens.js';

// Grammar-engine bridge
export {
  toParserInfo,
  assertParserInfoArity,
  WEEKDAY_KEYS,
  MONTH_KEYS,
  HMS_KEYS,
  type ParserInfoDescriptor
} from './grammar/parserInfo.js';

// Collaborators
export { popTzOffset, type TimezoneOffset, type PoppedOffset } from './timezone.js';
export {
  LanguageValidator,
  languageInfoSchema,
  parseLanguageInfo,
  type LanguageValidatorLike,
  type ValidationIssue,
  type ValidationReport
} from './validation.js';
export { DEFAULT_SETTINGS, createSettings, settingsFromEnv } from './settings.js';
export { ConfigurationError } from './errors.js';

// Character utilities
export { normalizeUnicode, isDigits, hasDigit, escapeRegExp, stripChars } from './characters.js';

// Diagnostics
export { DEBUG, setDebug, dp } from './debug.js';
export {
  PERF_COUNTERS,
  startTimer,
  resetPerfCounters,
  printPerfCountersAndReset,
  isProfilingEnabled
} from './profiling.js';
