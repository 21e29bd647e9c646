// datelex/language/language - Per-language normalizer, tokenizer and translator

import type { LanguageInfo, SearchResult, Settings, SimplificationRule, Splitters } from '../types.js';
import { Dictionary, NormalizedDictionary, type DictionaryLookup } from '../dict/dictionary.js';
import { isDigits } from '../characters.js';
import { ConfigurationError } from '../errors.js';
import { time } from '../profiling.js';
import { popTzOffset } from '../timezone.js';
import { LanguageValidator, type LanguageValidatorLike, type ValidationReport } from '../validation.js';
import { toParserInfo, type ParserInfoDescriptor } from '../grammar/parserInfo.js';
import { PatternCache } from './patternCache.js';
import { compileSimplifications, simplify } from './simplifier.js';
import { splitTokens } from './tokenizer.js';
import { clearFutureWords, translateTokens } from './translator.js';
import { joinTokens } from './joiner.js';
import { buildSplitters, buildWordchars } from './splitters.js';
import { DEFAULT_SENTENCE_SPLITTER_GROUP, getSentenceSplitter } from './sentences.js';
import { translateSearch } from './search.js';

export type CacheMode = 'raw' | 'normalized';

/**
 * Memoized state for one normalization mode. Every slot is computed from
 * `info` alone and stored once, so a repeated build yields the same value.
 */
class LanguageCache {
  private dictionary?: Dictionary;
  private simplifications?: SimplificationRule[];
  private wordchars?: Set<string>;
  private splitters?: Splitters;
  readonly patterns: PatternCache;

  constructor(private readonly info: LanguageInfo, readonly mode: CacheMode) {
    this.patterns = new PatternCache(info.name);
  }

  getDictionary(): Dictionary {
    this.dictionary ??= this.mode === 'normalized'
      ? new NormalizedDictionary(this.info)
      : new Dictionary(this.info);
    return this.dictionary;
  }

  getSimplifications(): SimplificationRule[] {
    this.simplifications ??= compileSimplifications(this.info, this.mode === 'normalized');
    return this.simplifications;
  }

  getWordchars(): Set<string> {
    this.wordchars ??= buildWordchars(this.getDictionary().words());
    return this.wordchars;
  }

  getSplitters(): Splitters {
    this.splitters ??= buildSplitters(this.info, this.getWordchars());
    return this.splitters;
  }
}

export interface TranslateOptions {
  keepFormatting?: boolean;
}

export interface ApplicabilityOptions {
  stripTimezone?: boolean;
}

export class Language {
  readonly shortname: string;
  readonly info: Readonly<LanguageInfo>;
  private readonly caches: Record<CacheMode, LanguageCache>;

  constructor(shortname: string, info: LanguageInfo) {
    this.shortname = shortname;
    this.info = info;
    // Nothing is built here: rarely used languages stay cheap to load.
    this.caches = {
      raw: new LanguageCache(info, 'raw'),
      normalized: new LanguageCache(info, 'normalized'),
    };
  }

  get noWordSpacing(): boolean {
    return this.info.no_word_spacing ?? false;
  }

  validateInfo(validator: LanguageValidatorLike = LanguageValidator): ValidationReport {
    return validator.validateInfo(this.shortname, this.info);
  }

  /**
   * True when every token is digits or a dictionary word, i.e. the string can
   * be read in this language.
   */
  isApplicable(text: string, settings: Settings, options: ApplicabilityOptions = {}): boolean {
    return time('isApplicable', () => {
      const input = options.stripTimezone ? popTzOffset(text).text : text;
      const tokens = this.split(this.simplify(input, settings), settings);
      if (tokens.every(isDigits)) {
        return true;
      }
      const dictionary = this.getDictionary(settings);
      return tokens.every(token => {
        const word = token.toLowerCase();
        return isDigits(word) || dictionary.has(word);
      });
    });
  }

  /** Translate a date string into the canonical vocabulary. */
  translate(text: string, settings: Settings, options: TranslateOptions = {}): string {
    return time('translate', () => {
      const keepFormatting = options.keepFormatting ?? false;
      const tokens = this.split(this.simplify(text, settings), settings, { keepFormatting });
      let words = translateTokens(tokens, this.getDictionary(settings));
      if (words.includes('in')) {
        words = clearFutureWords(words);
      }
      return this.join(words.filter(Boolean), settings, keepFormatting ? '' : ' ');
    });
  }

  /**
   * Scan free text for runs of recognized or numeric words. `translated[i]` is
   * the canonical form of the span whose original text is `original[i]`.
   */
  translateSearch(text: string, settings: Settings): SearchResult {
    return time('translateSearch', () => translateSearch(text, {
      dictionary: this.getDictionary(settings),
      noWordSpacing: this.noWordSpacing,
      sentenceSplitter: this.getSentenceSplitter(),
      simplify: (word) => this.simplify(word, settings),
      split: (sentence, keepFormatting) => this.split(sentence, settings, { keepFormatting }),
      join: (tokens, separator) => this.join(tokens, settings, separator),
    }));
  }

  simplify(text: string, settings: Settings): string {
    return time('simplify', () => {
      const cache = this.getCache(settings);
      return simplify(text, cache.getSimplifications(), this.noWordSpacing, cache.patterns);
    });
  }

  split(text: string, settings: Settings, options: TranslateOptions = {}): string[] {
    return time('split', () => splitTokens(text, this.getDictionary(settings), options.keepFormatting ?? false));
  }

  join(tokens: readonly string[], settings: Settings, separator = ' '): string {
    return joinTokens(tokens, separator, this.getSplitters(settings).capturing);
  }

  getDictionary(settings: Settings): DictionaryLookup {
    return this.getCache(settings).getDictionary().bind(settings);
  }

  getWordchars(settings: Settings): ReadonlySet<string> {
    return this.getCache(settings).getWordchars();
  }

  getSplitters(settings: Settings): Splitters {
    return this.getCache(settings).getSplitters();
  }

  getPatternCache(settings: Settings): PatternCache {
    return this.getCache(settings).patterns;
  }

  /** Descriptor for the date-grammar engine (weekdays, months, h/m/s, jump and pertain words). */
  toParserInfo(): ParserInfoDescriptor {
    return toParserInfo(this.info);
  }

  private getCache(settings: Settings): LanguageCache {
    return this.caches[settings.normalize ? 'normalized' : 'raw'];
  }

  private getSentenceSplitter(): RegExp {
    const group = this.info.sentence_splitter_group ?? DEFAULT_SENTENCE_SPLITTER_GROUP;
    const splitter = getSentenceSplitter(group);
    if (!splitter) {
      throw new ConfigurationError(this.info.name, `No sentence splitter registered for group ${group}`);
    }
    return splitter;
  }
}
