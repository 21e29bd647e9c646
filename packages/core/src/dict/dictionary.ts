// datelex/dict/dictionary - Word/phrase → canonical token dictionary with longest-match splitting

import type { LanguageInfo, Settings } from '../types.js';
import { KNOWN_WORD_TOKENS } from '../types.js';
import { ALWAYS_KEEP_TOKENS, PARSER_KNOWN_TOKENS } from './tokens.js';
import { NON_WORD_CHAR, escapeRegExp, hasLetterOrDigit, normalizeUnicode } from '../characters.js';
import { startTimer } from '../profiling.js';
import { dp } from '../debug.js';

/** Canonical value of a dictionary word; `null` means "drop this token". */
export type Translation = string | null;

/**
 * Dictionary as seen under one Settings object. Skip tokens from the settings
 * are members translating to `null`.
 */
export interface DictionaryLookup {
  readonly normalized: boolean;
  has(word: string): boolean;
  get(word: string): Translation | undefined;
  words(): string[];
  split(text: string, keepFormatting: boolean): string[];
}

const NUMERAL_RUN = /(\p{Nd}+)/u;
const BOUNDARY = `(?:${NON_WORD_CHAR}|\\p{N})`;

export class Dictionary {
  readonly info: LanguageInfo;
  readonly noWordSpacing: boolean;
  readonly normalized: boolean = false;
  protected entries: Map<string, Translation>;

  // Split regexes depend on the skip tokens in play, so they are keyed by them.
  private readonly splitRegexCache = new Map<string, RegExp>();
  private readonly views = new WeakMap<Settings, DictionaryLookup>();

  constructor(info: LanguageInfo) {
    const stop = startTimer('buildDictionary');
    this.info = info;
    this.noWordSpacing = info.no_word_spacing ?? false;
    this.entries = Dictionary.buildEntries(info);
    stop();
    dp(`Dictionary built for ${info.name}: ${this.entries.size} entries`);
  }

  private static buildEntries(info: LanguageInfo): Map<string, Translation> {
    const entries = new Map<string, Translation>();

    for (const word of info.skip ?? []) entries.set(word.toLowerCase(), null);
    for (const word of info.pertain ?? []) entries.set(word.toLowerCase(), null);

    for (const token of KNOWN_WORD_TOKENS) {
      for (const word of info[token] ?? []) {
        entries.set(word.toLowerCase(), token);
      }
    }

    for (const token of ALWAYS_KEEP_TOKENS) entries.set(token, token);
    for (const token of PARSER_KNOWN_TOKENS) entries.set(token.toLowerCase(), token);

    for (const [phrase, words] of Object.entries(info['relative-type'] ?? {})) {
      for (const word of words) entries.set(word.toLowerCase(), phrase);
    }

    return entries;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Configured words, independent of any settings. */
  words(): string[] {
    return [...this.entries.keys()];
  }

  /** Get the lookup view for a Settings object (memoized per object). */
  bind(settings: Settings): DictionaryLookup {
    let view = this.views.get(settings);
    if (!view) {
      const skip = new Set(settings.skipTokens);
      const entries = this.entries;
      view = {
        normalized: this.normalized,
        has: (word) => skip.has(word) || entries.has(word),
        get: (word) => (skip.has(word) ? null : entries.get(word)),
        words: () => [...skip, ...entries.keys()],
        split: (text, keepFormatting) => this.split(text, keepFormatting, skip),
      };
      this.views.set(settings, view);
    }
    return view;
  }

  private split(text: string, keepFormatting: boolean, skip: ReadonlySet<string>): string[] {
    if (!text) return [];

    const regex = this.getSplitRegex(skip);
    const tokens: string[] = [];
    let rest = text;

    while (rest) {
      const match = regex.exec(rest);
      if (!match) {
        if (this.shouldCapture(rest, keepFormatting)) {
          tokens.push(...this.splitByNumerals(rest, keepFormatting));
        }
        break;
      }

      const [, unparsed, known, unknown] = match;
      if (unparsed && this.shouldCapture(unparsed, keepFormatting)) {
        tokens.push(...this.splitByNumerals(unparsed, keepFormatting));
      }
      if (this.shouldCapture(known, keepFormatting)) {
        tokens.push(known);
      }
      rest = unknown;
    }

    return tokens.filter(Boolean);
  }

  private splitByNumerals(text: string, keepFormatting: boolean): string[] {
    return text.split(NUMERAL_RUN).filter(token => token && this.shouldCapture(token, keepFormatting));
  }

  private shouldCapture(token: string, keepFormatting: boolean): boolean {
    return keepFormatting || ALWAYS_KEEP_TOKENS.includes(token) || hasLetterOrDigit(token);
  }

  private getSplitRegex(skip: ReadonlySet<string>): RegExp {
    const cacheKey = [...skip].join('\u0000');
    let regex = this.splitRegexCache.get(cacheKey);
    if (!regex) {
      const stop = startTimer('buildSplitRegex');
      const words = [...new Set([...skip, ...this.entries.keys()])]
        .filter(Boolean)
        .sort((a, b) => b.length - a.length);
      const known = words.map(escapeRegExp).join('|');
      // Whitespace-delimited scripts: a known word must start and end on a boundary.
      const source = this.noWordSpacing
        ? `^([\\s\\S]*?)(${known})([\\s\\S]*)$`
        : `^([\\s\\S]*?(?:^|${BOUNDARY}|_))(${known})((?:$|${BOUNDARY}|_)[\\s\\S]*)$`;
      regex = new RegExp(source, 'iu');
      this.splitRegexCache.set(cacheKey, regex);
      stop();
      dp(`Split regex built for ${this.info.name}: ${words.length} words`);
    }
    return regex;
  }
}

/**
 * Dictionary whose keys are Unicode-normalized (see normalizeUnicode).
 * A key that normalizes onto another existing key is dropped unless it is a
 * skip or pertain word, in which case its value wins.
 */
export class NormalizedDictionary extends Dictionary {
  override readonly normalized: boolean = true;

  constructor(info: LanguageInfo) {
    super(info);
    this.entries = this.normalizeEntries();
  }

  private normalizeEntries(): Map<string, Translation> {
    const normalizedEntries = new Map<string, Translation>();
    const conflicting: string[] = [];

    for (const [key, value] of this.entries) {
      const normalized = normalizeUnicode(key);
      if (key !== normalized && this.entries.has(normalized)) {
        conflicting.push(key);
      } else {
        normalizedEntries.set(normalized, value);
      }
    }

    const inert = new Set([...(this.info.skip ?? []), ...(this.info.pertain ?? [])].map(w => w.toLowerCase()));
    for (const key of conflicting) {
      if (inert.has(key)) {
        normalizedEntries.set(normalizeUnicode(key), this.entries.get(key) ?? null);
      }
    }

    return normalizedEntries;
  }
}
