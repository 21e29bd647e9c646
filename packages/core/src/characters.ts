// datelex/characters - Character classes and text helpers
// All classes are Unicode-aware: a "word" character is a letter, mark, number or underscore.

export const WORD_CHAR = '[\\p{L}\\p{M}\\p{N}_]';
export const NON_WORD_CHAR = '[^\\p{L}\\p{M}\\p{N}_]';

const DIGITS_ONLY = /^\p{Nd}+$/u;
const HAS_DIGIT = /\p{Nd}/u;
const DIGIT_RUN = /(\p{Nd}+)/u;
const NON_WORD_ONLY = new RegExp(`^${NON_WORD_CHAR}+$`, 'u');
const NO_LETTERS = /^[^\p{L}\p{M}]+$/u;
const LETTER_OR_DIGIT = /[\p{L}\p{M}\p{N}]/u;
const COMBINING_MARK = /\p{Mn}/gu;
const REGEXP_SYNTAX = /[.*+?^${}()|[\]\\/]/g;

/** NFKD decomposition with combining marks removed ("Mié" → "Mie"). */
export function normalizeUnicode(text: string): string {
  return text.normalize('NFKD').replace(COMBINING_MARK, '');
}

export function isDigits(token: string): boolean {
  return DIGITS_ONLY.test(token);
}

export function hasDigit(token: string): boolean {
  return HAS_DIGIT.test(token);
}

/** True when the token has no letter, mark, digit or underscore. */
export function isNonWord(token: string): boolean {
  return NON_WORD_ONLY.test(token);
}

/** True when the token is made only of punctuation, digits, underscores and spaces. */
export function hasNoLetters(token: string): boolean {
  return NO_LETTERS.test(token);
}

export function hasLetterOrDigit(token: string): boolean {
  return LETTER_OR_DIGIT.test(token);
}

/**
 * Split on runs of digits, keeping each run as its own piece.
 * Empty pieces are dropped: "12de mayo" → ["12", "de mayo"].
 */
export function splitDigitRuns(text: string): string[] {
  return text.split(DIGIT_RUN).filter(Boolean);
}

export function escapeRegExp(text: string): string {
  return text.replace(REGEXP_SYNTAX, '\\$&');
}

/** Remove every leading and trailing character found in `chars`. */
export function stripChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text[start])) start++;
  while (end > start && chars.includes(text[end - 1])) end--;
  return text.slice(start, end);
}

/** Whitespace split with empty pieces dropped. */
export function splitWhitespace(text: string): string[] {
  return text.split(/\s+/u).filter(Boolean);
}
