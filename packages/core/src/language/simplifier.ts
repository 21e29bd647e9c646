// datelex/language/simplifier - Ordered regex substitutions applied before tokenization

import type { LanguageInfo, SimplificationRule } from '../types.js';
import { NON_WORD_CHAR, normalizeUnicode } from '../characters.js';
import { ConfigurationError } from '../errors.js';
import type { PatternCache } from './patternCache.js';

const FLANK_BEFORE = `(^|\\p{N}|_|${NON_WORD_CHAR})`;
const FLANK_AFTER = `(\\p{N}|_|${NON_WORD_CHAR}|$)`;
const REPLACEMENT_TOKEN = /\$(\$|&|`|'|\d{1,2}|<[^>]*>)/g;
// Leading flank, the pattern itself and trailing flank
const WRAPPER_GROUPS = 3;

function groupRef(index: number): string {
  // Two-digit form so a following literal digit is never read as part of the index
  return `$${String(index).padStart(2, '0')}`;
}

/**
 * Turn the configured single-entry maps into rules. In normalized mode the
 * pattern (and a text replacement) is Unicode-normalized as well.
 */
export function compileSimplifications(info: LanguageInfo, normalize: boolean): SimplificationRule[] {
  const rules: SimplificationRule[] = [];
  for (const entry of info.simplifications ?? []) {
    const pairs = Object.entries(entry);
    if (pairs.length !== 1) {
      throw new ConfigurationError(info.name, `Simplification must have exactly one pattern, got ${pairs.length}`);
    }
    const [key, value] = pairs[0];
    const replacement = typeof value === 'number' ? String(value) : value;
    rules.push({
      pattern: normalize ? normalizeUnicode(key) : key,
      replacement: normalize && typeof value === 'string' ? normalizeUnicode(replacement) : replacement,
    });
  }
  return rules;
}

/**
 * Anchor a pattern so it only matches between word boundaries, digits or
 * underscores: `(^|\p{N}|_|\W)(PATTERN)(\p{N}|_|\W|$)`.
 */
export function wrapPattern(pattern: string): string {
  return `${FLANK_BEFORE}(${pattern})${FLANK_AFTER}`;
}

/**
 * Read a numbered reference the way `String.prototype.replace` does for a
 * pattern with `groups` captures: two digits name a group only when it exists,
 * otherwise the first digit does and the second is literal.
 */
function shiftNumberedReference(ref: string, groups: number): string {
  const twoDigit = Number(ref);
  if (ref.length === 2 && twoDigit >= 1 && twoDigit <= groups) {
    return groupRef(twoDigit + 2);
  }
  const oneDigit = Number(ref[0]);
  if (oneDigit >= 1 && oneDigit <= groups) {
    return `${groupRef(oneDigit + 2)}${ref.slice(1)}`;
  }
  // Literal text; escaped so the extra wrapper groups cannot claim it
  return `$$${ref}`;
}

/**
 * Rewrite a replacement for a wrapped pattern so it produces the same text as
 * the bare pattern would, with both flanks kept around it.
 */
export function wrapReplacement(replacement: string, wrappedGroupCount: number): string {
  const groups = wrappedGroupCount - WRAPPER_GROUPS;
  const trailing = groupRef(wrappedGroupCount);
  const shifted = replacement.replace(REPLACEMENT_TOKEN, (whole: string, ref: string) => {
    switch (ref) {
      case '&':
        return groupRef(2);
      case '`':
        return `$\`${groupRef(1)}`;
      case "'":
        return `${trailing}$'`;
    }
    if (/^\d+$/.test(ref)) return shiftNumberedReference(ref, groups);
    return whole;
  });
  return `${groupRef(1)}${shifted}${trailing}`;
}

export interface Substitution {
  pattern: RegExp;
  replacement: string;
}

export function getSubstitution(
  rule: SimplificationRule,
  noWordSpacing: boolean,
  patterns: PatternCache
): Substitution {
  if (noWordSpacing) {
    return { pattern: patterns.get(rule.pattern), replacement: rule.replacement };
  }
  const source = wrapPattern(rule.pattern);
  const pattern = patterns.get(source);
  return { pattern, replacement: wrapReplacement(rule.replacement, patterns.groupCount(source)) };
}

/**
 * Lowercase, then apply each rule once in order, lowercasing again after each
 * one since a replacement may introduce uppercase text.
 */
export function simplify(
  text: string,
  rules: readonly SimplificationRule[],
  noWordSpacing: boolean,
  patterns: PatternCache
): string {
  let result = text.toLowerCase();
  for (const rule of rules) {
    const { pattern, replacement } = getSubstitution(rule, noWordSpacing, patterns);
    result = result.replace(pattern, replacement).toLowerCase();
  }
  return result;
}
