// datelex/language/patternCache - Compiled pattern memo keyed by textual pattern

import { ConfigurationError } from '../errors.js';
import { startTimer } from '../profiling.js';

export const PATTERN_FLAGS = 'giu';

/**
 * Map from pattern source to compiled RegExp. Entries are added on first use
 * and never removed. Compiled patterns carry the `g` flag, so they are only
 * used through String.prototype.replace (which resets lastIndex).
 */
export class PatternCache {
  private readonly patterns = new Map<string, RegExp>();
  private readonly groupCounts = new Map<string, number>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly languageId: string) {}

  get(source: string): RegExp {
    const cached = this.patterns.get(source);
    if (cached) {
      this.hits++;
      return cached;
    }

    const pattern = this.compile(source);
    this.patterns.set(source, pattern);
    this.misses++;
    return pattern;
  }

  private compile(source: string): RegExp {
    const stop = startTimer('compilePattern');
    try {
      return new RegExp(source, PATTERN_FLAGS);
    } catch (error) {
      throw new ConfigurationError(
        this.languageId,
        `Invalid simplification pattern /${source}/: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      stop();
    }
  }

  /** Number of capture groups in the compiled pattern. */
  groupCount(source: string): number {
    let count = this.groupCounts.get(source);
    if (count === undefined) {
      const pattern = this.patterns.get(source) ?? this.get(source);
      // An empty alternative always matches, exposing one slot per group.
      const probe = new RegExp(`(?:${pattern.source})|`, 'u').exec('');
      count = probe ? probe.length - 1 : 0;
      this.groupCounts.set(source, count);
    }
    return count;
  }

  has(source: string): boolean {
    return this.patterns.has(source);
  }

  get size(): number {
    return this.patterns.size;
  }

  getStats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.patterns.size };
  }
}
