// datelex/grammar/parserInfo - Name-list descriptor handed to the date-grammar engine

import type { KnownWordToken, LanguageInfo } from '../types.js';
import { ConfigurationError } from '../errors.js';

export const WEEKDAY_KEYS = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'
] as const satisfies readonly KnownWordToken[];

export const MONTH_KEYS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december'
] as const satisfies readonly KnownWordToken[];

export const HMS_KEYS = ['hour', 'minute', 'second'] as const satisfies readonly KnownWordToken[];

/**
 * Plain data consumed by the grammar engine's constructor. Each position holds
 * the surface forms for that weekday / month / unit.
 */
export interface ParserInfoDescriptor {
  name: string;
  jump: string[];
  pertain: string[];
  weekdays: string[][];
  months: string[][];
  hms: string[][];
}

function collect(info: LanguageInfo, keys: readonly KnownWordToken[], label: string): string[][] {
  const lists: string[][] = [];
  const missing: string[] = [];
  for (const key of keys) {
    const names = info[key];
    if (!names || names.length === 0) {
      missing.push(key);
    } else {
      lists.push([...names]);
    }
  }
  if (missing.length > 0) {
    throw new ConfigurationError(
      info.name,
      `${label} needs ${keys.length} name lists, missing: ${missing.join(', ')}`
    );
  }
  return lists;
}

export function toParserInfo(info: LanguageInfo): ParserInfoDescriptor {
  return {
    name: info.name,
    jump: [...(info.skip ?? [])],
    pertain: [...(info.pertain ?? [])],
    weekdays: collect(info, WEEKDAY_KEYS, 'Weekdays'),
    months: collect(info, MONTH_KEYS, 'Months'),
    hms: collect(info, HMS_KEYS, 'Hour/minute/second'),
  };
}

/** Check a descriptor built elsewhere before it reaches the grammar engine. */
export function assertParserInfoArity(descriptor: ParserInfoDescriptor): void {
  const expected: Array<[keyof ParserInfoDescriptor, string[][], number]> = [
    ['weekdays', descriptor.weekdays, WEEKDAY_KEYS.length],
    ['months', descriptor.months, MONTH_KEYS.length],
    ['hms', descriptor.hms, HMS_KEYS.length],
  ];
  for (const [field, lists, arity] of expected) {
    if (lists.length !== arity) {
      throw new ConfigurationError(descriptor.name, `${field} must have ${arity} entries, got ${lists.length}`);
    }
  }
}
