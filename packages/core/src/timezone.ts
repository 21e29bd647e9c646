// datelex/timezone - Strip a trailing timezone offset or abbreviation

export interface TimezoneOffset {
  /** The suffix as written, e.g. "UTC+3", "+05:30", "CET". */
  name: string;
  utcOffsetMinutes: number;
}

export interface PoppedOffset {
  text: string;
  offset: TimezoneOffset | null;
}

// Abbreviations are matched case-sensitively so ordinary words ("est", "cat") survive.
const TIMEZONE_ABBREVIATIONS: ReadonlyMap<string, number> = new Map([
  ['UTC', 0], ['GMT', 0], ['Z', 0], ['WET', 0],
  ['BST', 60], ['CET', 60], ['WAT', 60],
  ['CEST', 120], ['EET', 120], ['SAST', 120], ['IST', 330],
  ['EEST', 180], ['MSK', 180],
  ['PKT', 300], ['ICT', 420], ['WIB', 420],
  ['CST', -360], ['CDT', -300], ['EST', -300], ['EDT', -240],
  ['MST', -420], ['MDT', -360], ['PST', -480], ['PDT', -420],
  ['AKST', -540], ['HST', -600],
  ['JST', 540], ['KST', 540], ['AEST', 600], ['AEDT', 660], ['NZST', 720],
]);

const PREFIXED_OFFSET = /(?:^|\s)((?:UTC|GMT)\s*([+-])(\d{1,2})(?::?(\d{2}))?)$/i;
// A bare offset must follow whitespace or a clock time, so "2020-01-05" keeps its day.
const BARE_OFFSET = /(?:^|\s|(?<=\d:\d{2}(?::\d{2})?))(([+-])(\d{2})(?::?(\d{2}))?)$/;
const ABBREVIATION = /(?:^|[^\p{L}])(\p{Lu}{1,5})$/u;

function toMinutes(sign: string, hours: string, minutes: string | undefined): number {
  const total = Number(hours) * 60 + Number(minutes ?? '0');
  return sign === '-' ? -total : total;
}

function remainder(text: string, matchIndex: number): string {
  return text.slice(0, matchIndex).trimEnd();
}

/**
 * Remove a timezone suffix from `text`. Returns the remaining text (trailing
 * whitespace trimmed) and the offset, or the trimmed text and `null`.
 */
export function popTzOffset(text: string): PoppedOffset {
  const trimmed = text.trimEnd();

  const numeric = PREFIXED_OFFSET.exec(trimmed) ?? BARE_OFFSET.exec(trimmed);
  if (numeric) {
    const [whole, name, sign, hours, minutes] = numeric;
    return {
      text: remainder(trimmed, trimmed.length - whole.length),
      offset: { name: name.trim(), utcOffsetMinutes: toMinutes(sign, hours, minutes) },
    };
  }

  const abbreviation = ABBREVIATION.exec(trimmed);
  if (abbreviation) {
    const name = abbreviation[1];
    const utcOffsetMinutes = TIMEZONE_ABBREVIATIONS.get(name);
    if (utcOffsetMinutes !== undefined) {
      return {
        text: remainder(trimmed, trimmed.length - name.length),
        offset: { name, utcOffsetMinutes },
      };
    }
  }

  return { text: trimmed, offset: null };
}
