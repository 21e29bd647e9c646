// Shared language fixtures for tests
import { Language, createSettings, type LanguageInfo, type Settings } from '@datelex/core';

export const rawSettings: Settings = createSettings();
export const normalizedSettings: Settings = createSettings({ normalize: true });

export const englishInfo: LanguageInfo = {
  name: 'en',
  skip: ['at', 'the', ','],
  pertain: ['of'],
  monday: ['monday', 'mon'],
  tuesday: ['tuesday', 'tue'],
  wednesday: ['wednesday', 'wed'],
  thursday: ['thursday', 'thu'],
  friday: ['friday', 'fri'],
  saturday: ['saturday', 'sat'],
  sunday: ['sunday', 'sun'],
  january: ['january', 'jan'],
  february: ['february', 'feb'],
  march: ['march', 'mar'],
  april: ['april', 'apr'],
  may: ['may'],
  june: ['june', 'jun'],
  july: ['july', 'jul'],
  august: ['august', 'aug'],
  september: ['september', 'sep'],
  october: ['october', 'oct'],
  november: ['november', 'nov'],
  december: ['december', 'dec'],
  year: ['year', 'years'],
  month: ['month', 'months'],
  week: ['week', 'weeks'],
  day: ['day', 'days'],
  hour: ['hour', 'hours', 'h'],
  minute: ['minute', 'minutes', 'min'],
  second: ['second', 'seconds', 'sec'],
  ago: ['ago'],
  in: ['in'],
  am: ['am', 'a.m.'],
  pm: ['pm', 'p.m.'],
  'relative-type': {
    '0 day ago': ['today'],
    '1 day ago': ['yesterday'],
    '2 day ago': ['day before yesterday'],
    'in 1 day': ['tomorrow'],
  },
  simplifications: [
    { 'an': '1' },
    { '(\\d+)\\s*hrs?': '$1 hour' },
    { 'one': 1 },
  ],
};

export const spanishInfo: LanguageInfo = {
  name: 'es',
  skip: ['de', 'del', 'el', 'la'],
  sentence_splitter_group: 2,
  monday: ['lunes', 'lun'],
  tuesday: ['martes', 'mar'],
  wednesday: ['miércoles', 'mié'],
  thursday: ['jueves', 'jue'],
  friday: ['viernes', 'vie'],
  saturday: ['sábado', 'sáb'],
  sunday: ['domingo', 'dom'],
  january: ['enero'],
  february: ['febrero'],
  march: ['marzo'],
  april: ['abril'],
  may: ['mayo'],
  june: ['junio'],
  july: ['julio'],
  august: ['agosto'],
  september: ['septiembre'],
  october: ['octubre'],
  november: ['noviembre'],
  december: ['diciembre'],
  year: ['año', 'años'],
  month: ['mes', 'meses'],
  week: ['semana', 'semanas'],
  day: ['día', 'días'],
  hour: ['hora', 'horas'],
  minute: ['minuto', 'minutos'],
  second: ['segundo', 'segundos'],
  ago: ['hace'],
  in: ['en'],
  simplifications: [
    { 'pasado mañana': 'in 2 day' },
  ],
};

export const japaneseInfo: LanguageInfo = {
  name: 'ja',
  no_word_spacing: true,
  sentence_splitter_group: 4,
  skip: ['の'],
  monday: ['月曜日'],
  year: ['年'],
  month: ['月'],
  day: ['日'],
  hour: ['時'],
  minute: ['分'],
  ago: ['前'],
  simplifications: [
    { '正午': '12時' },
  ],
};

export function makeLanguage(info: LanguageInfo): Language {
  return new Language(info.name, info);
}
