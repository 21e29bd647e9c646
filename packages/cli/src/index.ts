#!/usr/bin/env node

/**
 * Command line interface for datelex
 *
 *   datelex "in 3 days"                       → in 3 day
 *   datelex -l es "hace 2 días"               → ago 2 day
 *   datelex -m search "Meeting on monday"     → {"translated":["monday"],"original":["monday"]}
 *   datelex -m parser-info -l fr              → grammar descriptor as JSON
 */

import { Command, Option } from 'commander';
import { config } from 'dotenv';
import {
  createSettings,
  normalizeUnicode,
  printPerfCountersAndReset,
  setDebug,
  settingsFromEnv,
  type Settings
} from '@datelex/core';
import { getLanguage } from '@datelex/data';

// Parse environment variables
config();

export const CLI_MODES = ['translate', 'search', 'applicable', 'parser-info'] as const;
export type CliMode = typeof CLI_MODES[number];

export interface CliOptions {
  language?: string;
  mode?: CliMode;
  keepFormatting?: boolean;
  normalize?: boolean;
  stripTimezone?: boolean;
}

interface CliFlags {
  language: string;
  mode: string;
  keepFormatting?: boolean;
  normalize?: boolean;
  stripTimezone?: boolean;
  debug?: boolean;
}

function isCliMode(value: string): value is CliMode {
  return CLI_MODES.some(mode => mode === value);
}

function resolveSettings(normalize: boolean | undefined): Settings {
  const base = settingsFromEnv();
  return createSettings({ normalize: normalize ?? base.normalize, skipTokens: base.skipTokens });
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export function runCli(input: string, options: CliOptions = {}): string {
  const language = getLanguage(options.language ?? 'en');
  const settings = resolveSettings(options.normalize);
  const text = settings.normalize ? normalizeUnicode(input) : input;

  switch (options.mode ?? 'translate') {
    case 'translate':
      return language.translate(text, settings, { keepFormatting: options.keepFormatting });
    case 'search':
      return JSON.stringify(language.translateSearch(text, settings));
    case 'applicable':
      return String(language.isApplicable(text, settings, { stripTimezone: options.stripTimezone }));
    case 'parser-info':
      return JSON.stringify(language.toParserInfo(), null, 2);
  }
}

export async function main(): Promise<void> {
  const program = new Command();

  program
    .name('datelex')
    .description('Translate date expressions into a canonical vocabulary')
    .usage('[options] [text...]')
    .version('0.1.0')
    .argument('[text...]', 'text to process')
    .option('-l, --language <code>', 'language code', 'en')
    .addOption(
      new Option('-m, --mode <mode>', 'operation to run').choices([...CLI_MODES]).default('translate')
    )
    .option('-k, --keep-formatting', 'keep punctuation the dictionary does not know')
    .option('-n, --normalize', 'match accent-stripped text (NFKD, no combining marks)')
    .option('-z, --strip-timezone', 'remove a trailing timezone before the applicability check')
    .option('--debug', 'print debug output')
    .helpOption('-h, --help', 'print this help text');

  program.parse(process.argv);
  const flags = program.opts<CliFlags>();
  const input = program.args.join(' ');

  if (flags.debug) {
    setDebug(true);
  }
  if (!isCliMode(flags.mode)) {
    return program.error(`unknown mode: ${flags.mode}`, { exitCode: 2 });
  }
  if (!input && flags.mode !== 'parser-info') {
    return program.error('missing text', { exitCode: 2 });
  }

  try {
    const output = runCli(input, {
      language: flags.language,
      mode: flags.mode,
      keepFormatting: flags.keepFormatting,
      normalize: flags.normalize,
      stripTimezone: flags.stripTimezone
    });
    process.stdout.write(output);
    process.stdout.write('\n');

    // Print performance counters if profiling is enabled
    printPerfCountersAndReset();
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(2);
  }
}

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
