// datelex/validation - Schema validation of language configuration (zod)

import { z } from 'zod';
import type { LanguageInfo } from './types.js';
import { ConfigurationError } from './errors.js';
import { dp } from './debug.js';

const nameList = z.array(z.string().min(1)).min(1);

const simplificationEntry = z
  .record(z.union([z.string(), z.number().int()]))
  .superRefine((entry, ctx) => {
    const patterns = Object.keys(entry);
    if (patterns.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must map exactly one pattern, found ${patterns.length}`,
      });
      return;
    }
    try {
      new RegExp(patterns[0], 'u');
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `pattern /${patterns[0]}/ does not compile: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  });

export const languageInfoSchema = z.object({
  name: z.string().min(1),
  skip: z.array(z.string().min(1)).optional(),
  pertain: z.array(z.string().min(1)).optional(),
  simplifications: z.array(simplificationEntry).optional(),
  sentence_splitter_group: z.number().int().min(1).optional(),
  no_word_spacing: z.boolean().optional(),
  'relative-type': z.record(nameList).optional(),
  monday: nameList.optional(),
  tuesday: nameList.optional(),
  wednesday: nameList.optional(),
  thursday: nameList.optional(),
  friday: nameList.optional(),
  saturday: nameList.optional(),
  sunday: nameList.optional(),
  january: nameList.optional(),
  february: nameList.optional(),
  march: nameList.optional(),
  april: nameList.optional(),
  may: nameList.optional(),
  june: nameList.optional(),
  july: nameList.optional(),
  august: nameList.optional(),
  september: nameList.optional(),
  october: nameList.optional(),
  november: nameList.optional(),
  december: nameList.optional(),
  decade: nameList.optional(),
  year: nameList.optional(),
  month: nameList.optional(),
  week: nameList.optional(),
  day: nameList.optional(),
  hour: nameList.optional(),
  minute: nameList.optional(),
  second: nameList.optional(),
  ago: nameList.optional(),
  in: nameList.optional(),
  am: nameList.optional(),
  pm: nameList.optional(),
}).strict();

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ValidationReport {
  valid: boolean;
  issues: ValidationIssue[];
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

export const LanguageValidator = {
  /** Validate without throwing; every issue is reported. */
  validateInfo(languageId: string, info: unknown): ValidationReport {
    const result = languageInfoSchema.safeParse(info);
    if (result.success) {
      return { valid: true, issues: [] };
    }
    const issues = toIssues(result.error);
    dp(`Language ${languageId} failed validation with ${issues.length} issue(s)`);
    return { valid: false, issues };
  },
};

export type LanguageValidatorLike = typeof LanguageValidator;

/** Parse untrusted configuration into LanguageInfo, throwing ConfigurationError. */
export function parseLanguageInfo(languageId: string, raw: unknown): LanguageInfo {
  const result = languageInfoSchema.safeParse(raw);
  if (!result.success) {
    const details = toIssues(result.error).map(i => `${i.path}: ${i.message}`).join('; ');
    throw new ConfigurationError(languageId, `Invalid language configuration: ${details}`, { cause: result.error });
  }
  return result.data;
}
