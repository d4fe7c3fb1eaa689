import { z } from 'zod';
import {
  type CodeSubmission,
  type UserProfile,
  FindingCategory,
} from '../types';
import { InvalidInputError, type InputIssue } from './errors';

const analyzeRequestSchema = z.object({
  code: z
    .string({ invalid_type_error: 'Submission must be text' })
    .refine((code) => code.trim().length > 0, 'Submission is empty')
    .refine((code) => !code.includes('\u0000'), 'Submission contains binary data'),
  language: z.string().optional().default(''),
  userId: z
    .string()
    .trim()
    .min(1, 'User identity cannot be blank')
    .max(200, 'User identity is too long')
    .nullable()
    .optional(),
});

export type AnalyzeRequest = z.input<typeof analyzeRequestSchema>;

export function validateAnalyzeRequest(input: unknown): InputIssue[] {
  const result = analyzeRequestSchema.safeParse(input);
  if (result.success) return [];
  return result.error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'request',
    message: issue.message,
  }));
}

export function toSubmission(input: unknown, now: Date = new Date()): CodeSubmission {
  const result = analyzeRequestSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(validateAnalyzeRequest(input));
  }
  return {
    rawText: result.data.code,
    declaredLanguage: result.data.language,
    userId: result.data.userId ?? null,
    timestamp: now,
  };
}

// ─── Persisted profile records ───────────────────────────────────────────────

const namingSchema = z.object({
  distribution: z.record(z.enum(['snake_case', 'camelCase', 'PascalCase', 'mixed']), z.number()),
  dominant: z.enum(['snake_case', 'camelCase', 'PascalCase', 'mixed']).nullable(),
  samples: z.number(),
  observations: z.number().int().nonnegative(),
});

const quoteSchema = z.object({
  distribution: z.record(z.enum(['single', 'double', 'mixed']), z.number()),
  dominant: z.enum(['single', 'double', 'mixed']).nullable(),
  samples: z.number(),
  observations: z.number().int().nonnegative(),
});

const styleSchema = z.object({
  naming: namingSchema,
  indentation: z.object({
    unitWidth: z.number(),
    consistencyRatio: z.number(),
    observations: z.number().int().nonnegative(),
  }),
  quoteStyle: quoteSchema,
  spacing: z.object({
    avgBlankLinesBetweenDefs: z.number(),
    blankLineObservations: z.number().int().nonnegative(),
    trailingWhitespaceRate: z.number(),
  }),
});

const historyEntrySchema = z.object({
  id: z.string(),
  analyzedAt: z.string(),
  language: z.string(),
  linesOfCode: z.number(),
  qualityScore: z.number(),
  findingCounts: z.object({
    [FindingCategory.BUG_PATTERN]: z.number(),
    [FindingCategory.CODE_SMELL]: z.number(),
    [FindingCategory.SECURITY_ISSUE]: z.number(),
  }),
});

export const profileRecordSchema = z.object({
  revision: z.number().int().nonnegative(),
  profile: z.object({
    userId: z.string(),
    style: styleSchema,
    totalAnalyses: z.number().int().nonnegative(),
    totalLines: z.number().nonnegative(),
    cumulativeQualitySum: z.number().nonnegative(),
    favoriteLanguage: z.string(),
    languageCounts: z.record(z.string(), z.number()),
    findingTypeCounts: z.record(z.string(), z.number()),
    history: z.array(historyEntrySchema),
    createdAt: z.string(),
    updatedAt: z.string(),
  }),
});

export interface ParsedProfileRecord {
  revision: number;
  profile: UserProfile;
}

export function parseProfileRecord(data: unknown): ParsedProfileRecord | null {
  const result = profileRecordSchema.safeParse(data);
  if (!result.success) return null;
  const { revision, profile } = result.data;
  const style = profile.style;
  return {
    revision,
    profile: {
      ...profile,
      style: {
        ...style,
        naming: {
          ...style.naming,
          distribution: {
            snake_case: style.naming.distribution.snake_case ?? 0,
            camelCase: style.naming.distribution.camelCase ?? 0,
            PascalCase: style.naming.distribution.PascalCase ?? 0,
            mixed: style.naming.distribution.mixed ?? 0,
          },
        },
        quoteStyle: {
          ...style.quoteStyle,
          distribution: {
            single: style.quoteStyle.distribution.single ?? 0,
            double: style.quoteStyle.distribution.double ?? 0,
            mixed: style.quoteStyle.distribution.mixed ?? 0,
          },
        },
      },
    },
  };
}
