/**
 * Zod schemas for validating extracted records and the resolved render config.
 */

import { z } from 'zod';

/** Largest millisecond value a Date can hold. */
export const MAX_TIMESTAMP_MS = 8_640_000_000_000_000;

export const TimedRecordSchema = z.object({
  timestamp: z.number().int().nonnegative().max(MAX_TIMESTAMP_MS),
  display: z.string(),
});

export const RenderConfigSchema = z.object({
  width: z.number().int().positive(),
  trimWords: z.number().int().nonnegative().optional(),
  timeZone: z.enum(['utc', 'local']),
});

export type ValidatedTimedRecord = z.infer<typeof TimedRecordSchema>;
export type ValidatedRenderConfig = z.infer<typeof RenderConfigSchema>;

type SafeParseResult<T> = { success: true; data: T } | { success: false; errors: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Safely validate a candidate record. Extra fields are dropped.
 */
export function safeParseTimedRecord(raw: unknown): SafeParseResult<ValidatedTimedRecord> {
  const result = TimedRecordSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

export function safeParseRenderConfig(raw: unknown): SafeParseResult<ValidatedRenderConfig> {
  const result = RenderConfigSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}
