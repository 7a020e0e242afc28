// ============================================================================
// Capture Model - input validation and derived counts
// ============================================================================

import { z } from 'zod';
import { CaptureValidationError, err, ok, type Result } from '../errors';
import type { Capture, CaptureInput } from '../../shared/types';

/**
 * A validated capture that has not been persisted yet
 */
export type CaptureDraft = Omit<Capture, 'id' | 'createdAt'>;

const timestamp = z.number().int().nonnegative().finite();
const count = z.number().int().nonnegative();

export const CaptureInputSchema = z
  .object({
    appName: z
      .string({ required_error: 'appName is required' })
      .refine((name) => name.trim().length > 0, 'appName must not be empty'),
    content: z.string({ required_error: 'content is required' }),
    startTime: timestamp.optional(),
    endTime: timestamp.optional(),
    charCount: count.optional(),
    wordCount: count.optional(),
  })
  .refine(
    (input) =>
      input.startTime === undefined ||
      input.endTime === undefined ||
      input.startTime <= input.endTime,
    { message: 'startTime must not be after endTime', path: ['startTime'] }
  );

/**
 * Number of maximal whitespace-delimited tokens
 */
export function countWords(content: string): number {
  return content.split(/\s+/).filter((token) => token.length > 0).length;
}

/**
 * Number of Unicode code points
 */
export function countChars(content: string): number {
  return Array.from(content).length;
}

/**
 * Validate a capture input and fill in timestamps and counts.
 * Missing times default to `now`; counts default to those derived from content.
 */
export function buildCaptureDraft(
  input: CaptureInput,
  now: number = Date.now()
): Result<CaptureDraft, CaptureValidationError> {
  const parsed = CaptureInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return err(new CaptureValidationError(issues, { appName: describeAppName(input) }));
  }

  const data = parsed.data;
  const startTime = data.startTime ?? data.endTime ?? now;
  const endTime = data.endTime ?? Math.max(startTime, now);

  return ok({
    appName: data.appName,
    content: data.content,
    startTime,
    endTime,
    charCount: data.charCount ?? countChars(data.content),
    wordCount: data.wordCount ?? countWords(data.content),
  });
}

function describeAppName(input: CaptureInput): string {
  const appName: unknown = input?.appName;
  return typeof appName === 'string' ? appName : String(appName);
}
