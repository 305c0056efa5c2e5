/**
 * Runtime validation of what site adapters hand over
 */

import { z } from 'zod';
import { normalizeTimeLabel } from './slot-key.js';
import { isIsoDate } from '../utils/date.js';

export const SlotStatusSchema = z.enum(['FREE', 'OCCUPIED']);

export const TimeLabelSchema = z.string().transform((raw, ctx) => {
  const label = normalizeTimeLabel(raw);
  if (!label) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid time label "${raw}"` });
    return z.NEVER;
  }
  return label;
});

export const IsoDateSchema = z.string().refine(isIsoDate, 'expected a YYYY-MM-DD date');

export const SnapshotRowSchema = z.object({
  timeLabel: TimeLabelSchema,
  date: IsoDateSchema,
  courts: z.record(z.string().min(1), SlotStatusSchema),
});

export const SnapshotSchema = z.array(SnapshotRowSchema);

export const ScrapeResultSchema = z.object({
  snapshot: SnapshotSchema,
  bookableDates: z.array(IsoDateSchema).default([]),
});

/**
 * "path: message" lines for a validation failure
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}
