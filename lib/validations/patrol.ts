// PatrolSync - Capture Validation Schemas
// Input checks run before a record is allowed into the store
import { z } from 'zod';

import { coordinatesSchema, isoTimestampSchema, userIdSchema } from './common';

/** Maximum report length, in characters */
export const REPORT_MAX_LENGTH = 500;

/**
 * Report text: trimmed, non-empty, bounded
 *
 * @param maxLength - Upper bound after trimming
 */
export function reportTextSchema(maxLength: number = REPORT_MAX_LENGTH) {
  return z
    .string()
    .trim()
    .min(1, 'Report text cannot be empty.')
    .max(maxLength, 'Report text exceeds maximum length.');
}

export const clockEventInputSchema = coordinatesSchema.extend({
  userId: userIdSchema,
});

export const locationSampleInputSchema = coordinatesSchema.extend({
  userId: userIdSchema,
  accuracy: z.number().finite().nonnegative('Accuracy cannot be negative'),
  timestamp: isoTimestampSchema.optional(),
});

export const photoCaptureInputSchema = coordinatesSchema.extend({
  userId: userIdSchema,
  fileRef: z.string().trim().min(1, 'File reference is required'),
});

export type ClockEventInput = z.infer<typeof clockEventInputSchema>;
export type LocationSampleInput = z.infer<typeof locationSampleInputSchema>;
export type PhotoCaptureInput = z.infer<typeof photoCaptureInputSchema>;
