// PatrolSync - Common Validation Schemas
import { z } from 'zod';

// Coordinates validation
export const latitudeSchema = z
  .number()
  .finite('Latitude must be a finite number')
  .min(-90, 'Latitude must be between -90 and 90')
  .max(90, 'Latitude must be between -90 and 90');

export const longitudeSchema = z
  .number()
  .finite('Longitude must be a finite number')
  .min(-180, 'Longitude must be between -180 and 180')
  .max(180, 'Longitude must be between -180 and 180');

export const coordinatesSchema = z.object({
  latitude: latitudeSchema,
  longitude: longitudeSchema,
});

// Positive integer ids (locations, checkpoints)
export const positiveIdSchema = z
  .number()
  .int('Id must be an integer')
  .positive('Id must be positive');

export const userIdSchema = z.string().trim().min(1, 'User id is required');

export const isoTimestampSchema = z.string().datetime({ offset: true });

// =============================================================================
// Validation result shape
// =============================================================================

export interface ValidationError {
  field: string;
  message: string;
  code: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Run a schema and flatten zod issues into field/message/code entries
 *
 * @param schema - Schema to run
 * @param input - Value to check
 */
export function validateWith(schema: z.ZodTypeAny, input: unknown): ValidationResult {
  const result = schema.safeParse(input);
  if (result.success) {
    return { isValid: true, errors: [] };
  }

  return {
    isValid: false,
    errors: result.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join('.') : 'value',
      message: issue.message,
      code: issueCode(issue),
    })),
  };
}

function issueCode(issue: z.ZodIssue): string {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined' ? 'REQUIRED_FIELD' : 'INVALID_TYPE';
    case 'too_small':
      return 'TOO_SMALL';
    case 'too_big':
      return 'TOO_BIG';
    default:
      return 'INVALID_VALUE';
  }
}
