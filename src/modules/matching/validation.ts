import type { z } from 'zod';

export interface ValidationDetails {
  formErrors: string[];
  fieldErrors: Record<string, string[] | undefined>;
}

/**
 * Thrown when a caller hands the matching core something outside its
 * contract (negative confidence, blank id, unknown pill color...).
 * statusCode lets the HTTP error handler map it to 400 as-is.
 */
export class InputValidationError extends Error {
  readonly statusCode = 400;
  readonly details: ValidationDetails;

  constructor(message: string, error: z.ZodError) {
    super(message);
    this.name = 'InputValidationError';
    this.details = error.flatten();
  }
}

/**
 * Validate a value against a schema, throwing InputValidationError on failure.
 */
export function assertValid<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InputValidationError(`Invalid ${what}`, result.error);
  }
  return result.data;
}
