import { z } from 'zod';
import { ValidationError } from '../utils/errors';

// Blank query values count as absent
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

export const textWithDefault = (defaultValue: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(defaultValue));

export const requiredText = z.string().trim().min(1);

// Larger values do not survive the trip to a bigint parameter
const MAX_INTEGER = Number.MAX_SAFE_INTEGER;

export const positiveInt = (defaultValue: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().max(MAX_INTEGER).default(defaultValue));

export const optionalSalary = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().nonnegative().max(MAX_INTEGER).optional()
);

/**
 * Validates query parameters, raising a 400 with the zod issues on failure
 */
export function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.infer<T> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid query parameters',
      parsed.error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return parsed.data;
}
