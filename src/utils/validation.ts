import { z } from 'zod';
import { ValidationError } from '../models/errors';

/**
 * Parse `input` with `schema`, turning zod issues into a ValidationError
 * whose details list each failing path.
 */
export function parseInput<O, I>(schema: z.ZodType<O, z.ZodTypeDef, I>, input: unknown, what: string): O {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message }));
    throw new ValidationError(
      `Invalid ${what}: ${issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
      { issues }
    );
  }
  return result.data;
}
