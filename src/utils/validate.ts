import { z, ZodError, type ZodTypeAny } from 'zod';
import { BadRequestError } from './errors.js';

export function formatZodError(error: ZodError): string {
  return error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
}

/**
 * Parse request input against a schema, turning validation failures into a 400
 */
export function validate<T extends ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestError(formatZodError(parsed.error));
  }
  return parsed.data;
}
