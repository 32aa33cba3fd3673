import type { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Validates a request body against a Zod schema and returns the parsed data.
 * Throws ValidationError carrying the issues; the first issue becomes the message.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
  fallbackMessage = 'Invalid request',
): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ValidationError(first?.message ?? fallbackMessage, result.error.issues);
  }
  return result.data;
}
