import { ZodError } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';
import { HttpError } from './errorHandler';

/**
 * Parses a request body, query or params object against a schema and
 * returns the typed value; a mismatch becomes a 400.
 */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): T {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const messages = error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`);
      throw new HttpError(400, `Validation error: ${messages.join(', ')}`);
    }
    throw error;
  }
}
