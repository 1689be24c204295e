/**
 * Schema seam: turns zod failures into ValidationError.
 */

import type { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Validate `data` against an entity schema.
 *
 * @param entity - Entity name reported in the error (e.g. "AgentInstance")
 * @param basePath - Prefix for issue paths when validating a nested value
 * @throws ValidationError
 */
export function parseEntity<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  entity: string,
  basePath?: string,
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(entity, result.error, basePath);
  }
  return result.data;
}

export type EntityParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: ValidationError };

export function safeParseEntity<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  entity: string,
): EntityParseResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: ValidationError.fromZodError(entity, result.error) };
}
