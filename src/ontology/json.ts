/**
 * JSON value model shared by every free-form field of the ontology
 * (tool inputs/outputs, parameter maps, evidence, sensor readings).
 */

import { z } from 'zod';

/** JSON-serializable value. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), JsonValueSchema);

/** Free-form map field that defaults to `{}`. */
export const jsonMap = () => JsonObjectSchema.default({});

/** Numeric map field (resource utilization, criteria weights, …) that defaults to `{}`. */
export const numberMap = () => z.record(z.string(), z.number().finite()).default({});

/** String list field that defaults to `[]`. */
export const stringList = () => z.array(z.string()).default([]);

/** List of free-form objects that defaults to `[]`. */
export const jsonObjectList = () => z.array(JsonObjectSchema).default([]);

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}
