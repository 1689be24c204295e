/**
 * Ontology Document Format
 *
 * A Run is written as a plain JSON object that mirrors its full field set:
 * timestamps as ISO-8601 text, unset optional timestamps as `null`, enum
 * fields as their string tags, and unrecognized keys carried through.
 * `fromDocument(toDocument(run))` reproduces `run`.
 */

import type { JsonObject, JsonValue } from '../ontology/json.js';
import { ValidationError } from '../ontology/errors.js';
import { formatTimestamp } from '../ontology/timestamp.js';
import { parseEntity } from '../ontology/validation.js';
import { RunSchema, type Run } from '../ontology/run.js';

export interface SerializeOptions {
  /** Spaces per indentation level; 0 writes a single line */
  indent?: number;
}

export const DEFAULT_INDENT = 2;

/**
 * Convert any entity into its document form.
 *
 * Keys holding `undefined` are dropped; `null` is kept.
 */
export function entityToDocument(entity: object): JsonObject {
  const document: JsonObject = {};
  for (const [key, value] of Object.entries(entity)) {
    const converted = toJsonValue(value);
    if (converted !== undefined) {
      document[key] = converted;
    }
  }
  return document;
}

export function toDocument(run: Run): JsonObject {
  return entityToDocument(run);
}

/**
 * Rebuild a Run from its document form.
 *
 * @throws ValidationError naming the first offending field
 */
export function fromDocument(document: unknown): Run {
  return parseEntity(RunSchema, document, 'Run');
}

export function serializeRun(run: Run, options: SerializeOptions = {}): string {
  return JSON.stringify(toDocument(run), null, options.indent ?? DEFAULT_INDENT);
}

/**
 * Parse JSON text into a Run.
 *
 * @throws ValidationError when the text is not JSON or not a valid Run
 */
export function deserializeRun(text: string): Run {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError('Run', [{ path: '(root)', message: `Not valid JSON: ${reason}` }]);
  }
  return fromDocument(document);
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === undefined) return undefined;
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return formatTimestamp(value);
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item) ?? null);
  }
  if (typeof value === 'object') {
    return entityToDocument(value);
  }
  // Functions, symbols and bigints have no document form
  return undefined;
}
