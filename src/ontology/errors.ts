/**
 * Ontology Error Taxonomy
 *
 * Every failure raised by the schema, connector, and serializer layers
 * carries a stable code plus the field/entity it concerns.
 */

import type { ZodError } from 'zod';

export type OntologyErrorCode = 'VALIDATION_FAILED' | 'MALFORMED_TIMESTAMP';

export abstract class OntologyError extends Error {
  abstract readonly code: OntologyErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export interface ValidationIssue {
  /** Dotted path of the offending field, e.g. `steps.2.start_time` */
  path: string;
  message: string;
}

/**
 * A required field is missing, or a field holds a value outside its type or
 * enumeration.
 */
export class ValidationError extends OntologyError {
  readonly code = 'VALIDATION_FAILED';

  constructor(
    readonly entity: string,
    readonly issues: ValidationIssue[],
  ) {
    super(`Invalid ${entity}: ${formatIssues(issues)}`);
  }

  /** Path of the first offending field. */
  get field(): string {
    return this.issues[0]?.path ?? '';
  }

  static fromZodError(entity: string, error: ZodError, basePath?: string): ValidationError {
    const issues = error.issues.map((issue) => ({
      path: joinPath(basePath, issue.path),
      message: issue.message,
    }));
    return new ValidationError(entity, issues);
  }
}

/**
 * An input timestamp string is not ISO-8601 once a trailing `Z` has been
 * normalized to `+00:00`.
 */
export class MalformedTimestampError extends OntologyError {
  readonly code = 'MALFORMED_TIMESTAMP';

  constructor(
    readonly field: string,
    readonly value: string,
  ) {
    super(`Malformed timestamp in ${field}: "${value}" is not ISO-8601`);
  }
}

function joinPath(basePath: string | undefined, path: (string | number)[]): string {
  const segments = basePath ? [basePath, ...path.map(String)] : path.map(String);
  return segments.length > 0 ? segments.join('.') : '(root)';
}

function formatIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) return 'unknown error';
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}
