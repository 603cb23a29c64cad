/**
 * Shared building blocks for the entity schemas: issue messages, optional
 * field normalization and violation formatting.
 */

import { z } from 'zod';

/**
 * A single constraint violation found while validating an entity
 */
export interface Violation {
  /** Dotted path to the offending field, e.g. `flow.1.tool_call.parameters.x.type` */
  path: string;

  /** Human-readable reason */
  message: string;
}

// Zod type names mapped to the vocabulary used in flow documents
const EXPECTED_KINDS: Record<string, string> = {
  string: 'text',
  object: 'mapping',
  record: 'mapping',
  array: 'sequence',
};

/**
 * Describe the kind of a parsed document value
 */
export function describeKind(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'sequence';
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return 'text';
    case 'object':
      return 'mapping';
    default:
      return typeof value;
  }
}

/**
 * Error map applied on every entity parse. Only type mismatches are
 * rewritten; checks with their own message keep it.
 */
export const fieldErrorMap: z.core.$ZodErrorMap = issue => {
  if (issue.code !== 'invalid_type') {
    return undefined;
  }
  if (issue.input === undefined) {
    return 'field required';
  }

  const expected = String(issue.expected);
  return `expected ${EXPECTED_KINDS[expected] ?? expected}, received ${describeKind(issue.input)}`;
};

/**
 * Text that must be present and non-empty
 */
export function requiredText() {
  return z.string().min(1, { error: 'must not be empty' });
}

/**
 * Optional field. An explicit `null` in the document is treated the same
 * as an absent key, so consumers only ever see `undefined`.
 */
export function optional<T extends z.ZodType>(schema: T) {
  return schema
    .nullable()
    .transform(value => value ?? undefined)
    .optional();
}

// Keys that cannot be stored on a plain object without changing its prototype
const RESERVED_KEYS = ['__proto__'];

/**
 * Mapping from free-form names to entities. Reserved keys are rejected
 * rather than dropped.
 */
export function mapping<T extends z.ZodType>(valueSchema: T) {
  return z.preprocess((value, ctx) => {
    if (typeof value === 'object' && value !== null) {
      for (const key of RESERVED_KEYS) {
        if (Object.hasOwn(value, key)) {
          ctx.addIssue({
            code: 'custom',
            message: `reserved key "${key}"`,
            path: [key],
          });
        }
      }
    }
    return value;
  }, z.record(z.string(), valueSchema));
}

/**
 * Render an issue path as a dotted string, optionally under a prefix
 */
export function formatPath(
  path: ReadonlyArray<PropertyKey>,
  prefix?: string
): string {
  const segments = path.map(segment => String(segment));
  if (prefix) {
    segments.unshift(prefix);
  }
  return segments.length > 0 ? segments.join('.') : '<root>';
}

export function toViolations(error: z.ZodError, prefix?: string): Violation[] {
  return error.issues.map(issue => ({
    path: formatPath(issue.path, prefix),
    message: issue.message,
  }));
}

/**
 * One violation per line, indented as a bullet list
 */
export function formatViolations(violations: ReadonlyArray<Violation>): string {
  return violations
    .map(violation => `  - ${violation.path}: ${violation.message}`)
    .join('\n');
}
