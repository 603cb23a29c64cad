import type { ZodError } from 'zod';
import { formatViolations, type Violation } from './validation.js';

/**
 * Error class for entity construction failures. Carries every violation
 * found in the input, not only the first one.
 */
export class SchemaValidationError extends Error {
  constructor(
    public readonly entity: string,
    public readonly violations: Violation[],
    public readonly validationErrors: ZodError
  ) {
    super(`${entity} validation failed:\n${formatViolations(violations)}`);
    this.name = 'SchemaValidationError';
  }
}
