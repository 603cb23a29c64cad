/**
 * Error taxonomy for document loading. Every failure that crosses the
 * loader boundary is one of the three subclasses below.
 */

import type { Violation } from 'flowdoc-schemas';

/**
 * Base error for all document loading failures.
 */
export class DocumentLoadError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DocumentLoadError';
  }
}

export type FileAccessReason =
  | 'not-found'
  | 'not-a-file'
  | 'permission-denied'
  | 'io';

/**
 * Thrown when the source file cannot be resolved or read.
 */
export class FileAccessError extends DocumentLoadError {
  constructor(
    message: string,
    source: string,
    public readonly reason: FileAccessReason,
    cause?: unknown
  ) {
    super(message, source, cause);
    this.name = 'FileAccessError';
  }
}

/**
 * Thrown when the document is not well-formed: syntax errors, empty
 * documents, a non-mapping top level or a missing section.
 */
export class StructuralError extends DocumentLoadError {
  constructor(message: string, source: string, cause?: unknown) {
    super(message, source, cause);
    this.name = 'StructuralError';
  }
}

/**
 * Thrown when the document section fails entity validation.
 */
export class SemanticValidationError extends DocumentLoadError {
  constructor(
    message: string,
    source: string,
    public readonly violations: Violation[],
    cause?: unknown
  ) {
    super(message, source, cause);
    this.name = 'SemanticValidationError';
  }
}
