/**
 * Shared stages of document loading: file resolution, UTF-8 decoding,
 * YAML parsing and section extraction. Flow and workflow loaders only
 * differ in the section they extract and the entity they build from it.
 */

import { readFileSync, statSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { describeKind } from 'flowdoc-schemas';
import {
  FileAccessError,
  StructuralError,
  type FileAccessReason,
} from './errors.js';

/**
 * Describes one kind of document
 */
export interface DocumentKind {
  /** Required top-level key */
  section: string;

  /** Capitalized label used in messages, e.g. "Flow" */
  label: string;
}

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Map a file system error to the access failure it represents
 */
export function classifyAccessFailure(error: unknown): FileAccessReason {
  switch (errorCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'not-found';
    case 'EISDIR':
      return 'not-a-file';
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied';
    default:
      return 'io';
  }
}

function accessError(
  error: unknown,
  filePath: string,
  kind: DocumentKind
): FileAccessError {
  const reason = classifyAccessFailure(error);

  switch (reason) {
    case 'not-found':
      return new FileAccessError(
        `${kind.label} file not found: ${filePath}`,
        filePath,
        reason,
        error
      );
    case 'not-a-file':
      return new FileAccessError(
        `Path is not a file: ${filePath}`,
        filePath,
        reason,
        error
      );
    case 'permission-denied':
      return new FileAccessError(
        `Permission denied reading file: ${filePath}`,
        filePath,
        reason,
        error
      );
    case 'io':
      return new FileAccessError(
        `Error reading ${kind.section} file ${filePath}: ${errorMessage(error)}`,
        filePath,
        reason,
        error
      );
  }
}

/**
 * Resolve and read a document file. The path must name an existing,
 * readable regular file; nothing is parsed here.
 */
export function readDocumentFile(
  filePath: string,
  kind: DocumentKind
): Uint8Array {
  try {
    if (!statSync(filePath).isFile()) {
      throw new FileAccessError(
        `Path is not a file: ${filePath}`,
        filePath,
        'not-a-file'
      );
    }
    return readFileSync(filePath);
  } catch (error) {
    if (error instanceof FileAccessError) {
      throw error;
    }
    throw accessError(error, filePath, kind);
  }
}

/**
 * Decode document bytes as strict UTF-8. A leading BOM is dropped.
 */
export function decodeDocument(bytes: Uint8Array, source: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new StructuralError(
      `Document is not valid UTF-8 text: ${source}`,
      source,
      error
    );
  }
}

/**
 * Parse YAML text into a plain tree and pull out the section value
 */
export function extractSection(
  content: string,
  source: string,
  kind: DocumentKind
): unknown {
  let document: unknown;
  try {
    // Warnings are not errors and must not be printed
    document = parseYaml(content, { logLevel: 'error' });
  } catch (error) {
    throw new StructuralError(
      `Invalid YAML format in ${source}: ${errorMessage(error)}`,
      source,
      error
    );
  }

  if (document === null || document === undefined) {
    throw new StructuralError(
      `${kind.label} file is empty: ${source}`,
      source
    );
  }

  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new StructuralError(
      `${kind.label} file must contain a YAML mapping, got ${describeKind(document)}: ${source}`,
      source
    );
  }

  const section: unknown = Object.hasOwn(document, kind.section)
    ? Reflect.get(document, kind.section)
    : undefined;
  if (section === null || section === undefined) {
    throw new StructuralError(
      `${kind.label} file must contain a '${kind.section}' section: ${source}`,
      source
    );
  }

  return section;
}
