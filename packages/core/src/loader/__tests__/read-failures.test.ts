/**
 * Read failures that cannot be produced reliably on a real file system
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadFlow } from '../flow.js';
import { loadWorkflow } from '../workflow.js';
import { FileAccessError } from '../errors.js';

vi.mock('node:fs', async importOriginal => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return { ...actual, readFileSync: vi.fn(actual.readFileSync) };
});

const fsError = (code: string, message: string) =>
  Object.assign(new Error(`${code}: ${message}`), { code });

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

describe('document read failures', () => {
  let testDir: string;
  let filePath: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'flowdoc-read-test-'));
    filePath = join(testDir, 'document.yaml');
    writeFileSync(filePath, 'flow:\n  - id: only\n');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    vi.mocked(readFileSync).mockReset();
  });

  it('should report permission denied', () => {
    const cause = fsError('EACCES', 'permission denied, open');
    vi.mocked(readFileSync).mockImplementation(() => {
      throw cause;
    });

    const error = catchError(() => loadFlow(filePath));

    expect(error).toBeInstanceOf(FileAccessError);
    if (error instanceof FileAccessError) {
      expect(error.message).toBe(`Permission denied reading file: ${filePath}`);
      expect(error.reason).toBe('permission-denied');
      expect(error.source).toBe(filePath);
      expect(error.cause).toBe(cause);
    }
  });

  it('should report other I/O failures with the underlying message', () => {
    vi.mocked(readFileSync).mockImplementation(() => {
      throw fsError('EIO', 'i/o error, read');
    });

    const error = catchError(() => loadFlow(filePath));

    expect(error).toBeInstanceOf(FileAccessError);
    if (error instanceof FileAccessError) {
      expect(error.message).toBe(
        `Error reading flow file ${filePath}: EIO: i/o error, read`
      );
      expect(error.reason).toBe('io');
    }
  });

  it('should name the workflow section in I/O failures', () => {
    vi.mocked(readFileSync).mockImplementation(() => {
      throw fsError('EIO', 'i/o error, read');
    });

    const error = catchError(() => loadWorkflow(filePath));

    expect(error).toBeInstanceOf(FileAccessError);
    if (error instanceof FileAccessError) {
      expect(error.message).toBe(
        `Error reading workflow file ${filePath}: EIO: i/o error, read`
      );
      expect(error.reason).toBe('io');
    }
  });
});
