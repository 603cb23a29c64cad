import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  vi,
  type MockInstance,
} from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { stripVTControlCharacters } from 'node:util';
import { setVerbose, VERBOSE } from 'flowdoc-core';
import { createProgram } from '../program.js';

describe('createProgram', () => {
  let testDir: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  const writeDocument = (name: string, content: string) => {
    const filePath = join(testDir, name);
    writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'flowdoc-cli-program-test-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    process.exitCode = undefined;
    setVerbose(false);
  });

  it('should expose the package version', () => {
    expect(createProgram().version()).toBe('0.1.0');
  });

  it('should leave the exit code untouched on success', () => {
    const filePath = writeDocument(
      'flow.yaml',
      'flow:\n  - id: only\n    response: "Done."\n'
    );

    createProgram().parse(['flow', 'validate', filePath], { from: 'user' });

    expect(process.exitCode).toBeUndefined();
    expect(stripVTControlCharacters(String(consoleLogSpy.mock.calls[0][0]))).toBe(
      '✓ Flow is valid (1 steps)'
    );
  });

  it('should set a failing exit code when validation fails', () => {
    const filePath = writeDocument('workflow.yaml', 'workflow:\n  name: x\n');

    createProgram().parse(['workflow', 'validate', filePath], {
      from: 'user',
    });

    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalled();
  });

  it('should turn on verbose logging with --verbose', () => {
    const filePath = writeDocument(
      'flow.yaml',
      'flow:\n  - id: only\n    response: "Done."\n'
    );

    createProgram().parse(['--verbose', 'flow', 'inspect', filePath], {
      from: 'user',
    });

    expect(VERBOSE).toBe(true);
    const logged = consoleErrorSpy.mock.calls.map(call =>
      stripVTControlCharacters(String(call[0]))
    );
    expect(logged).toEqual([
      `Loading flow from ${filePath}`,
      `Loaded flow with 1 steps from ${filePath}`,
    ]);
  });
});
