import { describe, it, expect } from 'vitest';
import { classifyAccessFailure } from '../document.js';

const fsError = (code: string) =>
  Object.assign(new Error(`${code}: simulated`), { code });

describe('classifyAccessFailure', () => {
  it('should treat missing paths as not found', () => {
    expect(classifyAccessFailure(fsError('ENOENT'))).toBe('not-found');
    expect(classifyAccessFailure(fsError('ENOTDIR'))).toBe('not-found');
  });

  it('should detect directories', () => {
    expect(classifyAccessFailure(fsError('EISDIR'))).toBe('not-a-file');
  });

  it('should detect permission failures', () => {
    expect(classifyAccessFailure(fsError('EACCES'))).toBe('permission-denied');
    expect(classifyAccessFailure(fsError('EPERM'))).toBe('permission-denied');
  });

  it('should fall back to a generic I/O failure', () => {
    expect(classifyAccessFailure(fsError('EIO'))).toBe('io');
    expect(classifyAccessFailure(new Error('no code'))).toBe('io');
    expect(classifyAccessFailure('not an error')).toBe('io');
  });
});
