import { describe, it, expect } from 'vitest';
import { formatTraceback, toErrorMessage } from './async.js';

describe('toErrorMessage', () => {
  it('uses the message of an Error', () => {
    expect(toErrorMessage(new Error('queue offline'))).toBe('queue offline');
  });

  it('stringifies other values', () => {
    expect(toErrorMessage(42)).toBe('42');
  });
});

describe('formatTraceback', () => {
  it('returns the stack of an Error', () => {
    const err = new Error('bad payload');
    expect(formatTraceback(err)).toBe(err.stack);
  });

  it('falls back to name and message when there is no stack', () => {
    const err = new TypeError('nope');
    err.stack = undefined;
    expect(formatTraceback(err)).toBe('TypeError: nope');
  });

  it('labels thrown non-errors', () => {
    expect(formatTraceback('disk full')).toBe('Thrown value: disk full');
  });
});
