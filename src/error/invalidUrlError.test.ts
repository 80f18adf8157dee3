import { describe, expect, it } from 'vitest';
import { getInvalidURLError, InvalidURLError, isInvalidURLError } from './invalidUrlError.js';

describe('InvalidURLError', () => {
  it('exposes url via getter', () => {
    const err = new InvalidURLError('bad url', 'ftp://db.example.com');

    expect(err.url).toBe('ftp://db.example.com');
  });
});

describe('isInvalidURLError', () => {
  it('returns true for instances of InvalidURLError', () => {
    expect(isInvalidURLError(new InvalidURLError('bad url', 'http://'))).toBe(true);
  });

  it('returns false for non InvalidURLError errors', () => {
    expect(isInvalidURLError(new Error('boom'))).toBe(false);
  });
});

describe('getInvalidURLError', () => {
  it('unwraps nested causes', () => {
    const err = new InvalidURLError('bad url', 'http://');
    const wrapped = new Error('outer', { cause: err });

    expect(getInvalidURLError(wrapped)).toBe(err);
  });

  it('returns null when no InvalidURLError exists', () => {
    const wrapped = new Error('outer', { cause: new Error('inner') });

    expect(getInvalidURLError(wrapped)).toBeNull();
  });
});
