import { describe, expect, it } from 'vitest';
import { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';

describe('TimeoutError', () => {
  it('is detected directly and through causes', () => {
    const err = new TimeoutError('error request timed out after 50ms');

    expect(isTimeoutError(err)).toBe(true);
    expect(isTimeoutError(new Error('outer', { cause: err }))).toBe(true);
    expect(getTimeoutError(new Error('outer', { cause: err }))).toBe(err);
  });

  it('rejects other errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
    expect(getTimeoutError(new Error('boom'))).toBeNull();
  });

  it('carries its class name', () => {
    expect(new TimeoutError('slow').name).toBe('TimeoutError');
  });
});
