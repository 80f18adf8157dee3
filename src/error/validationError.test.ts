import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { ValidationError } from './validationError.js';

describe('isErrorType', () => {
  it('expect shallow to correctly return true', () => {
    const err = new ValidationError('error-validating', []);

    expect(isErrorType(ValidationError, err)).toEqual(true);
  });

  it('expect non ValidationError to return false', () => {
    const err = new Error('error');

    expect(isErrorType(ValidationError, err)).toEqual(false);
  });

  it('expect non ValidationError to return false', () => {
    const validationErr = new ValidationError('error-validating', []);
    const err = new Error('error', { cause: validationErr });

    expect(unwrapErrorType(ValidationError, err)).toStrictEqual(validationErr);
  });
});

describe('ValidationError', () => {
  it('renders issues with their paths into the message', () => {
    const err = new ValidationError('error validating eval request', [
      { message: 'must not be empty', path: ['expression'] },
      { message: 'Expected number, received string', path: [{ key: 'bindVariables' }, 'limit'] },
    ]);

    expect(err.message).toBe(
      'error validating eval request; expression: must not be empty, bindVariables.limit: Expected number, received string',
    );
    expect(err.issues).toHaveLength(2);
  });

  it('keeps the bare message without issues', () => {
    expect(new ValidationError('error validating data', []).message).toBe('error validating data');
  });
});
