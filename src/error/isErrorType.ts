import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard to check if an unknown error matches a specific error class.
 * Traverses nested `cause` chains unless `shallow` is true.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): err is T {
  return Boolean(unwrapErrorType(errorClass, err, shallow));
}
