import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised before any network call when the caller's request is invalid
 * (empty expression, inconsistent eval options, bad bind variables).
 */
export class InvalidRequestError extends Error {
  /** InvalidRequestError error-name */
  name = 'InvalidRequestError';
}

/**
 * Type guard for {@link InvalidRequestError}.
 */
export function isInvalidRequestError(error: unknown): error is InvalidRequestError {
  return isErrorType(InvalidRequestError, error);
}

/**
 * Extract an {@link InvalidRequestError} from an unknown error value, following nested causes.
 */
export function getInvalidRequestError(error: unknown): null | InvalidRequestError {
  return unwrapErrorType(InvalidRequestError, error);
}
