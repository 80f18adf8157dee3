import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request is intentionally aborted, either by the caller's signal
 * or because the client was disposed.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}

/**
 * Extract an {@link AbortError} from an unknown error value, following nested causes.
 */
export function getAbortError(error: unknown): null | AbortError {
  return unwrapErrorType(AbortError, error);
}
