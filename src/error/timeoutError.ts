import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold,
 * or the socket layer reports a timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  name = 'TimeoutError';
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}
