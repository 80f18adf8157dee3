import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the server could not be reached: refused or reset connections,
 * unresolvable hosts, unreachable networks.
 */
export class ConnectionError extends Error {
  /** ConnectionError error-name */
  name = 'ConnectionError';
}

/**
 * Type guard for {@link ConnectionError}.
 */
export function isConnectionError(error: unknown): error is ConnectionError {
  return isErrorType(ConnectionError, error);
}

/**
 * Extract a {@link ConnectionError} from an unknown error value, following nested causes.
 */
export function getConnectionError(error: unknown): null | ConnectionError {
  return unwrapErrorType(ConnectionError, error);
}
