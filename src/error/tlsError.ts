import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the TLS handshake fails, or TLS material (CA bundle, client certificate) cannot be loaded.
 */
export class TLSError extends Error {
  /** TLSError error-name */
  name = 'TLSError';
}

/**
 * Type guard for {@link TLSError}.
 */
export function isTLSError(error: unknown): error is TLSError {
  return isErrorType(TLSError, error);
}

/**
 * Extract a {@link TLSError} from an unknown error value, following nested causes.
 */
export function getTLSError(error: unknown): null | TLSError {
  return unwrapErrorType(TLSError, error);
}
