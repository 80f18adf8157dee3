import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an endpoint URL that cannot be parsed, or whose scheme is not `http`/`https`.
 */
export class InvalidURLError extends Error {
  /** InvalidURLError error-name */
  name = 'InvalidURLError';
  /** Internal URL for what it looked like */
  #url: string;

  /** Creates a new instance of an InvalidURLError with accompanying URL input */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** The rejected URL input */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract an {@link InvalidURLError} from an unknown error value, following nested causes.
 */
export function getInvalidURLError(error: unknown): null | InvalidURLError {
  return unwrapErrorType(InvalidURLError, error);
}

/**
 * Type guard for {@link InvalidURLError}.
 */
export function isInvalidURLError(error: unknown): error is InvalidURLError {
  return isErrorType(InvalidURLError, error);
}
