import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a successful response does not have the expected shape:
 * wrong content type, empty body, or a body the XML parser rejects.
 */
export class UnexpectedResponseError extends Error {
  /** UnexpectedResponseError error-name */
  name = 'UnexpectedResponseError';
  /** Raw response body */
  #body: string;
  /** Response media type, without parameters */
  #mimeType: string | null;

  /** Creates a new instance of an UnexpectedResponseError */
  constructor(message: string, body: string, mimeType: string | null, opts?: ErrorOptions) {
    super(message, opts);
    this.#body = body;
    this.#mimeType = mimeType;
  }

  /** Raw response body */
  get body(): string {
    return this.#body;
  }

  /** Response media type, without parameters */
  get mimeType(): string | null {
    return this.#mimeType;
  }
}

/**
 * Type guard for {@link UnexpectedResponseError}.
 */
export function isUnexpectedResponseError(error: unknown): error is UnexpectedResponseError {
  return isErrorType(UnexpectedResponseError, error);
}
