import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic transport failure. Either the request never produced a response,
 * or the server answered with an error status whose body could not be interpreted.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  name = 'TransportError';
  /** HTTP status, null when no response was received */
  #status: number | null;
  /** Raw response body, null when no response was received */
  #body: string | null;

  /** Creates a new instance of a TransportError with the raw status and body, when there were any */
  constructor(message: string, status: number | null = null, body: string | null = null, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
    this.#body = body;
  }

  /** HTTP status of the failed response */
  get status(): number | null {
    return this.#status;
  }

  /** Raw body of the failed response */
  get body(): string | null {
    return this.#body;
  }
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
