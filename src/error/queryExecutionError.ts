import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error reported by the database itself. `code` and `message` are the server's, verbatim.
 *
 * Qizx reports codes such as `BadRequest`, `NotFound`, `AccessControl`, `XMLData`,
 * `Compilation`, `Evaluation` and `TimeOut`; other servers may use their own.
 */
export class QueryExecutionError extends Error {
  /** QueryExecutionError error-name */
  name = 'QueryExecutionError';
  /** Server-reported error code */
  #code: string;
  /** HTTP status of the response carrying the error */
  #status: number;

  /** Creates a new instance of a QueryExecutionError from a decoded server error payload */
  constructor(code: string, message: string, status: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#code = code;
    this.#status = status;
  }

  /** Server-reported error code */
  get code(): string {
    return this.#code;
  }

  /** HTTP status of the response carrying the error */
  get status(): number {
    return this.#status;
  }
}

/**
 * Type guard for {@link QueryExecutionError}.
 */
export function isQueryExecutionError(error: unknown): error is QueryExecutionError {
  return isErrorType(QueryExecutionError, error);
}

/**
 * Extract a {@link QueryExecutionError} from an unknown error value, following nested causes.
 */
export function getQueryExecutionError(error: unknown): null | QueryExecutionError {
  return unwrapErrorType(QueryExecutionError, error);
}
