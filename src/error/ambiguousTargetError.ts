import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a connection target is neither an `http`/`https` URL nor a plain section name,
 * e.g. `localhost:8080` or `ftp://host/`.
 */
export class AmbiguousTargetError extends Error {
  /** AmbiguousTargetError error-name */
  name = 'AmbiguousTargetError';
  /** Rejected target */
  #target: string;

  /** Creates a new instance of an AmbiguousTargetError */
  constructor(target: string, opts?: ErrorOptions) {
    super(`error target "${target}" is neither an http(s) URL nor a section name`, opts);
    this.#target = target;
  }

  /** Rejected target */
  get target(): string {
    return this.#target;
  }
}

/**
 * Type guard for {@link AmbiguousTargetError}.
 */
export function isAmbiguousTargetError(error: unknown): error is AmbiguousTargetError {
  return isErrorType(AmbiguousTargetError, error);
}
