import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a config section has no `url` key.
 */
export class MissingURLError extends Error {
  /** MissingURLError error-name */
  name = 'MissingURLError';
  /** Section lacking the url */
  #section: string;

  /** Creates a new instance of a MissingURLError */
  constructor(section: string, path: string, opts?: ErrorOptions) {
    super(`error section "${section}" in ${path} has no url`, opts);
    this.#section = section;
  }

  /** Section lacking the url */
  get section(): string {
    return this.#section;
  }
}

/**
 * Type guard for {@link MissingURLError}.
 */
export function isMissingURLError(error: unknown): error is MissingURLError {
  return isErrorType(MissingURLError, error);
}
