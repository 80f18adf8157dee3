import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the requested section is absent from the loaded config file.
 */
export class SectionNotFoundError extends Error {
  /** SectionNotFoundError error-name */
  name = 'SectionNotFoundError';
  /** Requested section */
  #section: string;
  /** Config file that was searched */
  #path: string;

  /** Creates a new instance of a SectionNotFoundError */
  constructor(section: string, path: string, opts?: ErrorOptions) {
    super(`error section "${section}" not found in ${path}`, opts);
    this.#section = section;
    this.#path = path;
  }

  /** Requested section */
  get section(): string {
    return this.#section;
  }

  /** Config file that was searched */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link SectionNotFoundError}.
 */
export function isSectionNotFoundError(error: unknown): error is SectionNotFoundError {
  return isErrorType(SectionNotFoundError, error);
}
