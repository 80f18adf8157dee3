import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a section name was given but none of the candidate config files exist.
 */
export class ConfigNotFoundError extends Error {
  /** ConfigNotFoundError error-name */
  name = 'ConfigNotFoundError';
  /** Paths searched, in order */
  #paths: readonly string[];

  /** Creates a new instance of a ConfigNotFoundError listing every searched path */
  constructor(paths: readonly string[], opts?: ErrorOptions) {
    super(`error no config file found, searched ${paths.join(', ')}`, opts);
    this.#paths = paths;
  }

  /** Paths searched, in order */
  get paths(): readonly string[] {
    return this.#paths;
  }
}

/**
 * Type guard for {@link ConfigNotFoundError}.
 */
export function isConfigNotFoundError(error: unknown): error is ConfigNotFoundError {
  return isErrorType(ConfigNotFoundError, error);
}
