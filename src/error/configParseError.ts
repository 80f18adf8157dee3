import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a config file exists but its content is malformed.
 * The underlying read or validation error is attached as `cause`.
 */
export class ConfigParseError extends Error {
  /** ConfigParseError error-name */
  name = 'ConfigParseError';
  /** Config file path */
  #path: string;

  /** Creates a new instance of a ConfigParseError for the given file */
  constructor(message: string, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#path = path;
  }

  /** Config file path */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link ConfigParseError}.
 */
export function isConfigParseError(error: unknown): error is ConfigParseError {
  return isErrorType(ConfigParseError, error);
}
