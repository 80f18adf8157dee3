import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a configured client certificate or CA bundle does not exist.
 */
export class CertificateNotFoundError extends Error {
  /** CertificateNotFoundError error-name */
  name = 'CertificateNotFoundError';
  /** Missing file, resolved to an absolute path */
  #path: string;

  /** Creates a new instance of a CertificateNotFoundError */
  constructor(path: string, opts?: ErrorOptions) {
    super(`error certificate file not found: ${path}`, opts);
    this.#path = path;
  }

  /** Missing file, resolved to an absolute path */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link CertificateNotFoundError}.
 */
export function isCertificateNotFoundError(error: unknown): error is CertificateNotFoundError {
  return isErrorType(CertificateNotFoundError, error);
}
