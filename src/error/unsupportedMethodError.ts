import { isErrorType } from './isErrorType.js';

/**
 * The dispatcher was asked for an HTTP method other than GET, PUT, POST or DELETE.
 */
export class UnsupportedMethodError extends Error {
  /** UnsupportedMethodError error-name */
  name = 'UnsupportedMethodError';
  /** Method as given by the caller */
  readonly method: string;

  /** Creates a new instance of an UnsupportedMethodError for the rejected method */
  constructor(method: string, opts?: ErrorOptions) {
    super(`Unsupported HTTP method: ${method}`, opts);
    this.method = method;
  }
}

/**
 * Type guard for {@link UnsupportedMethodError}.
 */
export function isUnsupportedMethodError(error: unknown): error is UnsupportedMethodError {
  return isErrorType(UnsupportedMethodError, error);
}
