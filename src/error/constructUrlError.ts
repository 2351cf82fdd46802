import { isErrorType } from './isErrorType.js';

/**
 * A path template still held `{placeholders}` after substitution.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  name = 'ConstructURLError';
  /** Path as it looked when construction gave up */
  readonly url: string;

  /** Creates a new instance of a ConstructURLError with accompanying path */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.url = url;
  }
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
