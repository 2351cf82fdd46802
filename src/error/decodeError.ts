import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * A 2xx response whose body is not valid JSON.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  name = 'DecodeError';
  /** Body text that failed to parse */
  readonly content: string;

  /** Creates a new instance of a DecodeError with the body that could not be parsed */
  constructor(content: string, opts?: ErrorOptions) {
    super('error decoding json response body', opts);
    this.content = content;
  }
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}
