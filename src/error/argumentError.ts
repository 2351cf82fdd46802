import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * A call was given a missing or invalid argument. Raised before any request is made.
 */
export class ArgumentError extends Error {
  /** ArgumentError error-name */
  name = 'ArgumentError';
  /** Name of the offending parameter */
  readonly argument: string;

  /** Creates a new instance of an ArgumentError for the named parameter */
  constructor(argument: string, message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.argument = argument;
  }
}

/**
 * Type guard for {@link ArgumentError}.
 */
export function isArgumentError(error: unknown): error is ArgumentError {
  return isErrorType(ArgumentError, error);
}

/**
 * Extract an {@link ArgumentError} from an unknown error value, following nested causes.
 */
export function getArgumentError(error: unknown): null | ArgumentError {
  return unwrapErrorType(ArgumentError, error);
}
