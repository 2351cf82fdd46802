import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * The home server answered with a status outside 2xx.
 *
 * `content` is the raw response body. Server error bodies are usually JSON
 * (`{"errcode": "M_FORBIDDEN", ...}`) but nothing guarantees it, so it is left unparsed.
 */
export class ProtocolError extends Error {
  /** ProtocolError error-name */
  name = 'ProtocolError';
  /** HTTP status code returned by the server */
  readonly code: number;
  /** Raw response body text */
  readonly content: string;

  /** Creates a new instance of a ProtocolError from the response status and body */
  constructor(code: number, content: string, opts?: ErrorOptions) {
    super(`${code}: ${content}`, opts);
    this.code = code;
    this.content = content;
  }
}

/**
 * Type guard for {@link ProtocolError}.
 */
export function isProtocolError(error: unknown): error is ProtocolError {
  return isErrorType(ProtocolError, error);
}

/**
 * Extract a {@link ProtocolError} from an unknown error value, following nested causes.
 */
export function getProtocolError(error: unknown): null | ProtocolError {
  return unwrapErrorType(ProtocolError, error);
}
