/**
 * Error entrypoint: the error kinds returned by the API client, plus helpers for
 * identifying them anywhere in a `cause` chain.
 * @module
 */

export { ArgumentError, getArgumentError, isArgumentError } from './argumentError.js';
export { ConstructURLError, isConstructURLError } from './constructUrlError.js';
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
export { getProtocolError, isProtocolError, ProtocolError } from './protocolError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { isUnsupportedMethodError, UnsupportedMethodError } from './unsupportedMethodError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
