import { DecodeError } from '../error/decodeError.js';
import { ProtocolError } from '../error/protocolError.js';
import type { TransportResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Classifies a transport response and extracts its body.
 *
 * Behavior:
 * - The body is always read as text first.
 *   - A failure reading it is returned untouched, like any other transport failure.
 * - A status outside [200, 300) returns a {@link ProtocolError} with the raw text; error bodies are never parsed.
 * - Otherwise the text is parsed as JSON regardless of `Content-Type`.
 *   - On parse failure (an empty body included) it returns a {@link DecodeError} with the parse error as `cause`.
 */
export async function getResponseData<ReturnValue>(response: TransportResponse): SafeWrapAsync<Error, ReturnValue> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [errText, null];
  }

  if (response.status < 200 || response.status >= 300) {
    return [new ProtocolError(response.status, text), null];
  }

  const [errJson, json] = safeWrap(() => JSON.parse(text));
  if (errJson) {
    return [new DecodeError(text, { cause: errJson }), null];
  }

  return [null, json];
}
