import { ArgumentError } from '../error/argumentError.js';
import { UnsupportedMethodError } from '../error/unsupportedMethodError.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type {
  FetchClientProviderDefinition,
  HttpMethod,
  RequestDescriptor,
  TransportOptions,
  TransportResponse,
} from '../types/request.js';
import { constructQuery } from '../utils/constructUrl.js';
import { getResponseData } from '../utils/getResponseData.js';
import type { Logger } from '../utils/logger.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { Session } from './session.js';
import type { DispatchOptions } from './types.js';

const SUPPORTED_METHODS: readonly HttpMethod[] = ['GET', 'PUT', 'POST', 'DELETE'];

function isHttpMethod(method: string): method is HttpMethod {
  return SUPPORTED_METHODS.some((supported) => supported === method);
}

/** Collaborators of a {@link Dispatcher}. */
export interface DispatcherProps {
  session: Session;
  fetchClient: FetchClientProviderDefinition;
  logger: Logger;
}

/**
 * Sends one request through the transport and classifies the answer.
 *
 * Every request:
 * - carries `access_token` from the session (empty while unset), overriding any caller value,
 * - carries `Content-Type: application/json`, overriding any caller value,
 * - carries its body as JSON, `null` when absent, whatever the method.
 *
 * Results are error-first tuples:
 * - `UnsupportedMethodError` for anything but GET/PUT/POST/DELETE, before any I/O,
 * - `ArgumentError` when the body cannot be serialized, before any I/O,
 * - transport failures as the transport returned them,
 * - `ProtocolError` for a status outside 2xx, `DecodeError` for a 2xx body that is not JSON.
 */
export class Dispatcher {
  #session: Session;
  #fetchClient: FetchClientProviderDefinition;
  #logger: Logger;

  constructor({ session, fetchClient, logger }: DispatcherProps) {
    this.#session = session;
    this.#fetchClient = fetchClient;
    this.#logger = logger;
  }

  /**
   * Dispatches `method path` with optional body, query parameters and headers.
   *
   * @param method - HTTP method, case-insensitive.
   * @param path - Path below the API root, variable segments already percent-encoded.
   * @returns A promise resolving to `[error, json]`.
   */
  async send<ResponseType = unknown>(
    method: string,
    path: string,
    { body, query, headers }: DispatchOptions = {},
  ): SafeWrapAsync<Error, ResponseType> {
    const verb = method.toUpperCase();
    if (!isHttpMethod(verb)) {
      return [new UnsupportedMethodError(method), null];
    }

    return this.dispatch<ResponseType>({ method: verb, path, body, query, headers });
  }

  /**
   * Dispatches an already-built {@link RequestDescriptor}.
   */
  async dispatch<ResponseType = unknown>(descriptor: RequestDescriptor): SafeWrapAsync<Error, ResponseType> {
    const { method, path } = descriptor;
    const [errBody, body] = safeWrap(() => JSON.stringify(descriptor.body ?? null));
    if (errBody) {
      return [new ArgumentError('body', `error serializing body for ${method} ${path}`, { cause: errBody }), null];
    }

    const query = constructQuery({ ...descriptor.query, access_token: this.#session.token ?? '' });
    const options: TransportOptions = {
      body,
      headers: mergeHeaderOptions(descriptor.headers, { 'Content-Type': 'application/json' }),
    };

    this.#logger.debug(`${method} ${path}`);
    const [errTransport, response] = await this.#transport(method, `${path}?${query}`, options);
    if (errTransport) {
      this.#logger.debug(`${method} ${path} failed in transport: ${errTransport.message}`);
      return [errTransport, null];
    }

    this.#logger.debug(`${method} ${path} -> ${response.status}`);
    return getResponseData<ResponseType>(response);
  }

  #transport(method: HttpMethod, endpoint: string, options: TransportOptions): SafeWrapAsync<Error, TransportResponse> {
    switch (method) {
      case 'GET':
        return this.#fetchClient.get(endpoint, options);
      case 'PUT':
        return this.#fetchClient.put(endpoint, options);
      case 'POST':
        return this.#fetchClient.post(endpoint, options);
      case 'DELETE':
        return this.#fetchClient.delete(endpoint, options);
    }
  }
}
