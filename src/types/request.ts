import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** HTTP methods the dispatcher will send. */
export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE';

/** Header options accepted by the dispatcher and the fetch wrapper; `null`/`undefined` removes a header. */
export type HeaderOptions = Headers | [string, string][] | Record<string, string | null | undefined>;

/** Scalar query values; `undefined` and `null` entries are skipped. */
export type QueryValue = string | number | boolean | null | undefined;

/** Query parameters for a single request. */
export type QueryParams = Record<string, QueryValue>;

/**
 * Everything needed to issue one API call. Built per call, never shared.
 */
export interface RequestDescriptor {
  method: HttpMethod;
  /** Path below the API root, with every variable segment already percent-encoded. */
  path: string;
  /** Any JSON-serializable value; absent serializes as `null`. */
  body?: unknown;
  query?: QueryParams;
  headers?: HeaderOptions;
}

/** Options handed to a transport for a single request. */
export interface TransportOptions {
  /** Serialized JSON payload. */
  body?: string;
  headers?: HeaderOptions;
}

/** The part of a response the dispatcher reads. `Response` from `fetch` satisfies it. */
export interface TransportResponse {
  status: number;
  text: () => Promise<string>;
}

/** Contract for HTTP transports used by the dispatcher. */
export interface FetchClientProviderDefinition {
  get: (url: string, options: TransportOptions) => SafeWrapAsync<Error, TransportResponse>;
  put: (url: string, options: TransportOptions) => SafeWrapAsync<Error, TransportResponse>;
  post: (url: string, options: TransportOptions) => SafeWrapAsync<Error, TransportResponse>;
  delete: (url: string, options: TransportOptions) => SafeWrapAsync<Error, TransportResponse>;
  /** Updates default options at runtime. */
  config?: (opts: FetchClientOptions) => void;
  /** Releases anything held by the transport. */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP transports. */
export interface FetchClientProvider {
  new (baseUrl: string, opts?: FetchClientOptions): FetchClientProviderDefinition;
}
