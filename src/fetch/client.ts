import type {
  FetchClientProviderDefinition,
  HeaderOptions,
  HttpMethod,
  TransportOptions,
  TransportResponse,
} from '../types/request.js';
import { createTimeoutSignal } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} transport. */
export interface FetchClientOptions {
  /** Headers sent with every request, below any per-request headers. */
  headers?: HeaderOptions;
  /**
   * Client-side deadline in milliseconds; the request is aborted with a `TimeoutError`.
   * Unrelated to the `timeout` query parameter of the event stream.
   * @default false
   */
  timeout?: number | false;
}

/**
 * Default transport: a thin wrapper around the native `fetch` API that
 * - prefixes all requests with the API root,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * It does not look at the status code; classification belongs to the dispatcher.
 * `fetch` refuses a payload on GET, so {@link FetchClient.get} drops the body it is given.
 * A custom `fetchProvider` receives the serialized body on every method, GET included.
 *
 * The timeout covers the whole exchange: the body is read before the timer is cleared,
 * and the response handed back holds the text already read.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** API root prepended to all request paths. */
  #baseUrl: string;
  /** Default options (headers, timeout). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request against the given endpoint. Any body is dropped.
   *
   * @param endpoint - Endpoint path below the API root, query string included.
   */
  public get(endpoint: string, opts: TransportOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('GET', endpoint, { ...opts, body: undefined });
  }

  /**
   * Executes a PUT request against the given endpoint.
   *
   * @param endpoint - Endpoint path below the API root, query string included.
   */
  public put(endpoint: string, opts: TransportOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('PUT', endpoint, opts);
  }

  /**
   * Executes a POST request against the given endpoint.
   *
   * @param endpoint - Endpoint path below the API root, query string included.
   */
  public post(endpoint: string, opts: TransportOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('POST', endpoint, opts);
  }

  /**
   * Executes a DELETE request against the given endpoint.
   *
   * @param endpoint - Endpoint path below the API root, query string included.
   */
  public delete(endpoint: string, opts: TransportOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('DELETE', endpoint, opts);
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors thrown by `fetch` or while reading the body (DNS, refused connections, TLS,
   * the timeout abort) are returned as they are, without wrapping.
   */
  async #request(method: HttpMethod, endpoint: string, opts: TransportOptions): SafeWrapAsync<Error, TransportResponse> {
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);
    const timeout = createTimeoutSignal(this.#opts.timeout);

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.constructPath(endpoint), {
        body: opts.body,
        method,
        headers,
        ...(timeout && { signal: timeout.signal }),
      }),
    );
    if (err) {
      timeout?.clear();
      return [err, null];
    }

    const [errBody, text] = await safeWrapAsync(() => res.text());
    timeout?.clear();
    if (errBody) {
      return [errBody, null];
    }

    return [null, { status: res.status, text: () => Promise.resolve(text) }];
  }

  /**
   * Joins the API root and endpoint into a single URL string.
   *
   * - Strips a leading slash from the endpoint to avoid `//` in the URL.
   */
  private constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
