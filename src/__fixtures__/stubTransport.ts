import type { FetchClientOptions } from '../fetch/client.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  HttpMethod,
  TransportOptions,
  TransportResponse,
} from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';

/** One request as the transport saw it. */
export interface TransportCall {
  method: HttpMethod;
  url: string;
  options: TransportOptions;
}

/** Decides what the stub answers to a call. */
export type Reply = (call: TransportCall) => SafeWrap<Error, TransportResponse>;

/** A response with the given status and body text. */
export function respond(status: number, body: string): SafeWrap<Error, TransportResponse> {
  return [null, { status, text: () => Promise.resolve(body) }];
}

/** Replies 200 with `{}` to everything. */
export const replyEmpty: Reply = () => respond(200, '{}');

/**
 * In-process transport that records every call and answers through `reply`.
 * `url` is what the dispatcher passed, i.e. path and query below the API root.
 */
export function createStubTransport(reply: Reply = replyEmpty) {
  const calls: TransportCall[] = [];
  const instances: Array<{ baseUrl: string; opts?: FetchClientOptions }> = [];
  const configured: FetchClientOptions[] = [];
  let disposed = 0;

  const handle = (method: HttpMethod) => (url: string, options: TransportOptions) => {
    const call = { method, url, options };
    calls.push(call);
    return Promise.resolve(reply(call));
  };

  class StubTransport implements FetchClientProviderDefinition {
    get = handle('GET');
    put = handle('PUT');
    post = handle('POST');
    delete = handle('DELETE');

    constructor(baseUrl: string, opts?: FetchClientOptions) {
      instances.push({ baseUrl, opts });
    }

    config(opts: FetchClientOptions) {
      configured.push(opts);
    }

    dispose() {
      disposed += 1;
    }
  }

  const provider: FetchClientProvider = StubTransport;

  return {
    provider,
    calls,
    instances,
    configured,
    disposedCount: () => disposed,
  };
}

/** Splits a recorded call url into its path and decoded query parameters. */
export function splitUrl(url: string): { path: string; query: Record<string, string> } {
  const [path = '', search = ''] = url.split('?');
  return { path, query: Object.fromEntries(new URLSearchParams(search)) };
}

/** Header value as the transport received it. */
export function headerOf(call: TransportCall | undefined, name: string): string | null {
  const headers = call?.options.headers;
  return headers instanceof Headers ? headers.get(name) : null;
}
