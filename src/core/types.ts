import type { FetchClientOptions } from '../fetch/client.js';
import type { FetchClientProvider, HeaderOptions, QueryParams } from '../types/request.js';
import type { Logger } from '../utils/logger.js';

/** Configuration for constructing a {@link MatrixHttpApi}. */
export interface MatrixHttpApiProps {
  /** Home server URL (e.g. `http://localhost:8008`) or the API root itself. */
  baseUrl: string;
  /** Access token; requests are sent with an empty `access_token` while unset. */
  token?: string;
  /** HTTP transport used for requests. Defaults to the `fetch`-based `FetchClient`. */
  fetchProvider?: FetchClientProvider;
  /** Options handed to the transport (default headers, client-side timeout). */
  fetchOpts?: FetchClientOptions;
  /**
   * Validate 2xx responses against the endpoint's response schema, returning a
   * `ValidationError` on mismatch. When off, any decoded JSON is returned as-is.
   * @default false
   */
  validation?: boolean;
  /** Logger for request tracing. Defaults to the `matrix-http-api` loglevel logger. */
  logger?: Logger;
}

/** Optional parts of a dispatched request. */
export interface DispatchOptions {
  /** Any JSON-serializable value. */
  body?: unknown;
  query?: QueryParams;
  headers?: HeaderOptions;
}

/** Extra fields merged into a register or login body. */
export type AuthFields = Record<string, unknown>;

export interface InitialSyncOptions {
  /**
   * Number of messages to return per room.
   * @default 1
   */
  limit?: number;
}

export interface CreateRoomOptions {
  /** Local part of the alias to create for the room. */
  alias?: string;
  /** @default false */
  isPublic?: boolean;
  /** User IDs to invite. */
  invitees?: readonly string[];
}

export interface EventStreamOptions {
  /** Stream token to continue from. */
  from?: string;
  /**
   * How long the server may hold the request open, in milliseconds.
   * @default 30000
   */
  timeout?: number;
}

/** Body of a `createRoom` request. */
export interface CreateRoomRequest {
  visibility: 'public' | 'private';
  room_alias_name?: string;
  invite?: string[];
}
