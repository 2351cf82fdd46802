/**
 * Root entrypoint: re-exports the API client, the default transport, types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client for the Client-Server API, one method per endpoint.
 */
export { MatrixHttpApi, MESSAGE_EVENT_TYPE } from './core/client.js';

/**
 * Message body builders.
 */
export { getHtmlBody, getTextBody, type HtmlBody, type TextBody } from './core/content.js';

/**
 * Request dispatch and response classification, for endpoints without a dedicated method.
 */
export { Dispatcher, type DispatcherProps } from './core/dispatcher.js';

/**
 * Per-client state: API root, token, transaction counter.
 */
export { Session, type SessionView } from './core/session.js';

export type {
  AuthResponse,
  CreateRoomResponse,
  EventStreamResponse,
  InitialSyncResponse,
  JoinRoomResponse,
  SendMessageEventResponse,
  SendStateEventResponse,
} from './core/schemas.js';

export type {
  AuthFields,
  CreateRoomOptions,
  CreateRoomRequest,
  DispatchOptions,
  EventStreamOptions,
  InitialSyncOptions,
  MatrixHttpApiProps,
} from './core/types.js';

/**
 * Default `fetch`-based transport.
 */
export { FetchClient, type FetchClientOptions } from './fetch/client.js';

export type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  HeaderOptions,
  HttpMethod,
  QueryParams,
  QueryValue,
  RequestDescriptor,
  TransportOptions,
  TransportResponse,
} from './types/request.js';

/**
 * URL helpers: API root normalization and per-segment path encoding.
 */
export { API_PREFIX, constructPath, constructQuery, normalizeBaseUrl } from './utils/constructUrl.js';

export { getDefaultLogger, LOGGER_NAME, type Logger } from './utils/logger.js';

export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './utils/wrap.js';

export * from './error/index.js';
