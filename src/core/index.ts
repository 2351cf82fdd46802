/**
 * Core entrypoint: the API client, its dispatcher and session, and message body helpers.
 * @module
 */
export { MatrixHttpApi, MESSAGE_EVENT_TYPE } from './client.js';
export { getHtmlBody, getTextBody, type HtmlBody, type TextBody } from './content.js';
export { Dispatcher, type DispatcherProps } from './dispatcher.js';
export type {
  AuthResponse,
  CreateRoomResponse,
  EventStreamResponse,
  InitialSyncResponse,
  JoinRoomResponse,
  SendMessageEventResponse,
  SendStateEventResponse,
} from './schemas.js';
export { Session, type SessionView } from './session.js';
export type {
  AuthFields,
  CreateRoomOptions,
  CreateRoomRequest,
  DispatchOptions,
  EventStreamOptions,
  InitialSyncOptions,
  MatrixHttpApiProps,
} from './types.js';
