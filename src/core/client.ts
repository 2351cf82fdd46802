import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ArgumentError } from '../error/argumentError.js';
import { type FetchClientOptions, FetchClient } from '../fetch/client.js';
import type { FetchClientProviderDefinition, HttpMethod } from '../types/request.js';
import { constructPath } from '../utils/constructUrl.js';
import { getDefaultLogger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { getHtmlBody, getTextBody, type HtmlBody, type TextBody } from './content.js';
import { Dispatcher } from './dispatcher.js';
import {
  type AuthResponse,
  authResponse,
  type CreateRoomResponse,
  createRoomResponse,
  type EventStreamResponse,
  eventStreamResponse,
  type InitialSyncResponse,
  initialSyncResponse,
  type JoinRoomResponse,
  joinRoomResponse,
  type SendMessageEventResponse,
  type SendStateEventResponse,
  sendMessageEventResponse,
  sendStateEventResponse,
} from './schemas.js';
import { Session, type SessionView } from './session.js';
import type {
  AuthFields,
  CreateRoomOptions,
  CreateRoomRequest,
  DispatchOptions,
  EventStreamOptions,
  InitialSyncOptions,
  MatrixHttpApiProps,
} from './types.js';

/** Event type of chat messages. */
export const MESSAGE_EVENT_TYPE = 'm.room.message';

/**
 * Raw Client-Server API calls, one method per endpoint.
 *
 * Every method resolves to an error-first tuple and never throws for an expected failure.
 * For room and sync handling, build on top of this class.
 *
 * @example
 * const api = new MatrixHttpApi({ baseUrl: 'https://chat.example.org', token: 'test-token' });
 * const [err, sync] = await api.initialSync();
 * const [errSend, sent] = await api.sendMessage('!roomid:example.org', 'Hello!');
 */
export class MatrixHttpApi {
  /** Base URL, token and transaction counter. */
  #session: Session;
  /** Transport instance, kept for runtime config and disposal. */
  #fetchClient: FetchClientProviderDefinition;
  /** Request dispatch and response classification. */
  #dispatcher: Dispatcher;
  /** Whether 2xx responses are checked against their endpoint schema; off by default. */
  #validation: boolean;

  constructor({
    baseUrl,
    token,
    fetchProvider = FetchClient,
    fetchOpts,
    validation = false,
    logger = getDefaultLogger(),
  }: MatrixHttpApiProps) {
    this.#session = new Session(baseUrl, token);
    this.#fetchClient = new fetchProvider(this.#session.baseUrl, fetchOpts);
    this.#dispatcher = new Dispatcher({ session: this.#session, fetchClient: this.#fetchClient, logger });
    this.#validation = validation;
  }

  /** Session state: API root, current token, next transaction ID. Read-only. */
  get session(): SessionView {
    return this.#session;
  }

  /** Switches the access token for subsequent calls, e.g. to the one returned by {@link login}. */
  setToken(token?: string) {
    this.#session.setToken(token);
  }

  /**
   * Updates transport options (default headers, timeout) at runtime.
   * No effect on transports without a `config` method.
   */
  config(opts: FetchClientOptions) {
    this.#fetchClient.config?.(opts);
  }

  /** Releases the transport, for transports that hold resources. */
  dispose() {
    this.#fetchClient.dispose?.();
  }

  /**
   * Performs `GET /initialSync`.
   */
  initialSync({ limit = 1 }: InitialSyncOptions = {}): SafeWrapAsync<Error, InitialSyncResponse> {
    return this.#execute(initialSyncResponse, 'GET', '/initialSync', { query: { limit } });
  }

  /**
   * Performs `POST /register`.
   *
   * @param loginType - Value for the `type` key.
   * @param fields - Extra keys for the body. `type` is always `loginType`, even if `fields` has one.
   */
  register(loginType: string, fields: AuthFields = {}): SafeWrapAsync<Error, AuthResponse> {
    return this.#execute(authResponse, 'POST', '/register', { body: { ...fields, type: loginType } });
  }

  /**
   * Performs `POST /login`. Same body shape as {@link register}.
   * The returned token is not applied; pass it to {@link setToken}.
   */
  login(loginType: string, fields: AuthFields = {}): SafeWrapAsync<Error, AuthResponse> {
    return this.#execute(authResponse, 'POST', '/login', { body: { ...fields, type: loginType } });
  }

  /**
   * Performs `POST /createRoom`. `room_alias_name` and `invite` are only sent when non-empty.
   */
  createRoom(opts: CreateRoomOptions = {}): SafeWrapAsync<Error, CreateRoomResponse> {
    const { alias, isPublic = false, invitees = [] } = opts;
    const body: CreateRoomRequest = { visibility: isPublic ? 'public' : 'private' };
    if (alias) {
      body.room_alias_name = alias;
    }
    if (invitees.length > 0) {
      body.invite = [...invitees];
    }

    return this.#execute(createRoomResponse, 'POST', '/createRoom', { body });
  }

  /**
   * Performs `POST /join/{roomIdOrAlias}`.
   * An empty or missing identifier returns an {@link ArgumentError} without any request.
   */
  async joinRoom(roomIdOrAlias?: string | null): SafeWrapAsync<Error, JoinRoomResponse> {
    if (!roomIdOrAlias) {
      return [new ArgumentError('roomIdOrAlias', 'No alias or room ID to join.'), null];
    }

    const [errPath, path] = constructPath('/join/{roomIdOrAlias}', { roomIdOrAlias });
    if (errPath) {
      return [errPath, null];
    }

    return this.#execute(joinRoomResponse, 'POST', path);
  }

  /**
   * Performs `GET /events`. `timeout` is a hint for how long the server may hold the
   * request; the call still waits for the response.
   */
  eventStream({ from, timeout = 30_000 }: EventStreamOptions = {}): SafeWrapAsync<Error, EventStreamResponse> {
    return this.#execute(eventStreamResponse, 'GET', '/events', { query: { from, timeout } });
  }

  /**
   * Performs `PUT /rooms/{roomId}/state/{eventType}[/{stateKey}]`.
   * The state key segment is only added when `stateKey` is non-empty.
   */
  async sendStateEvent(
    roomId: string,
    eventType: string,
    content: Record<string, unknown>,
    stateKey = '',
  ): SafeWrapAsync<Error, SendStateEventResponse> {
    const template = stateKey ? '/rooms/{roomId}/state/{eventType}/{stateKey}' : '/rooms/{roomId}/state/{eventType}';
    const [errPath, path] = constructPath(template, { roomId, eventType, stateKey });
    if (errPath) {
      return [errPath, null];
    }

    return this.#execute(sendStateEventResponse, 'PUT', path, { body: content });
  }

  /**
   * Performs `PUT /rooms/{roomId}/send/{eventType}/{txnId}`.
   *
   * @param txnId - Transaction ID for deduplication. When omitted, the session counter is
   * used and advanced. An explicit `0` is sent as `0` and leaves the counter alone.
   */
  async sendMessageEvent(
    roomId: string,
    eventType: string,
    content: Record<string, unknown>,
    txnId?: string | number,
  ): SafeWrapAsync<Error, SendMessageEventResponse> {
    const [errPath, path] = constructPath('/rooms/{roomId}/send/{eventType}/{txnId}', {
      roomId,
      eventType,
      txnId: txnId ?? this.#session.nextTxnId(),
    });
    if (errPath) {
      return [errPath, null];
    }

    return this.#execute(sendMessageEventResponse, 'PUT', path, { body: content });
  }

  /**
   * Sends `text` as an `m.room.message` with msgtype `m.text`.
   */
  sendMessage(roomId: string, text: string): SafeWrapAsync<Error, SendMessageEventResponse> {
    return this.sendMessageEvent(roomId, MESSAGE_EVENT_TYPE, this.getTextBody(text));
  }

  /**
   * Sends `html` as an `m.room.message`, with a tag-stripped plain-text fallback.
   */
  sendHtmlMessage(roomId: string, html: string): SafeWrapAsync<Error, SendMessageEventResponse> {
    return this.sendMessageEvent(roomId, MESSAGE_EVENT_TYPE, this.getHtmlBody(html));
  }

  getTextBody(text: string): TextBody {
    return getTextBody(text);
  }

  getHtmlBody(html: string): HtmlBody {
    return getHtmlBody(html);
  }

  /**
   * Dispatches a request and, when validation is on, checks the decoded body against `schema`.
   * With validation off the decoded JSON is returned as the server sent it.
   */
  async #execute<Schema extends StandardSchemaV1>(
    schema: Schema,
    method: HttpMethod,
    path: string,
    opts?: DispatchOptions,
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<Schema>> {
    const [err, data] = await this.#dispatcher.send<StandardSchemaV1.InferOutput<Schema>>(method, path, opts);
    if (err) {
      return [err, null];
    }

    if (!this.#validation) {
      return [null, data];
    }

    return validator(data, schema);
  }
}
