import { normalizeBaseUrl } from '../utils/constructUrl.js';

/** What callers of the client may read of a {@link Session}. */
export type SessionView = Pick<Session, 'baseUrl' | 'token' | 'txnId'>;

/**
 * Per-client state: the API root, the access token and the transaction counter.
 *
 * The counter belongs to this instance only. It starts at 0, only moves forward
 * through {@link Session.nextTxnId}, and is never reset.
 */
export class Session {
  /** Normalized API root, e.g. `https://chat.example.org/_matrix/client/api/v1`. */
  readonly #baseUrl: string;
  /** Access token; `undefined` until one is set. */
  #token?: string;
  /** Next transaction ID handed out when a caller supplies none. */
  #txnId = 0;

  constructor(baseUrl: string, token?: string) {
    this.#baseUrl = normalizeBaseUrl(baseUrl);
    this.#token = token;
  }

  get baseUrl(): string {
    return this.#baseUrl;
  }

  get token(): string | undefined {
    return this.#token;
  }

  get txnId(): number {
    return this.#txnId;
  }

  /** Replaces the access token used on subsequent requests; `undefined` clears it. */
  setToken(token?: string) {
    this.#token = token;
  }

  /** Returns the current counter value and advances it by one. */
  nextTxnId(): number {
    const txnId = this.#txnId;
    this.#txnId += 1;
    return txnId;
  }
}
