import { describe, expect, it } from 'vitest';
import { Session } from './session.js';

describe('Session', () => {
  it('normalizes the base url once at construction', () => {
    const session = new Session('http://localhost:8008', 'test-token');

    expect(session.baseUrl).toBe('http://localhost:8008/_matrix/client/api/v1');
    expect(session.token).toBe('test-token');
  });

  it('starts without a token when none is given', () => {
    expect(new Session('http://localhost:8008').token).toBeUndefined();
  });

  it('hands out increasing transaction ids starting at 0', () => {
    const session = new Session('http://localhost:8008');

    expect(session.txnId).toBe(0);
    expect(session.nextTxnId()).toBe(0);
    expect(session.nextTxnId()).toBe(1);
    expect(session.nextTxnId()).toBe(2);
    expect(session.txnId).toBe(3);
  });

  it('keeps counters separate per session', () => {
    const first = new Session('http://localhost:8008');
    const second = new Session('http://localhost:8008');

    first.nextTxnId();
    first.nextTxnId();

    expect(second.nextTxnId()).toBe(0);
    expect(first.txnId).toBe(2);
  });

  it('replaces and clears the token', () => {
    const session = new Session('http://localhost:8008');

    session.setToken('test-token');
    expect(session.token).toBe('test-token');

    session.setToken();
    expect(session.token).toBeUndefined();
  });
});
