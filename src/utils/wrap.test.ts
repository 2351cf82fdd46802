import { describe, expect, it } from 'vitest';
import { ProtocolError } from '../error/protocolError.js';
import { safeWrap, safeWrapAsync } from './wrap.js';

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => JSON.parse('{"room_id":"!abc:example.org"}'));

    expect(err).toBeNull();
    expect(data).toEqual({ room_id: '!abc:example.org' });
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => JSON.parse('not json'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });

  it('keeps the thrown error as-is', () => {
    const thrown = new ProtocolError(401, 'M_UNKNOWN_TOKEN');
    const [err] = safeWrap<ProtocolError>(() => {
      throw thrown;
    });

    expect(err).toBe(thrown);
    expect(err?.code).toBe(401);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const failure = new TypeError('fetch failed');
    const [err, data] = await safeWrapAsync(() => Promise.reject(failure));

    expect(data).toBeNull();
    expect(err).toBe(failure);
  });

  it('catches errors thrown before the promise is created', async () => {
    const [err, data] = await safeWrapAsync(() => {
      throw new Error('sync boom');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom');
  });
});
