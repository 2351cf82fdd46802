import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

const schemaFrom = (
  validate: (value: unknown) => StandardSchemaV1.Result<string> | Promise<StandardSchemaV1.Result<string>>,
): StandardSchemaV1<unknown, string> => ({
  '~standard': { version: 1, vendor: 'test', validate },
});

describe('validator', () => {
  it('correct schema validates to correct', async () => {
    const data = { room_id: '!abc:example.org' };
    const [err, parsed] = await validator(data, z.object({ room_id: z.string() }));

    expect(err).toBeNull();
    expect(parsed).toEqual(data);
  });

  it('keeps unknown keys on passthrough schemas', async () => {
    const data = { event_id: '$ev1', extra: true };
    const [err, parsed] = await validator(data, z.object({ event_id: z.string() }).passthrough());

    expect(err).toBeNull();
    expect(parsed).toEqual(data);
  });

  it('returns issues when data does not match', async () => {
    const [err, parsed] = await validator({}, z.object({ room_id: z.string() }));

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.issues.map((issue) => issue.path)).toEqual([['room_id']]);
  });

  it('returns error when sync validation throws', async () => {
    const [err, value] = await validator(
      {},
      schemaFrom(() => {
        throw new Error('oops');
      }),
    );

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating on validation start; issues: []');
    expect(err?.cause).toEqual(new Error('oops'));
  });

  it('returns error when async validation throws', async () => {
    const [err, value] = await validator(
      {},
      schemaFrom(() => Promise.reject(new Error('oops'))),
    );

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating async data; issues: []');
  });

  it('returns value when async validation resolves', async () => {
    const [err, value] = await validator(
      'test',
      schemaFrom((input) => Promise.resolve({ value: String(input) })),
    );

    expect(err).toBeNull();
    expect(value).toBe('test');
  });

  it('returns issues from async validation', async () => {
    const [err] = await validator(
      'test',
      schemaFrom(() => Promise.resolve({ issues: [{ message: 'nope' }] })),
    );

    expect(err?.message).toBe('error validating data; issues: [{"message":"nope"}]');
  });
});
