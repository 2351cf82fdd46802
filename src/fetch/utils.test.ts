import { describe, expect, test } from 'vitest';
import { mergeHeaderOptions } from './utils.js';

describe('mergeHeaderOptions', () => {
  test('merge two-dimensional arrays', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['c', 'd']]);

    expect(merged).toEqual(new Headers({ a: 'b', c: 'd' }));
  });

  test('merge objects', () => {
    const merged = mergeHeaderOptions({ a: 'b' }, { c: 'd' });

    expect(merged).toEqual(new Headers({ a: 'b', c: 'd' }));
  });

  test('merge headers', () => {
    const merged = mergeHeaderOptions(new Headers({ a: 'b' }), new Headers({ c: 'd' }));

    expect(merged).toEqual(new Headers({ a: 'b', c: 'd' }));
  });

  test('last container takes precedence regardless of key case', () => {
    const merged = mergeHeaderOptions({ 'content-type': 'text/plain' }, undefined, {
      'Content-Type': 'application/json',
    });

    expect(merged.get('content-type')).toBe('application/json');
  });

  test('merges more than two containers', () => {
    const merged = mergeHeaderOptions({ a: '1' }, [['b', '2']], new Headers({ c: '3' }));

    expect(merged).toEqual(new Headers({ a: '1', b: '2', c: '3' }));
  });

  test('drops headers explicitly set to undefined/null', () => {
    const merged = mergeHeaderOptions({ keep: '1', remove: '0' }, { remove: null, added: '2' });

    expect(merged).toEqual(new Headers({ keep: '1', added: '2' }));
    expect(merged.get('remove')).toBeNull();
  });

  test('returns empty headers for no input', () => {
    expect([...mergeHeaderOptions().keys()]).toEqual([]);
  });
});
