import { describe, expect, it } from 'vitest';
import { ConstructURLError, isConstructURLError } from './constructUrlError.js';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('expect shallow to correctly return true', () => {
    const err = new ValidationError('error-validating', []);

    expect(isValidationError(err)).toBe(true);
    expect(err.message).toBe('error-validating; issues: []');
  });

  it('expect non ValidationError to return false', () => {
    expect(isValidationError(new Error('error'))).toBe(false);
  });

  it('unwraps nested validation errors', () => {
    const validationErr = new ValidationError('error-validating', [{ message: 'Required', path: ['room_id'] }]);
    const err = new Error('error', { cause: validationErr });

    expect(getValidationError(err)).toBe(validationErr);
    expect(getValidationError(err)?.issues).toEqual([{ message: 'Required', path: ['room_id'] }]);
  });
});

describe('ConstructURLError', () => {
  it('exposes the unfinished path', () => {
    const err = new ConstructURLError('bad path', '/rooms/{roomId}');

    expect(err.url).toBe('/rooms/{roomId}');
    expect(isConstructURLError(err)).toBe(true);
    expect(isConstructURLError(new Error('boom'))).toBe(false);
  });
});
