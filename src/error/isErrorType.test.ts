import { describe, expect, it } from 'vitest';
import { BackendError } from './backendError.js';
import { DmartError } from './dmartError.js';
import { isErrorType } from './isErrorType.js';
import { TransportError } from './transportError.js';

class CustomError extends Error {}

class DifferentError extends Error {}

class TargetError extends Error {}

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(CustomError, { foo: 'bar' })).toEqual(false);
    expect(isErrorType(CustomError, 'boom')).toEqual(false);
    expect(isErrorType(CustomError, null)).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(CustomError, new CustomError('test'))).toEqual(true);
  });

  it('expect 4 layers deep to correctly return true', () => {
    const err = new CustomError('test');
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new DifferentError('err2', { cause: wrapped1 });
    const wrapped3 = new Error('err3', { cause: wrapped2 });

    expect(isErrorType(CustomError, wrapped3)).toEqual(true);
  });

  it('expect false on wrapped different error', () => {
    const err = new DifferentError('err');
    const err1 = new Error('err1', { cause: err });

    expect(isErrorType(CustomError, err1)).toEqual(false);
  });

  it('matches subclasses against an abstract base', () => {
    const err = new BackendError(422, { type: 'validation', code: 12, message: 'bad shortname' });

    expect(isErrorType(DmartError, err)).toEqual(true);
    expect(isErrorType(TransportError, err)).toEqual(false);
  });

  it('returns true when error name matches errorClass name even if not instanceof', () => {
    const err = new Error('boom');
    Object.defineProperty(err, 'name', { value: TargetError.name });

    expect(err).not.toBeInstanceOf(TargetError);
    expect(isErrorType(TargetError, err)).toBe(true);
  });

  it('stops on cyclic causes', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    Object.defineProperty(first, 'cause', { value: second });

    expect(isErrorType(CustomError, second)).toBe(false);
  });
});
