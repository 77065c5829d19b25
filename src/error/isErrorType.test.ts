import { describe, expect, it } from 'vitest';
import { HttpStatusError } from './httpStatusError.js';
import { isErrorType } from './isErrorType.js';
import { RestClientError } from './restClientError.js';
import { TimeoutError } from './timeoutError.js';

class CustomError extends Error {}

class DifferentError extends Error {}

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(CustomError, { foo: 'bar' })).toEqual(false);
    expect(isErrorType(CustomError, null)).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(CustomError, new CustomError('test'))).toEqual(true);
  });

  it('expect several layers deep to correctly return true', () => {
    const err = new CustomError('test');
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new DifferentError('err2', { cause: wrapped1 });
    const wrapped3 = new Error('err3', { cause: wrapped2 });

    expect(isErrorType(CustomError, wrapped3)).toEqual(true);
  });

  it('expect false on wrapped different error', () => {
    const err = new DifferentError('err');
    const wrapped = new Error('err1', { cause: err });

    expect(isErrorType(CustomError, wrapped)).toEqual(false);
  });

  it('expect same-named errors of another class to return false', () => {
    const lookalike = new Error('error request timed out');
    lookalike.name = 'TimeoutError';

    expect(isErrorType(TimeoutError, lookalike)).toEqual(false);
  });

  it('matches subclasses against their base class', () => {
    const err = new HttpStatusError({ status: 500, headers: new Headers(), body: new Uint8Array() });

    expect(isErrorType(RestClientError, new Error('wrapper', { cause: err }))).toEqual(true);
  });

  it('stops on cyclic causes', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(isErrorType(CustomError, second)).toEqual(false);
  });
});
