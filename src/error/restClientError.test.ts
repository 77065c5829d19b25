import { describe, expect, it } from 'vitest';
import { CancelledError, getCancelledError, isCancelledError } from './cancelledError.js';
import { EncodingError, getEncodingError, isEncodingError } from './encodingError.js';
import { getNetworkError, isNetworkError, NetworkError } from './networkError.js';
import { getRestClientError, isRestClientError, RestClientError } from './restClientError.js';
import { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';

describe('RestClientError', () => {
  it('defaults attempts to zero', () => {
    expect(new RestClientError('error').attempts).toBe(0);
    expect(new RestClientError('error', { attempts: 3 }).attempts).toBe(3);
  });

  it('is the base of every client error', () => {
    const errors = [
      new CancelledError('error cancelled'),
      new EncodingError('error encoding', 'application/json'),
      new NetworkError('error network'),
      new TimeoutError('error timeout'),
    ];

    for (const err of errors) {
      expect(isRestClientError(err)).toBe(true);
      expect(getRestClientError(new Error('wrapper', { cause: err }))).toBe(err);
    }
  });

  it('keeps the class name on every subclass', () => {
    expect(new CancelledError('x').name).toBe('CancelledError');
    expect(new EncodingError('x', 'text/plain').name).toBe('EncodingError');
    expect(new NetworkError('x').name).toBe('NetworkError');
    expect(new TimeoutError('x').name).toBe('TimeoutError');
  });
});

describe('subclass guards', () => {
  it('match their own class only', () => {
    const timeout = new TimeoutError('error timeout');

    expect(isTimeoutError(timeout)).toBe(true);
    expect(isNetworkError(timeout)).toBe(false);
    expect(isCancelledError(timeout)).toBe(false);
    expect(isEncodingError(timeout)).toBe(false);
  });

  it('unwrap causes', () => {
    const cancelled = new CancelledError('error cancelled');
    const encoding = new EncodingError('error encoding', 'application/json');

    expect(getCancelledError(new Error('wrapper', { cause: cancelled }))).toBe(cancelled);
    expect(getEncodingError(new Error('wrapper', { cause: encoding }))?.contentType).toBe('application/json');
    expect(getTimeoutError(new Error('wrapper'))).toBeNull();
    expect(getNetworkError(cancelled)).toBeNull();
  });
});

describe('NetworkError.code', () => {
  it('finds the system error code in the cause chain', () => {
    const system = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:1'), { code: 'ECONNREFUSED' });
    const err = new NetworkError('error GET failed', { cause: new TypeError('fetch failed', { cause: system }) });

    expect(err.code).toBe('ECONNREFUSED');
  });

  it('is null without one', () => {
    expect(new NetworkError('error GET failed', { cause: new Error('reset') }).code).toBeNull();
    expect(new NetworkError('error GET failed').code).toBeNull();
  });
});
