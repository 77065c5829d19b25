import { describe, expect, it } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { EncodingError } from '../error/encodingError.js';
import { HeaderError } from '../error/headerError.js';
import { buildRequest, type RequestDefaults } from './buildRequest.js';
import { attemptHeaders } from './headers.js';

const defaults: RequestDefaults = {
  baseUrl: 'https://api.test/v1',
  headers: { 'X-Team': 'billing' },
  auth: { type: 'bearer', token: 'test-secret' },
};

describe('buildRequest', () => {
  it('layers accept, configured, auth and call headers', () => {
    const [err, spec] = buildRequest(defaults, { method: 'GET', path: '/users', headers: { 'x-trace': 'abc' } });

    expect(err).toBeNull();
    expect(spec).toEqual({
      method: 'GET',
      url: 'https://api.test/v1/users',
      headers: {
        accept: 'application/json',
        authorization: 'Bearer test-secret',
        'x-team': 'billing',
        'x-trace': 'abc',
      },
    });
  });

  it('lets call headers win case-insensitively and remove defaults with null', () => {
    const [, spec] = buildRequest(defaults, {
      method: 'GET',
      path: 'users',
      headers: { AUTHORIZATION: 'Bearer other', Accept: null, 'x-team': 'payments' },
    });

    expect(spec?.headers).toEqual({ authorization: 'Bearer other', 'x-team': 'payments' });
  });

  it('encodes basic and custom header credentials', () => {
    const [, basic] = buildRequest(
      { baseUrl: 'https://api.test', headers: {}, auth: { type: 'basic', username: 'svc', password: 'test-secret' } },
      { method: 'GET', path: 'me' },
    );
    expect(basic?.headers.authorization).toBe('Basic c3ZjOnRlc3Qtc2VjcmV0');

    const [, custom] = buildRequest(
      { baseUrl: 'https://api.test', headers: {}, auth: { type: 'header', name: 'X-Api-Key', value: 'test-secret' } },
      { method: 'GET', path: 'me' },
    );
    expect(custom?.headers['x-api-key']).toBe('test-secret');
  });

  it('serializes a JSON body and sets its content type', () => {
    const [, spec] = buildRequest(defaults, { method: 'POST', path: 'widgets', body: { name: 'widget' } });

    expect(spec?.body).toBe('{"name":"widget"}');
    expect(spec?.headers['content-type']).toBe('application/json');
  });

  it('honours a declared content type', () => {
    const [, spec] = buildRequest(defaults, {
      method: 'PUT',
      path: 'notes/1',
      headers: { 'Content-Type': 'text/plain' },
      body: 'hello',
    });

    expect(spec?.body).toBe('hello');
    expect(spec?.headers['content-type']).toBe('text/plain');
  });

  it('leaves body and content type out when there is no body', () => {
    const [, spec] = buildRequest(defaults, { method: 'DELETE', path: 'widgets/1' });

    expect(spec && 'body' in spec).toBe(false);
    expect(spec?.headers['content-type']).toBeUndefined();
  });

  it('returns a frozen spec', () => {
    const [, spec] = buildRequest(defaults, { method: 'GET', path: 'users' });

    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec?.headers)).toBe(true);
  });

  it('fails with an EncodingError for bodies that cannot be serialized', () => {
    const [err, spec] = buildRequest(defaults, { method: 'POST', path: 'widgets', body: { n: 1n } });

    expect(spec).toBeNull();
    expect(err).toBeInstanceOf(EncodingError);
  });

  it('fails with a ConstructURLError for paths off the base origin', () => {
    const [err] = buildRequest(defaults, { method: 'GET', path: 'https://evil.test/' });

    expect(err).toBeInstanceOf(ConstructURLError);
  });

  it('fails with a HeaderError for an invalid header name', () => {
    const [err, spec] = buildRequest(defaults, { method: 'GET', path: 'users', headers: { 'bad header': 'v' } });

    expect(spec).toBeNull();
    expect(err).toBeInstanceOf(HeaderError);
    expect(err?.message).toBe('error invalid header "bad header"');
    expect(err instanceof HeaderError && err.header).toBe('bad header');
    expect(err?.cause).toBeInstanceOf(TypeError);
  });

  it('fails with a HeaderError for a configured header value with a line break', () => {
    const [err] = buildRequest({ ...defaults, headers: { 'x-a': 'a\nb' } }, { method: 'GET', path: 'users' });

    expect(err).toBeInstanceOf(HeaderError);
    expect(err?.message).toBe('error invalid header "x-a"');
  });

  it('copies byte bodies so later writes to the source do not reach the request', () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const [, spec] = buildRequest(defaults, { method: 'PUT', path: 'blobs/1', body: bytes });

    bytes[0] = 9;

    expect(spec?.body).toEqual(new Uint8Array([1, 2, 3]));
    expect(spec?.body).not.toBe(bytes);
    expect(spec?.headers['content-type']).toBe('application/octet-stream');
  });
});

describe('attemptHeaders', () => {
  it('gives every attempt its own equal copy', () => {
    const [, spec] = buildRequest(defaults, {
      method: 'POST',
      path: 'payments',
      headers: { 'Idempotency-Key': 'key-1' },
      body: { amount: 5 },
    });
    if (!spec) {
      throw new Error('expected a request');
    }

    const first = attemptHeaders(spec);
    const second = attemptHeaders(spec);
    first.set('idempotency-key', 'changed');

    expect(first).not.toBe(second);
    expect(second.get('idempotency-key')).toBe('key-1');
    expect(attemptHeaders(spec).get('idempotency-key')).toBe('key-1');
  });
});
