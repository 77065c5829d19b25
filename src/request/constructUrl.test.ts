import { describe, expect, it } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { constructUrl } from './constructUrl.js';

describe('constructUrl', () => {
  it('appends the path to the base path', () => {
    expect(constructUrl('https://api.test/v1', '/users/7')).toEqual([null, 'https://api.test/v1/users/7']);
    expect(constructUrl('https://api.test/v1/', 'users/7')).toEqual([null, 'https://api.test/v1/users/7']);
  });

  it('appends query parameters and skips empty ones', () => {
    const [err, url] = constructUrl('https://api.test/v1/', 'users', {
      page: 2,
      q: 'a b',
      skip: null,
      none: undefined,
      active: true,
    });

    expect(err).toBeNull();
    expect(url).toBe('https://api.test/v1/users?page=2&q=a+b&active=true');
  });

  it('keeps a query already in the path', () => {
    expect(constructUrl('https://api.test/v1', 'users?sort=name', { page: 1 })).toEqual([
      null,
      'https://api.test/v1/users?sort=name&page=1',
    ]);
  });

  it('accepts absolute URLs on the base origin', () => {
    expect(constructUrl('https://api.test/v1', 'https://api.test/health')).toEqual([null, 'https://api.test/health']);
  });

  it('rejects absolute URLs on another origin', () => {
    const [err, url] = constructUrl('https://api.test/v1', 'https://evil.test/steal');

    expect(url).toBeNull();
    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.message).toBe('error path escapes base origin https://api.test');
    expect(err?.url).toBe('https://evil.test/steal');
  });

  it('rejects protocol-relative paths to another host', () => {
    const [err] = constructUrl('https://api.test/v1', '//evil.test/steal');

    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.url).toBe('//evil.test/steal');
  });

  it('rejects an invalid base URL', () => {
    const [err] = constructUrl('not a url', 'users');

    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.message).toBe('error invalid base URL');
    expect(err?.cause).toBeInstanceOf(TypeError);
  });

  it('rejects a path that is not a URL', () => {
    const [err] = constructUrl('https://api.test', 'http://[');

    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.message).toBe('error constructing URL');
  });
});
