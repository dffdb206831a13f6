import { describe, it, expect } from 'vitest';
import { UrlCompositionError } from '../errors/http-client-error.js';
import { composeUrl } from './compose-url.js';

describe('composeUrl', () => {
  it('joins base and path with a single slash', () => {
    expect(composeUrl('https://api.example.com/', '/users').href).toBe(
      'https://api.example.com/users',
    );
    expect(composeUrl('https://api.example.com', 'users').href).toBe(
      'https://api.example.com/users',
    );
  });

  it('keeps a base path prefix', () => {
    expect(composeUrl('https://api.example.com/v2', '/users/1').href).toBe(
      'https://api.example.com/v2/users/1',
    );
  });

  it('uses absolute http(s) paths as-is', () => {
    expect(
      composeUrl('https://api.example.com', 'https://cdn.example.com/a.png')
        .href,
    ).toBe('https://cdn.example.com/a.png');
  });

  it('throws UrlCompositionError for a malformed base', () => {
    expect(() => composeUrl('not a url', '/users')).toThrow(
      UrlCompositionError,
    );
  });

  it('throws UrlCompositionError for a malformed absolute path', () => {
    expect(() => composeUrl('https://api.example.com', 'http://')).toThrow(
      UrlCompositionError,
    );
  });

  it('rejects non-http protocols', () => {
    expect(() => composeUrl('ftp://files.example.com', '/a.txt')).toThrow(
      "Unsupported protocol 'ftp:' in 'ftp://files.example.com/a.txt'",
    );
  });
});
