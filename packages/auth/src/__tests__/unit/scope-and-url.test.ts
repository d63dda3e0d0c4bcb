import { describe, it, expect } from 'vitest';
import { normalizeScope } from '../../utils/scope/normalize-scope.js';
import { appendQuery } from '../../utils/url/append-query.js';

describe('normalizeScope', () => {
  it('should return a string unchanged', () => {
    expect(normalizeScope('read  write')).toBe('read  write');
  });

  it('should join an array with single spaces', () => {
    expect(normalizeScope(['openid', 'profile', 'email'])).toBe(
      'openid profile email',
    );
  });

  it('should join a set in insertion order', () => {
    expect(normalizeScope(new Set(['b', 'a']))).toBe('b a');
  });
});

describe('appendQuery', () => {
  it('should start a query with ?', () => {
    expect(appendQuery('https://auth.example.com/token', { a: '1' })).toBe(
      'https://auth.example.com/token?a=1',
    );
  });

  it('should extend an existing query with &', () => {
    expect(appendQuery('https://auth.example.com/token?x=0', { a: '1' })).toBe(
      'https://auth.example.com/token?x=0&a=1',
    );
  });

  it('should form-encode values', () => {
    expect(appendQuery('https://a.example.com', { scope: 'a b', r: 'x/y' })).toBe(
      'https://a.example.com?scope=a+b&r=x%2Fy',
    );
  });

  it('should leave the endpoint unchanged without parameters', () => {
    expect(appendQuery('https://auth.example.com/token', {})).toBe(
      'https://auth.example.com/token',
    );
  });
});
