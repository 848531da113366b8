import { describe, it, expect } from 'vitest';
import { compilePatterns, filterValidSelectors } from '../selectors.js';
import { extractHost, registrableDomain } from '../domain.js';

describe('filterValidSelectors', () => {
  it('drops blank and malformed selectors', () => {
    const rejected: string[] = [];
    const valid = filterValidSelectors(['article', '  ', 'div[', '.content > p'], (selector) => {
      rejected.push(selector);
    });

    expect(valid).toEqual(['article', '.content > p']);
    expect(rejected).toEqual(['  ', 'div[']);
  });
});

describe('compilePatterns', () => {
  it('compiles valid patterns and reports the rest', () => {
    const rejected: string[] = [];
    const patterns = compilePatterns(['\\.pdf$', '(unclosed'], (pattern) => {
      rejected.push(pattern);
    });

    expect(patterns.map((p) => p.source)).toEqual(['\\.pdf$']);
    expect(rejected).toEqual(['(unclosed']);
  });
});

describe('domain helpers', () => {
  it('extracts lowercase hosts', () => {
    expect(extractHost('https://Blog.Example.com/path')).toBe('blog.example.com');
    expect(extractHost('not a url')).toBeNull();
  });

  it('finds the registrable domain', () => {
    expect(registrableDomain('blog.example.co.uk')).toBe('example.co.uk');
    expect(registrableDomain('WWW.Example.com')).toBe('example.com');
    expect(registrableDomain('localhost')).toBe('localhost');
  });
});
