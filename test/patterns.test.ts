import { describe, expect, test } from 'vitest';
import { PatternCache, namedGroupNames, resolvePattern } from '../src/tree/patterns.js';

describe('PatternCache', () => {
  test('returns the cached pattern for the same source and flags', () => {
    const cache = new PatternCache();
    const first = cache.compile('^interface');
    const second = cache.compile('^interface');

    expect(second.pattern).toBe(first.pattern);
    expect(first.pattern?.flags).toBe('m');
    expect(cache.size).toBe(1);
  });

  test('keys entries by flags', () => {
    const cache = new PatternCache();
    cache.compile('^a');
    cache.compile('^a', 'i');

    expect(cache.size).toBe(2);
    expect(cache.has('^a', 'i')).toBe(true);
  });

  test('evicts the oldest compiled entry past the bound', () => {
    const cache = new PatternCache(2);
    cache.compile('a');
    cache.compile('b');
    cache.compile('a');
    cache.compile('c');

    expect(cache.size).toBe(2);
    expect(cache.has('a')).toBe(false);
    expect(cache.has('b')).toBe(true);
    expect(cache.has('c')).toBe(true);
  });

  test('reports compile errors without caching them', () => {
    const cache = new PatternCache();
    const result = cache.compile('(');

    expect(result.pattern).toBeNull();
    expect(result.error?.code).toBe('PATTERN_COMPILE');
    expect(result.error?.severity).toBe('error');
    expect(cache.size).toBe(0);
  });

  test('rejects a non-positive bound', () => {
    expect(() => new PatternCache(0)).toThrow('Invalid pattern cache size: 0');
  });

  test('empties on clear', () => {
    const cache = new PatternCache();
    cache.compile('^a');
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.has('^a')).toBe(false);
  });
});

describe('resolvePattern', () => {
  test('uses a RegExp as-is', () => {
    const cache = new PatternCache();
    const regex = /^hostname/;

    expect(resolvePattern(regex, cache).pattern).toBe(regex);
    expect(cache.size).toBe(0);
  });
});

describe('namedGroupNames', () => {
  test('lists named groups in source order', () => {
    expect(namedGroupNames(/^interface (?<name>\S+)(?: (?<rest>.*))?/)).toEqual(['name', 'rest']);
  });

  test('ignores lookbehind assertions', () => {
    expect(namedGroupNames(/(?<=a)(?<x>b)(?<!c)/)).toEqual(['x']);
  });

  test('returns no names for unnamed groups', () => {
    expect(namedGroupNames(/^(\S+) (\S+)$/)).toEqual([]);
  });

  test('works for global patterns', () => {
    expect(namedGroupNames(/(?<word>\w+)/g)).toEqual(['word']);
  });
});
