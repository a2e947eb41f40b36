import { describe, expect, test } from 'vitest';
import { findLines } from '../src/tree/query.js';
import { SAMPLE_CONFIG, createParser } from './helpers.js';

describe('find', () => {
  test('returns matching lines in order', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const lines = parser.find('^interface');

    expect(lines).toHaveLength(2);
    expect(lines.map((line) => line.ordinal)).toEqual([0, 3]);
  });

  test('returns an empty list when nothing matches', () => {
    const { parser, logger } = createParser(SAMPLE_CONFIG);

    expect(parser.find('^router bgp')).toEqual([]);
    expect(logger.error).not.toHaveBeenCalled();
  });

  test('returns captured values for a named group', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    expect(parser.find(String.raw`^interface (?<name>\S+)`, { group: 'name' })).toEqual([
      'Ethernet0/0',
      'Ethernet0/1',
    ]);
  });

  test('returns captured values for a group index', () => {
    const { parser } = createParser(SAMPLE_CONFIG);

    expect(parser.find(String.raw`^ ip address (\S+) (\S+)`, { group: 2 })).toEqual(['255.255.255.0']);
    expect(parser.find(String.raw`Ethernet\d`, { group: 0 })).toEqual(['Ethernet0', 'Ethernet0']);
  });

  test('skips lines whose group did not participate', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    expect(parser.find(String.raw`^interface \S+?(?<sub>\.\d+)?$`, { group: 'sub' })).toEqual([]);
  });

  test('returns every named group with ALL', () => {
    const { parser } = createParser(SAMPLE_CONFIG);

    expect(parser.find(String.raw`^interface (?<name>\S+)(?: (?<extra>.*))?`, { group: 'ALL' })).toEqual([
      { name: 'Ethernet0/0', extra: null },
      { name: 'Ethernet0/1', extra: null },
    ]);
  });

  test('applies custom flags to text patterns', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    expect(parser.find('^INTERFACE', { flags: 'i' })).toHaveLength(2);
  });

  test('gives the same answer for a global RegExp on every call', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const regex = /interface/g;

    expect(parser.find(regex)).toHaveLength(2);
    expect(parser.find(regex)).toHaveLength(2);
  });

  test('matches nothing and logs when the pattern does not compile', () => {
    const { parser, logger } = createParser(SAMPLE_CONFIG);

    expect(parser.find('(')).toEqual([]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  test('keeps a group named __proto__ as its own key', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const maps = parser.find(String.raw`^interface (?<__proto__>\S+)`, { group: 'ALL' });

    expect(maps.map((groups) => JSON.stringify(groups))).toEqual([
      '{"__proto__":"Ethernet0/0"}',
      '{"__proto__":"Ethernet0/1"}',
    ]);
    expect(Object.getPrototypeOf(maps[0])).toBe(Object.prototype);
  });
});

describe('findLines', () => {
  test('returns compile errors alongside the empty value', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const result = findLines(parser.context, '(');

    expect(result.value).toEqual([]);
    expect(result.errors.map((d) => d.code)).toEqual(['PATTERN_COMPILE']);
    expect(result.warnings).toEqual([]);
  });
});
