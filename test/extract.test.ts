import { describe, expect, test } from 'vitest';
import { extractSectionProperties, firstCandidateOrNone, matchLineToDict } from '../src/tree/extract.js';
import { SAMPLE_CONFIG, createParser } from './helpers.js';

const IP_PATTERN = String.raw`^ ip address (?<ip>\S+) (?<mask>\S+)`;

function firstLine(parser: ReturnType<typeof createParser>['parser']) {
  const line = parser.lines[0];
  if (!line) throw new Error('expected a first line');
  return line;
}

describe('matchToDict', () => {
  test('later patterns overwrite earlier keys', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const entry = parser.matchToDict(firstLine(parser), [String.raw`^interface (?<x>\S+)`, String.raw`(?<x>\d+/\d+)`]);

    expect(entry).toEqual({ x: '0/0' });
  });

  test('sets keys of unmatched patterns to null', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const entry = parser.matchToDict(firstLine(parser), [String.raw`^interface (?<name>\S+)`, IP_PATTERN]);

    expect(entry).toEqual({ name: 'Ethernet0/0', ip: null, mask: null });
  });

  test('omits keys of unmatched patterns with minimal results', () => {
    const { parser } = createParser(SAMPLE_CONFIG, { minimalResults: true });
    const entry = parser.matchToDict(firstLine(parser), [String.raw`^interface (?<name>\S+)`, IP_PATTERN]);

    expect(entry).toEqual({ name: 'Ethernet0/0' });
  });

  test('skips patterns that do not compile', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const result = matchLineToDict(parser.context, firstLine(parser), ['(', String.raw`^interface (?<name>\S+)`]);

    expect(result.value).toEqual({ name: 'Ethernet0/0' });
    expect(result.errors.map((d) => d.code)).toEqual(['PATTERN_COMPILE']);
  });

  test('keeps a group named __proto__ as its own key', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const matched = parser.matchToDict(firstLine(parser), [String.raw`^interface (?<__proto__>\S+)`]);
    const missing = parser.matchToDict(firstLine(parser), [String.raw`^router (?<__proto__>\S+)`]);

    expect(JSON.stringify(matched)).toBe('{"__proto__":"Ethernet0/0"}');
    expect(JSON.stringify(missing)).toBe('{"__proto__":null}');
  });
});

describe('autoExtract', () => {
  test('builds one dictionary per candidate line', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const entries = parser.autoExtract('^interface', [IP_PATTERN]);

    // Patterns run against the candidate line itself, not its children.
    expect(entries).toHaveLength(2);
    expect(entries[1]).toEqual({ ip: null, mask: null });
  });

  test('extracts from the candidate text', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    expect(parser.autoExtract(String.raw`^ ip address`, [IP_PATTERN])).toEqual([
      { ip: '10.0.0.1', mask: '255.255.255.0' },
    ]);
  });

  test('returns an empty list without candidates', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    expect(parser.autoExtract('^router', [IP_PATTERN])).toEqual([]);
  });
});

describe('sectionAutoExtract', () => {
  test('merges parent groups with single matching children', () => {
    const { parser } = createParser(SAMPLE_CONFIG);

    expect(parser.sectionAutoExtract(String.raw`^interface (?<name>\S+)`, [IP_PATTERN])).toEqual([
      { name: 'Ethernet0/0', ip: '10.0.0.1', mask: '255.255.255.0' },
      { name: 'Ethernet0/1', ip: null, mask: null },
    ]);
  });

  test('omits unmatched child keys with minimal results', () => {
    const { parser } = createParser(SAMPLE_CONFIG, { minimalResults: true });

    expect(parser.sectionAutoExtract(String.raw`^interface (?<name>\S+)`, [IP_PATTERN])).toEqual([
      { name: 'Ethernet0/0', ip: '10.0.0.1', mask: '255.255.255.0' },
      { name: 'Ethernet0/1' },
    ]);
  });

  test('drops a pattern matching several children and warns', () => {
    const { parser, logger } = createParser([
      'interface Vlan10',
      ' ip address 10.0.10.1 255.255.255.0',
      ' ip address 10.0.11.1 255.255.255.0 secondary',
      ' description users',
    ]);

    const entries = parser.sectionAutoExtract(String.raw`^interface (?<name>\S+)`, [
      String.raw`^ ip address (?<ip>\S+)`,
      String.raw`^ description (?<description>.+)`,
    ]);

    expect(entries).toEqual([{ name: 'Vlan10', description: 'users' }]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  test('reports ambiguous children as warnings', () => {
    const { parser } = createParser(['interface Vlan10', ' ip helper-address 10.0.0.5', ' ip helper-address 10.0.0.6']);
    const result = extractSectionProperties(parser.context, String.raw`^interface`, [
      String.raw`^ ip helper-address (?<helper>\S+)`,
    ]);

    expect(result.value).toEqual([{}]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.code).toBe('AMBIGUOUS_CHILD_MATCH');
    expect(result.warnings[0]?.line).toBe(0);
  });

  test('pairs entries with their line and skips parent groups for a given line', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const line = firstLine(parser);
    const pairs = parser.sectionAutoExtract(line, [String.raw`^ description (?<d>.+)`], true);

    expect(pairs).toHaveLength(1);
    expect(pairs[0]?.[0]).toBe(line);
    expect(pairs[0]?.[1]).toEqual({ d: 'Test' });
  });

  test('returns an empty list without parent candidates', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    expect(parser.sectionAutoExtract('^router', [IP_PATTERN])).toEqual([]);
  });
});

describe('firstCandidateOrNone', () => {
  test('returns null for no candidates', () => {
    expect(firstCandidateOrNone([]).value).toBeNull();
  });

  test('returns the first of several candidates with a warning', () => {
    const result = firstCandidateOrNone(['a', 'b']);

    expect(result.value).toBe('a');
    expect(result.warnings).toHaveLength(1);
  });

  test('converts to a number when asked', () => {
    expect(firstCandidateOrNone(['42'], 'number').value).toBe(42);
    expect(firstCandidateOrNone(['x'], 'number').value).toBeNull();
  });

  test('is exposed on the session', () => {
    const { parser } = createParser(SAMPLE_CONFIG);
    const texts = parser.find('^interface').map((line) => line.text);

    expect(parser.firstCandidateOrNone(texts)).toBe('interface Ethernet0/0');
  });

  test('converts to a number on the session', () => {
    const { parser, logger } = createParser(['router ospf 10', 'router ospf 20']);
    const ids = parser.find('^router ospf').map((line) => line.text.slice('router ospf '.length));

    expect(parser.firstCandidateOrNone(ids, 'number')).toBe(10);
    expect(logger.warn).toHaveBeenCalledWith(
      'AMBIGUOUS_MATCH: Expected a single candidate, got 2; using the first one'
    );
  });
});
