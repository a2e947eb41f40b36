import { describe, expect, test } from 'vitest';
import { parseConfigLines } from '../src/tree/parse.js';
import { buildLineTreeView, toLineFlatRow } from '../src/tree/view.js';
import { SAMPLE_CONFIG } from './helpers.js';

describe('buildLineTreeView', () => {
  test('nests children under their parents in line order', () => {
    expect(buildLineTreeView(parseConfigLines(SAMPLE_CONFIG))).toEqual([
      {
        line: 0,
        text: 'interface Ethernet0/0',
        kind: 'interface',
        interfaceName: 'Ethernet0/0',
        children: [
          { line: 1, text: 'description Test', kind: 'generic', children: [] },
          { line: 2, text: 'ip address 10.0.0.1 255.255.255.0', kind: 'generic', children: [] },
        ],
      },
      {
        line: 3,
        text: 'interface Ethernet0/1',
        kind: 'interface',
        interfaceName: 'Ethernet0/1',
        children: [{ line: 4, text: 'shutdown', kind: 'generic', children: [] }],
      },
    ]);
  });

  test('nests more than one level', () => {
    const view = buildLineTreeView(
      parseConfigLines(['router bgp 65000', ' address-family ipv4', '  network 192.0.2.0', 'end'])
    );

    // `end` dedents two raw levels but only one normalized level.
    expect(view.map((node) => node.text)).toEqual(['router bgp 65000']);
    expect(view[0]?.children.map((node) => node.text)).toEqual(['address-family ipv4', 'end']);
    expect(view[0]?.children[0]?.children[0]?.text).toBe('network 192.0.2.0');
  });
});

describe('toLineFlatRow', () => {
  test('keeps depth, parent and interface name', () => {
    const tree = parseConfigLines(SAMPLE_CONFIG);
    const [first, second] = tree.lines;
    if (!first || !second) throw new Error('expected lines');

    expect(toLineFlatRow(first)).toEqual({
      line: 0,
      depth: 0,
      text: 'interface Ethernet0/0',
      kind: 'interface',
      interfaceName: 'Ethernet0/0',
      parent: null,
    });
    expect(toLineFlatRow(second)).toEqual({
      line: 1,
      depth: 1,
      text: ' description Test',
      kind: 'generic',
      parent: 0,
    });
  });
});
