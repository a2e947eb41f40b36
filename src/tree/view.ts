import type { ConfigLine, ConfigTree, LineKind } from './model.js';
import type { GroupMap } from './patterns.js';

/**
 * View/presentation helpers for parsed configs.
 *
 * Tool/CLI output uses these stable JSON shapes instead of the arena lines, so
 * callers never see ordinal handles they would have to resolve themselves.
 *
 * Notes:
 * - Uses explicit stacks to avoid recursion depth issues on deeply nested configs.
 * - `text` is the normalized text (leading spaces = depth).
 */
export type LineTreeViewNode = {
  line: number;
  text: string;
  kind: LineKind;
  interfaceName?: string;
  children: LineTreeViewNode[];
};

export type LineFlatRow = {
  line: number;
  depth: number;
  text: string;
  kind: LineKind;
  interfaceName?: string;
  parent: number | null;
};

/**
 * Convert the tree into nested nodes, roots first, in line order.
 */
export function buildLineTreeView(tree: ConfigTree): LineTreeViewNode[] {
  const out: LineTreeViewNode[] = [];
  const stack: { line: ConfigLine; outArray: LineTreeViewNode[] }[] = [];

  // Seed the stack in reverse so we push into `out` in line order.
  for (let index = tree.roots.length - 1; index >= 0; index -= 1) {
    const line = tree.lines[tree.roots[index] ?? -1];
    if (!line) continue;
    stack.push({ line, outArray: out });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    const line = frame.line;
    const node: LineTreeViewNode = {
      line: line.ordinal,
      text: line.text.trimStart(),
      kind: line.kind,
      children: [],
    };
    if (line.kind === 'interface') node.interfaceName = line.interfaceName;

    frame.outArray.push(node);

    for (let index = line.children.length - 1; index >= 0; index -= 1) {
      const child = tree.lines[line.children[index] ?? -1];
      if (!child) continue;
      stack.push({ line: child, outArray: node.children });
    }
  }

  return out;
}

export function toLineFlatRow(line: ConfigLine): LineFlatRow {
  const row: LineFlatRow = {
    line: line.ordinal,
    depth: line.depth,
    text: line.text,
    kind: line.kind,
    parent: line.parent,
  };
  if (line.kind === 'interface') row.interfaceName = line.interfaceName;
  return row;
}

export type LinePropertiesRow = { line: LineFlatRow; properties: GroupMap };

export function toLinePropertiesRow(line: ConfigLine, properties: GroupMap): LinePropertiesRow {
  return { line: toLineFlatRow(line), properties };
}
