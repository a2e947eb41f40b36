import type { ConfigLine, ConfigTree, LineRole } from './model.js';
import type { NormalizedLines } from './indent.js';
import { normalizeIndentation } from './indent.js';

/**
 * Tree builder for normalized config lines.
 *
 * The builder is intentionally "structure-aware" rather than a config grammar.
 * It only recognizes:
 * - indentation (parent/child links)
 * - a small fixed set of structural line kinds (currently `interface`)
 *
 * Everything else is a `generic` line.
 */
const INTERFACE_LINE_RE = /^interface\s(\S+)/;

interface OpenLineFrame {
  ordinal: number;
  depth: number;
}

/**
 * Classify a normalized line and create its node (not yet linked).
 */
function createLine(ordinal: number, text: string, depth: number): ConfigLine {
  const base = { ordinal, text, depth, parent: null, children: [], roles: [] };
  const interfaceMatch = text.match(INTERFACE_LINE_RE);
  if (interfaceMatch?.[1]) {
    return { ...base, kind: 'interface', interfaceName: interfaceMatch[1] };
  }
  return { ...base, kind: 'generic' };
}

/**
 * Close open lines at the same or a deeper level than `depth`.
 *
 * After this, the top of the stack (if any) is the new line's parent.
 */
function closeLinesAtBoundary(openLines: OpenLineFrame[], depth: number): void {
  while (openLines.length > 0) {
    const top = openLines[openLines.length - 1];
    if (!top) break;
    if (top.depth < depth) break;
    openLines.pop();
  }
}

function finalizeRoles(line: ConfigLine): LineRole[] {
  const roles: LineRole[] = [];
  if (line.children.length > 0) roles.push('parent');
  if (line.parent !== null) roles.push('child');
  return roles;
}

/**
 * Build a tree from already normalized lines.
 *
 * `normalized.depths[i]` must be the depth of `normalized.lines[i]`.
 */
export function buildConfigTree(normalized: NormalizedLines): ConfigTree {
  const lines: ConfigLine[] = [];
  const roots: number[] = [];
  const openLines: OpenLineFrame[] = [];

  for (let ordinal = 0; ordinal < normalized.lines.length; ordinal += 1) {
    const text = normalized.lines[ordinal] ?? '';
    const depth = normalized.depths[ordinal] ?? 0;
    const line = createLine(ordinal, text, depth);

    closeLinesAtBoundary(openLines, depth);
    const parentFrame = openLines[openLines.length - 1];
    const parent = parentFrame ? lines[parentFrame.ordinal] : undefined;
    if (parent) {
      line.parent = parent.ordinal;
      parent.children.push(ordinal);
    } else {
      roots.push(ordinal);
    }

    lines.push(line);
    openLines.push({ ordinal, depth });
  }

  // A line only knows it is a parent once every later line has been attached.
  for (const line of lines) {
    line.roles = finalizeRoles(line);
    Object.freeze(line.children);
    Object.freeze(line.roles);
    Object.freeze(line);
  }

  return { lines: Object.freeze(lines), roots: Object.freeze(roots) };
}

/**
 * Normalize raw lines and build the tree in one step.
 */
export function parseConfigLines(rawLines: readonly string[]): ConfigTree {
  return buildConfigTree(normalizeIndentation(rawLines));
}
