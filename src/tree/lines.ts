import type { ConfigLine, ConfigTree, InterfaceLine } from './model.js';
import type { GroupMap } from './patterns.js';
import { execPattern, toGroupMap } from './patterns.js';

/**
 * Capabilities shared by every line kind, plus the interface-specific accessors.
 *
 * Lines are plain data; everything that needs to follow `parent`/`children`
 * handles takes the tree explicitly.
 */

export function isParent(line: ConfigLine): boolean {
  return line.children.length > 0;
}

export function isChild(line: ConfigLine): boolean {
  return line.parent !== null;
}

export function isInterfaceLine(line: ConfigLine): line is InterfaceLine {
  return line.kind === 'interface';
}

export function lineChildren(tree: ConfigTree, line: ConfigLine): ConfigLine[] {
  const out: ConfigLine[] = [];
  for (const ordinal of line.children) {
    const child = tree.lines[ordinal];
    if (child) out.push(child);
  }
  return out;
}

export function lineParent(tree: ConfigTree, line: ConfigLine): ConfigLine | undefined {
  return line.parent === null ? undefined : tree.lines[line.parent];
}

/**
 * True if `pattern` matches anywhere in the line text.
 *
 * A `null` pattern (failed compile) never matches.
 */
export function lineMatches(line: ConfigLine, pattern: RegExp | null): boolean {
  if (!pattern) return false;
  return execPattern(pattern, line.text) !== null;
}

/**
 * Named groups of the first match in the line text, or `undefined` on no match.
 */
export function searchLine(line: ConfigLine, pattern: RegExp | null): GroupMap | undefined {
  if (!pattern) return undefined;
  const match = execPattern(pattern, line.text);
  return match ? toGroupMap(match) : undefined;
}

/**
 * Named-group maps of the direct children that match `pattern`, in line order.
 */
export function searchChildren(
  tree: ConfigTree,
  line: ConfigLine,
  pattern: RegExp | null
): { line: ConfigLine; groups: GroupMap }[] {
  const out: { line: ConfigLine; groups: GroupMap }[] = [];
  for (const child of lineChildren(tree, line)) {
    const groups = searchLine(child, pattern);
    if (groups) out.push({ line: child, groups });
  }
  return out;
}

const DESCRIPTION_RE = /^ description (?<description>.*\S)\s*$/;
const SHUTDOWN_RE = /^ shutdown\s*$/;
const IPV4_ADDRESS_RE =
  /^ ip address (?<address>\d{1,3}(?:\.\d{1,3}){3}) (?<mask>\d{1,3}(?:\.\d{1,3}){3})(?<secondary> secondary)?\s*$/;

export interface InterfaceIpv4Address {
  address: string;
  mask: string;
  secondary: boolean;
}

/**
 * Children of an interface line, shifted back to depth-1 text.
 *
 * Interface sub-commands are matched against ` command ...` (one leading space),
 * whatever depth the interface itself sits at.
 */
function interfaceCommands(tree: ConfigTree, line: InterfaceLine): string[] {
  return lineChildren(tree, line).map((child) => ` ${child.text.trimStart()}`);
}

export function interfaceDescription(tree: ConfigTree, line: InterfaceLine): string | null {
  for (const text of interfaceCommands(tree, line)) {
    const description = text.match(DESCRIPTION_RE)?.groups?.description;
    if (description !== undefined) return description;
  }
  return null;
}

export function interfaceIsShutdown(tree: ConfigTree, line: InterfaceLine): boolean {
  return interfaceCommands(tree, line).some((text) => SHUTDOWN_RE.test(text));
}

export function interfaceIpv4Addresses(tree: ConfigTree, line: InterfaceLine): InterfaceIpv4Address[] {
  const out: InterfaceIpv4Address[] = [];
  for (const text of interfaceCommands(tree, line)) {
    const groups = text.match(IPV4_ADDRESS_RE)?.groups;
    if (!groups?.address || !groups.mask) continue;
    out.push({ address: groups.address, mask: groups.mask, secondary: groups.secondary !== undefined });
  }
  return out;
}
