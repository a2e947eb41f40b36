/**
 * Parsed representation of an indentation-structured device configuration.
 *
 * Notes:
 * - Lines live in a flat arena (`ConfigTree.lines`); `ordinal` is both the
 *   position in the normalized line sequence and the arena index.
 * - `parent` and `children` hold ordinals, not object references, so a tree
 *   serializes as-is and has no reference cycles.
 * - `text` is the normalized text: `depth` spaces followed by the stripped content.
 */
export type LineRole = 'parent' | 'child';

interface ConfigLineBase {
  /**
   * 0-based position in the normalized line sequence.
   *
   * Blank input lines are dropped before normalization, so this is not the
   * input line number once the source contains blank lines.
   */
  ordinal: number;
  /** Normalized text (`depth` leading spaces + stripped content). */
  text: string;
  /** Normalized indentation level. */
  depth: number;
  /** Ordinal of the nearest preceding line with a smaller depth. */
  parent: number | null;
  /** Ordinals of direct children, in line order. */
  children: number[];
  /** Finalized once the whole tree is linked. */
  roles: LineRole[];
}

export interface GenericLine extends ConfigLineBase {
  kind: 'generic';
}

export interface InterfaceLine extends ConfigLineBase {
  kind: 'interface';
  /** Interface identifier, ex: `Ethernet0/0`, `GigabitEthernet1/0/1.100`. */
  interfaceName: string;
}

export type ConfigLine = GenericLine | InterfaceLine;

export type LineKind = ConfigLine['kind'];

export interface ConfigTree {
  lines: readonly ConfigLine[];
  /** Lines with no parent, in order. */
  roots: readonly number[];
}
