import { ALL_GROUPS, DEFAULT_PATTERN_FLAGS } from './constants.js';
import type { QueryOutcome } from './diagnostics.js';
import { outcome } from './diagnostics.js';
import type { ConfigLine, ConfigTree } from './model.js';
import type { GroupMap, PatternCache, PatternInput } from './patterns.js';
import { execPattern, resolvePattern, toGroupMap } from './patterns.js';

/**
 * Regex queries over the flat line list.
 *
 * Every query is a linear scan in ordinal order; there is no index.
 */
export type GroupSelector = string | number;

export interface FindOptions {
  /** Flags used when `pattern` is text. Defaults to `m`. */
  flags?: string;
  /** Group name/index to return, or `'ALL'` for every named group. */
  group?: GroupSelector;
}

export interface QueryContext {
  tree: ConfigTree;
  cache: PatternCache;
}

/**
 * Value of a single group; `undefined` when the group did not participate.
 */
function selectGroup(match: RegExpExecArray, group: GroupSelector): string | undefined {
  if (typeof group === 'number') return match[group];
  return match.groups?.[group];
}

export function findLines(
  ctx: QueryContext,
  pattern: PatternInput,
  options?: { flags?: string; group?: undefined }
): QueryOutcome<ConfigLine[]>;
export function findLines(
  ctx: QueryContext,
  pattern: PatternInput,
  options: { flags?: string; group: typeof ALL_GROUPS }
): QueryOutcome<GroupMap[]>;
export function findLines(
  ctx: QueryContext,
  pattern: PatternInput,
  options: { flags?: string; group: GroupSelector }
): QueryOutcome<string[] | GroupMap[]>;
/**
 * Filter lines by `pattern`.
 *
 * - no `group`: matching lines
 * - `group` name/index: captured values (lines whose group did not participate are skipped)
 * - `group: 'ALL'`: one named-group map per matching line
 *
 * A pattern that fails to compile matches nothing and is reported in `errors`.
 */
export function findLines(
  ctx: QueryContext,
  pattern: PatternInput,
  options: FindOptions = {}
): QueryOutcome<ConfigLine[] | string[] | GroupMap[]> {
  const compiled = resolvePattern(pattern, ctx.cache, options.flags ?? DEFAULT_PATTERN_FLAGS);
  const diagnostics = compiled.error ? [compiled.error] : [];
  const regex = compiled.pattern;
  const group = options.group;

  if (group === undefined) {
    const lines: ConfigLine[] = [];
    if (regex) {
      for (const line of ctx.tree.lines) {
        if (execPattern(regex, line.text)) lines.push(line);
      }
    }
    return outcome(lines, diagnostics);
  }

  if (group === ALL_GROUPS) {
    const maps: GroupMap[] = [];
    if (regex) {
      for (const line of ctx.tree.lines) {
        const match = execPattern(regex, line.text);
        if (match) maps.push(toGroupMap(match));
      }
    }
    return outcome(maps, diagnostics);
  }

  const values: string[] = [];
  if (regex) {
    for (const line of ctx.tree.lines) {
      const match = execPattern(regex, line.text);
      if (!match) continue;
      const value = selectGroup(match, group);
      if (value !== undefined) values.push(value);
    }
  }
  return outcome(values, diagnostics);
}
