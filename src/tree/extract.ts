import { DEFAULT_PATTERN_FLAGS } from './constants.js';
import type { Diagnostic, QueryOutcome } from './diagnostics.js';
import { outcome, warningDiagnostic } from './diagnostics.js';
import { searchChildren, searchLine } from './lines.js';
import type { ConfigLine } from './model.js';
import type { CompiledPattern, GroupMap, PatternInput } from './patterns.js';
import { describePattern, mergeGroups, namedGroupNames, resolvePattern, setGroup } from './patterns.js';
import type { QueryContext } from './query.js';
import { findLines } from './query.js';

/**
 * Property extraction: merge named capture groups into one dictionary per line.
 */
export interface ExtractOptions {
  flags?: string;
  /**
   * When true, keys of a pattern that did not match are omitted.
   * Otherwise they are present with a `null` value.
   */
  minimalResults?: boolean;
}

export interface SectionExtractOptions extends ExtractOptions {
  /** Return `[line, properties]` pairs instead of bare dictionaries. */
  withNode?: boolean;
}

export type LineProperties = [ConfigLine, GroupMap];

function compileAll(
  ctx: QueryContext,
  patterns: readonly PatternInput[],
  flags: string,
  diagnostics: Diagnostic[]
): { input: PatternInput; compiled: CompiledPattern }[] {
  return patterns.map((input) => {
    const compiled = resolvePattern(input, ctx.cache, flags);
    if (compiled.error) diagnostics.push(compiled.error);
    return { input, compiled };
  });
}

/**
 * Apply the missing-match policy for one pattern.
 */
function fillMissing(entry: GroupMap, pattern: RegExp | null, minimalResults: boolean): void {
  if (minimalResults || !pattern) return;
  for (const name of namedGroupNames(pattern)) setGroup(entry, name, null);
}

function mergeLine(
  entry: GroupMap,
  line: ConfigLine,
  steps: readonly { compiled: CompiledPattern }[],
  minimalResults: boolean
): void {
  for (const { compiled: { pattern } } of steps) {
    const groups = searchLine(line, pattern);
    if (groups) mergeGroups(entry, groups);
    else fillMissing(entry, pattern, minimalResults);
  }
}

/**
 * Run `patterns` against one line, merging their named groups in order.
 *
 * Later patterns overwrite keys set by earlier ones.
 */
export function matchLineToDict(
  ctx: QueryContext,
  line: ConfigLine,
  patterns: readonly PatternInput[],
  options: ExtractOptions = {}
): QueryOutcome<GroupMap> {
  const diagnostics: Diagnostic[] = [];
  const compiled = compileAll(ctx, patterns, options.flags ?? DEFAULT_PATTERN_FLAGS, diagnostics);
  const entry: GroupMap = {};
  mergeLine(entry, line, compiled, options.minimalResults ?? false);
  return outcome(entry, diagnostics);
}

/**
 * One dictionary per line matching `candidatePattern`.
 */
export function autoExtractProperties(
  ctx: QueryContext,
  candidatePattern: PatternInput,
  patterns: readonly PatternInput[],
  options: ExtractOptions = {}
): QueryOutcome<GroupMap[]> {
  const flags = options.flags ?? DEFAULT_PATTERN_FLAGS;
  const found = findLines(ctx, candidatePattern, { flags });
  const diagnostics: Diagnostic[] = [...found.errors, ...found.warnings];
  if (found.value.length === 0) return outcome([], diagnostics);

  const compiled = compileAll(ctx, patterns, flags, diagnostics);
  const minimalResults = options.minimalResults ?? false;
  const entries = found.value.map((line) => {
    const entry: GroupMap = {};
    mergeLine(entry, line, compiled, minimalResults);
    return entry;
  });
  return outcome(entries, diagnostics);
}

export function extractSectionProperties(
  ctx: QueryContext,
  parent: ConfigLine | PatternInput,
  patterns: readonly PatternInput[],
  options?: ExtractOptions & { withNode?: false }
): QueryOutcome<GroupMap[]>;
export function extractSectionProperties(
  ctx: QueryContext,
  parent: ConfigLine | PatternInput,
  patterns: readonly PatternInput[],
  options: ExtractOptions & { withNode: true }
): QueryOutcome<LineProperties[]>;
export function extractSectionProperties(
  ctx: QueryContext,
  parent: ConfigLine | PatternInput,
  patterns: readonly PatternInput[],
  options?: SectionExtractOptions
): QueryOutcome<GroupMap[] | LineProperties[]>;
/**
 * One dictionary per parent candidate, built from its direct children.
 *
 * `parent` is a line, or a pattern selecting candidate lines (whose own named
 * groups are merged first). Each of `patterns` must match exactly one direct
 * child: no match applies the minimal-results policy; several matches are
 * reported as `AMBIGUOUS_CHILD_MATCH` and the pattern contributes nothing for
 * that parent.
 */
export function extractSectionProperties(
  ctx: QueryContext,
  parent: ConfigLine | PatternInput,
  patterns: readonly PatternInput[],
  options: SectionExtractOptions = {}
): QueryOutcome<GroupMap[] | LineProperties[]> {
  const flags = options.flags ?? DEFAULT_PATTERN_FLAGS;
  const minimalResults = options.minimalResults ?? false;
  const diagnostics: Diagnostic[] = [];

  const parentIsPattern = typeof parent === 'string' || parent instanceof RegExp;
  let candidates: ConfigLine[];
  let parentCompiled: { input: PatternInput; compiled: CompiledPattern }[] = [];
  if (parentIsPattern) {
    const found = findLines(ctx, parent, { flags });
    diagnostics.push(...found.errors, ...found.warnings);
    candidates = found.value;
    parentCompiled = compileAll(ctx, [parent], flags, []);
  } else {
    candidates = [parent];
  }
  if (candidates.length === 0) return outcome([], diagnostics);

  const compiled = compileAll(ctx, patterns, flags, diagnostics);
  const pairs: LineProperties[] = [];

  for (const candidate of candidates) {
    const entry: GroupMap = {};
    mergeLine(entry, candidate, parentCompiled, minimalResults);

    for (const { input, compiled: { pattern } } of compiled) {
      const updates = searchChildren(ctx.tree, candidate, pattern);
      const [only] = updates;
      if (updates.length === 1 && only) {
        mergeGroups(entry, only.groups);
      } else if (updates.length === 0) {
        fillMissing(entry, pattern, minimalResults);
      } else {
        diagnostics.push(
          warningDiagnostic(
            'AMBIGUOUS_CHILD_MATCH',
            `Multiple possible updates found for pattern ${describePattern(input)} on candidate ${JSON.stringify(candidate.text)}`,
            candidate.ordinal
          )
        );
      }
    }

    pairs.push([candidate, entry]);
  }

  if (options.withNode) return outcome(pairs, diagnostics);
  return outcome(
    pairs.map(([, entry]) => entry),
    diagnostics
  );
}

export function firstCandidateOrNone<T>(candidates: readonly T[]): QueryOutcome<T | null>;
export function firstCandidateOrNone(
  candidates: readonly (string | null)[],
  wantedType: 'number'
): QueryOutcome<number | null>;
/**
 * First element of a query result, or `null` when it is empty.
 *
 * With `wantedType: 'number'` the value is converted (`null` when not numeric).
 */
export function firstCandidateOrNone(
  candidates: readonly unknown[],
  wantedType?: 'number'
): QueryOutcome<unknown> {
  const diagnostics: Diagnostic[] = [];
  if (candidates.length === 0) return outcome(null);
  if (candidates.length > 1) {
    diagnostics.push(
      warningDiagnostic(
        'AMBIGUOUS_MATCH',
        `Expected a single candidate, got ${candidates.length}; using the first one`
      )
    );
  }

  const first = candidates[0] ?? null;
  if (wantedType !== 'number') return outcome(first, diagnostics);
  if (first === null || first === '') return outcome(null, diagnostics);
  const value = Number(first);
  return outcome(Number.isFinite(value) ? value : null, diagnostics);
}
