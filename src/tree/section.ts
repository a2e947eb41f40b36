import { DEFAULT_PATTERN_FLAGS } from './constants.js';
import type { Diagnostic, QueryOutcome } from './diagnostics.js';
import { errorDiagnostic, outcome } from './diagnostics.js';
import { isParent, lineChildren, lineMatches } from './lines.js';
import type { ConfigLine } from './model.js';
import type { PatternInput } from './patterns.js';
import { describePattern, resolvePattern } from './patterns.js';
import type { QueryContext } from './query.js';

/**
 * Walk the tree by a chain of parent patterns.
 *
 * Each pattern must match exactly one parent line among the current candidates;
 * the candidates then become that line's children. Zero or several matches end
 * the walk with an empty result: ambiguity is never resolved by picking the
 * first match.
 *
 * Returns the children of the last matched line (every line for an empty chain).
 */
export function resolveSection(
  ctx: QueryContext,
  patterns: readonly PatternInput[],
  options: { flags?: string } = {}
): QueryOutcome<ConfigLine[]> {
  const diagnostics: Diagnostic[] = [];
  let section: ConfigLine[] = [...ctx.tree.lines];

  for (const input of patterns) {
    const compiled = resolvePattern(input, ctx.cache, options.flags ?? DEFAULT_PATTERN_FLAGS);
    if (compiled.error) diagnostics.push(compiled.error);

    const matched = section.filter((line) => isParent(line) && lineMatches(line, compiled.pattern));
    const [only] = matched;
    if (matched.length === 1 && only) {
      section = lineChildren(ctx.tree, only);
      continue;
    }

    diagnostics.push(
      matched.length > 1
        ? errorDiagnostic(
            'AMBIGUOUS_MATCH',
            `Multiple lines (${matched.length}) matched parent statement ${describePattern(input)}. Cannot determine config section.`,
            only?.ordinal
          )
        : errorDiagnostic(
            'AMBIGUOUS_MATCH',
            `No lines matched parent statement ${describePattern(input)}. Cannot determine config section.`
          )
    );
    return outcome([], diagnostics);
  }

  return outcome(section, diagnostics);
}
