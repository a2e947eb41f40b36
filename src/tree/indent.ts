import { DEFAULT_FIRST_LINE_PATTERN, DEFAULT_LAST_LINE_PATTERN } from './constants.js';
import type { Diagnostic } from './diagnostics.js';
import { errorDiagnostic } from './diagnostics.js';

/**
 * Indentation cleanup applied before the tree is built.
 *
 * Device configs are hand-edited, pasted between devices and re-indented by
 * terminals, so raw indentation is only trusted relative to the previous line.
 */
export interface NormalizedLines {
  lines: string[];
  /** Normalized depth of each entry of `lines`. */
  depths: number[];
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/** Count of leading spaces (tabs are not indentation in device configs). */
export function lineIndent(line: string): number {
  let count = 0;
  while (count < line.length && line[count] === ' ') count += 1;
  return count;
}

/**
 * Rewrite raw indentation into a unit-step depth ladder.
 *
 * - The first line is depth 0.
 * - Same raw indent as the previous line: same depth.
 * - Deeper: one level deeper.
 * - Shallower: one level shallower (never below 0), however far it dedents.
 *
 * Blank lines are dropped; they carry no indentation information.
 */
export function normalizeIndentation(rawLines: readonly string[]): NormalizedLines {
  const lines: string[] = [];
  const depths: number[] = [];

  let previousIndent = 0;
  let previousDepth = 0;

  for (const raw of rawLines) {
    if (isBlankLine(raw)) continue;

    const indent = lineIndent(raw);
    let depth: number;
    if (depths.length === 0) depth = 0;
    else if (indent === previousIndent) depth = previousDepth;
    else if (indent > previousIndent) depth = previousDepth + 1;
    else depth = Math.max(0, previousDepth - 1);

    lines.push(' '.repeat(depth) + raw.trim());
    depths.push(depth);
    previousIndent = indent;
    previousDepth = depth;
  }

  return { lines, depths };
}

export interface BoundaryOptions {
  firstLine?: string | RegExp;
  lastLine?: string | RegExp;
}

export interface TrimBoundariesResult {
  lines: string[];
  errors: Diagnostic[];
}

function toBoundaryRegex(value: string | RegExp | undefined, fallback: string): RegExp {
  if (value instanceof RegExp) return value;
  return new RegExp(value ?? fallback, 'm');
}

/**
 * Keep only the inclusive span between the first `firstLine` match and the
 * first `lastLine` match at or after it.
 *
 * Used to strip banners, prompts and command echoes around a `show running-config`
 * capture. When either boundary is missing the result is empty.
 */
export function trimConfigBoundaries(
  rawLines: readonly string[],
  options: BoundaryOptions = {}
): TrimBoundariesResult {
  let firstRe: RegExp;
  let lastRe: RegExp;
  try {
    firstRe = toBoundaryRegex(options.firstLine, DEFAULT_FIRST_LINE_PATTERN);
    lastRe = toBoundaryRegex(options.lastLine, DEFAULT_LAST_LINE_PATTERN);
  } catch (error) {
    return {
      lines: [],
      errors: [
        errorDiagnostic(
          'PATTERN_COMPILE',
          `Invalid boundary pattern: ${(error as Error | undefined)?.message ?? String(error)}`
        ),
      ],
    };
  }

  let first: number | undefined;
  let last: number | undefined;
  for (let index = 0; index < rawLines.length; index += 1) {
    const line = rawLines[index] ?? '';
    if (first === undefined) {
      firstRe.lastIndex = 0;
      if (firstRe.test(line)) first = index;
    }
    if (first !== undefined) {
      lastRe.lastIndex = 0;
      if (lastRe.test(line)) {
        last = index;
        break;
      }
    }
  }

  if (first === undefined || last === undefined) {
    return {
      lines: [],
      errors: [
        errorDiagnostic(
          'NO_VALID_CONFIG',
          first === undefined
            ? 'No valid config found: first line boundary not present'
            : 'No valid config found: last line boundary not present'
        ),
      ],
    };
  }

  return { lines: rawLines.slice(first, last + 1), errors: [] };
}
