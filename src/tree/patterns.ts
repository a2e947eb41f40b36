import { DEFAULT_PATTERN_CACHE_SIZE, DEFAULT_PATTERN_FLAGS } from './constants.js';
import type { Diagnostic } from './diagnostics.js';
import { errorDiagnostic } from './diagnostics.js';

/**
 * A query pattern: regex source text (compiled through a `PatternCache`) or an
 * already compiled `RegExp`, which is used as-is.
 */
export type PatternInput = string | RegExp;

/** Named groups of one match; groups that did not participate are `null`. */
export type GroupMap = Record<string, string | null>;

export interface CompiledPattern {
  /** `null` when the source failed to compile; queries then match nothing. */
  pattern: RegExp | null;
  error?: Diagnostic;
}

/**
 * Bounded cache of compiled patterns.
 *
 * Entries are keyed by flags + source. Once `maxSize` is exceeded the oldest
 * compiled entry is evicted (insertion order, lookups do not refresh it).
 */
export class PatternCache {
  readonly maxSize: number;
  private readonly entries = new Map<string, RegExp>();

  constructor(maxSize: number = DEFAULT_PATTERN_CACHE_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`Invalid pattern cache size: ${maxSize}`);
    }
    this.maxSize = maxSize;
  }

  get size(): number {
    return this.entries.size;
  }

  has(source: string, flags: string = DEFAULT_PATTERN_FLAGS): boolean {
    return this.entries.has(cacheKey(source, flags));
  }

  /**
   * Compile `source` or return the cached pattern.
   *
   * Compile failures are not cached and come back as an error diagnostic.
   */
  compile(source: string, flags: string = DEFAULT_PATTERN_FLAGS): CompiledPattern {
    const key = cacheKey(source, flags);
    const cached = this.entries.get(key);
    if (cached) return { pattern: cached };

    let pattern: RegExp;
    try {
      pattern = new RegExp(source, flags);
    } catch (error) {
      return {
        pattern: null,
        error: errorDiagnostic(
          'PATTERN_COMPILE',
          `Error while compiling regex ${JSON.stringify(source)}: ${(error as Error | undefined)?.message ?? String(error)}`
        ),
      };
    }

    this.entries.set(key, pattern);
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return { pattern };
  }

  clear(): void {
    this.entries.clear();
  }
}

function cacheKey(source: string, flags: string): string {
  return `${flags}\u0000${source}`;
}

/**
 * Process-wide cache injected into sessions that are not given their own.
 */
export const sharedPatternCache = new PatternCache();

/**
 * Turn a `PatternInput` into a usable `RegExp` (or `null` plus an error).
 */
export function resolvePattern(
  input: PatternInput,
  cache: PatternCache,
  flags: string = DEFAULT_PATTERN_FLAGS
): CompiledPattern {
  if (input instanceof RegExp) return { pattern: input };
  return cache.compile(input, flags);
}

/**
 * Search `text` for `pattern`.
 *
 * `lastIndex` is reset first so global and sticky patterns behave like a
 * plain search on every line.
 */
export function execPattern(pattern: RegExp, text: string): RegExpExecArray | null {
  pattern.lastIndex = 0;
  return pattern.exec(text);
}

/**
 * Set one group as an own property, even for names like `__proto__`.
 */
export function setGroup(map: GroupMap, name: string, value: string | null): void {
  Object.defineProperty(map, name, { value, enumerable: true, writable: true, configurable: true });
}

/** `Object.assign` for group maps; later values win. */
export function mergeGroups(target: GroupMap, source: GroupMap): void {
  for (const [name, value] of Object.entries(source)) setGroup(target, name, value);
}

/**
 * Named groups of a match, with non-participating groups mapped to `null`.
 */
export function toGroupMap(match: RegExpExecArray): GroupMap {
  const out: GroupMap = {};
  for (const [name, value] of Object.entries(match.groups ?? {})) {
    setGroup(out, name, value ?? null);
  }
  return out;
}

/**
 * Names of the named capture groups declared by `pattern`, in source order.
 */
export function namedGroupNames(pattern: RegExp): string[] {
  // The empty alternative always matches '', and `groups` lists every name.
  const probe = new RegExp(`(?:${pattern.source})|`, pattern.flags.replace(/[gy]/g, ''));
  const groups = probe.exec('')?.groups;
  return groups ? Object.keys(groups) : [];
}

/**
 * Display form of a pattern for log messages.
 */
export function describePattern(input: PatternInput): string {
  return input instanceof RegExp ? input.toString() : JSON.stringify(input);
}
