import { ALL_GROUPS, DEFAULT_PATTERN_FLAGS } from './constants.js';
import type { Diagnostic, QueryOutcome } from './diagnostics.js';
import { formatDiagnostic } from './diagnostics.js';
import type { BoundaryOptions } from './indent.js';
import { normalizeIndentation, trimConfigBoundaries } from './indent.js';
import type { InterfaceIpv4Address } from './lines.js';
import {
  interfaceDescription,
  interfaceIpv4Addresses,
  interfaceIsShutdown,
  isInterfaceLine,
  lineChildren,
  lineParent,
} from './lines.js';
import type { TextSource } from './load.js';
import { loadText } from './load.js';
import type { Logger } from './logger.js';
import { createStderrLogger } from './logger.js';
import type { ConfigLine, ConfigTree } from './model.js';
import { buildConfigTree } from './parse.js';
import type { GroupMap, PatternInput } from './patterns.js';
import { PatternCache, describePattern, sharedPatternCache } from './patterns.js';
import type { FindOptions, GroupSelector, QueryContext } from './query.js';
import { findLines } from './query.js';
import { resolveSection } from './section.js';
import type { LineProperties } from './extract.js';
import {
  autoExtractProperties,
  extractSectionProperties,
  firstCandidateOrNone,
  matchLineToDict,
} from './extract.js';

export interface ParserOptions {
  /** Logger name (default `netcfg-tree`). */
  name?: string;
  /** 1 critical .. 5 debug; ignored when `logger` is given. */
  verbosity?: number;
  logger?: Logger;
  /** Omit keys of patterns that did not match instead of setting them to `null`. */
  minimalResults?: boolean;
  /** Flags for patterns given as text (default `m`). */
  flags?: string;
  /** Keep only the `version ...` .. `end` span (or custom boundaries). */
  cleanBoundaries?: boolean | BoundaryOptions;
  /** Defaults to the process-wide `sharedPatternCache`. */
  patternCache?: PatternCache;
}

export interface InterfaceSummary {
  name: string;
  line: number;
  description: string | null;
  shutdown: boolean;
  ipv4Addresses: InterfaceIpv4Address[];
}

function isCapturedValueList(values: readonly unknown[]): values is readonly (string | null)[] {
  return values.every((value) => value === null || typeof value === 'string');
}

/**
 * A parsing session over one configuration.
 *
 * The tree is built once at construction and never changes. Query methods are
 * best-effort: they never throw, they log what degraded (compile errors,
 * ambiguous matches) and return an empty or partial result. The free functions
 * in `query.ts`, `section.ts` and `extract.ts` return the same values together
 * with the diagnostics.
 */
export class ConfigParser {
  readonly tree: ConfigTree;
  readonly logger: Logger;
  readonly minimalResults: boolean;
  readonly flags: string;
  readonly cache: PatternCache;
  /** Diagnostics produced while building the tree (ex: `NO_VALID_CONFIG`). */
  readonly diagnostics: readonly Diagnostic[];

  /** Tree + cache, for the outcome-returning free functions. */
  readonly context: QueryContext;

  private constructor(
    tree: ConfigTree,
    logger: Logger,
    options: ParserOptions,
    diagnostics: Diagnostic[]
  ) {
    this.tree = tree;
    this.logger = logger;
    this.minimalResults = options.minimalResults ?? false;
    this.flags = options.flags ?? DEFAULT_PATTERN_FLAGS;
    this.cache = options.patternCache ?? sharedPatternCache;
    this.diagnostics = diagnostics;
    this.context = { tree, cache: this.cache };
  }

  /**
   * Parse raw config lines (boundary trimming, indent normalization, tree building).
   */
  static fromLines(rawLines: readonly string[], options: ParserOptions = {}): ConfigParser {
    const logger =
      options.logger ??
      createStderrLogger({ name: options.name ?? 'netcfg-tree', verbosity: options.verbosity });
    const started = performance.now();
    const diagnostics: Diagnostic[] = [];

    let lines = rawLines;
    if (options.cleanBoundaries) {
      logger.debug('Cleaning config lines');
      const trimmed = trimConfigBoundaries(
        rawLines,
        options.cleanBoundaries === true ? {} : options.cleanBoundaries
      );
      for (const error of trimmed.errors) logger.error(error.message);
      diagnostics.push(...trimmed.errors);
      lines = trimmed.lines;
      if (trimmed.errors.length === 0) logger.info(`Loading ${lines.length} config lines.`);
    }

    const tree = buildConfigTree(normalizeIndentation(lines));
    logger.debug(
      `Created ${tree.lines.length} config lines in ${(performance.now() - started).toFixed(2)} ms.`
    );
    return new ConfigParser(tree, logger, options, diagnostics);
  }

  /**
   * Load text from a path, string or line list, then parse it.
   *
   * Throws `LoadError` when a path cannot be loaded.
   */
  static async load(source: TextSource, options: ParserOptions = {}): Promise<ConfigParser> {
    const logger =
      options.logger ??
      createStderrLogger({ name: options.name ?? 'netcfg-tree', verbosity: options.verbosity });
    const rawLines = await loadText(source, logger);
    return ConfigParser.fromLines(rawLines, { ...options, logger });
  }

  get lines(): readonly ConfigLine[] {
    return this.tree.lines;
  }

  children(line: ConfigLine): ConfigLine[] {
    return lineChildren(this.tree, line);
  }

  parent(line: ConfigLine): ConfigLine | undefined {
    return lineParent(this.tree, line);
  }

  /**
   * Log an outcome's diagnostics and return its value.
   */
  private report<T>(result: QueryOutcome<T>): T {
    for (const error of result.errors) this.logger.error(formatDiagnostic(error));
    for (const warning of result.warnings) this.logger.warn(formatDiagnostic(warning));
    return result.value;
  }

  find(pattern: PatternInput, options?: { flags?: string; group?: undefined }): ConfigLine[];
  find(pattern: PatternInput, options: { flags?: string; group: typeof ALL_GROUPS }): GroupMap[];
  find(pattern: PatternInput, options: { flags?: string; group: GroupSelector }): string[] | GroupMap[];
  /**
   * Lines matching `pattern`, or their captured values when `group` is given.
   */
  find(pattern: PatternInput, options: FindOptions = {}): ConfigLine[] | string[] | GroupMap[] {
    const flags = options.flags ?? this.flags;
    const group = options.group;
    const results =
      group === undefined
        ? this.report(findLines(this.context, pattern, { flags }))
        : this.report(findLines(this.context, pattern, { flags, group }));
    this.logger.debug(`Matched ${results.length} lines for query ${describePattern(pattern)}`);
    return results;
  }

  /**
   * Children of the line reached by matching `patterns` one level at a time.
   */
  sectionByParentChain(patterns: readonly PatternInput[]): ConfigLine[] {
    return this.report(resolveSection(this.context, patterns, { flags: this.flags }));
  }

  matchToDict(line: ConfigLine, patterns: readonly PatternInput[]): GroupMap {
    return this.report(
      matchLineToDict(this.context, line, patterns, {
        flags: this.flags,
        minimalResults: this.minimalResults,
      })
    );
  }

  autoExtract(candidatePattern: PatternInput, patterns: readonly PatternInput[]): GroupMap[] {
    return this.report(
      autoExtractProperties(this.context, candidatePattern, patterns, {
        flags: this.flags,
        minimalResults: this.minimalResults,
      })
    );
  }

  sectionAutoExtract(
    parent: ConfigLine | PatternInput,
    patterns: readonly PatternInput[],
    withNode?: false
  ): GroupMap[];
  sectionAutoExtract(
    parent: ConfigLine | PatternInput,
    patterns: readonly PatternInput[],
    withNode: true
  ): LineProperties[];
  sectionAutoExtract(
    parent: ConfigLine | PatternInput,
    patterns: readonly PatternInput[],
    withNode = false
  ): GroupMap[] | LineProperties[] {
    const options = { flags: this.flags, minimalResults: this.minimalResults };
    if (withNode) {
      return this.report(extractSectionProperties(this.context, parent, patterns, { ...options, withNode: true }));
    }
    return this.report(extractSectionProperties(this.context, parent, patterns, options));
  }

  firstCandidateOrNone<T>(candidates: readonly T[]): T | null;
  firstCandidateOrNone(candidates: readonly (string | null)[], wantedType: 'number'): number | null;
  /**
   * First element of a query result, or `null`; `'number'` converts it.
   */
  firstCandidateOrNone(candidates: readonly unknown[], wantedType?: 'number'): unknown {
    if (wantedType === 'number' && isCapturedValueList(candidates)) {
      return this.report(firstCandidateOrNone(candidates, wantedType));
    }
    return this.report(firstCandidateOrNone(candidates));
  }

  /**
   * Interface lines with the properties every automation job asks for first.
   */
  interfaces(): InterfaceSummary[] {
    const out: InterfaceSummary[] = [];
    for (const line of this.tree.lines) {
      if (!isInterfaceLine(line)) continue;
      out.push({
        name: line.interfaceName,
        line: line.ordinal,
        description: interfaceDescription(this.tree, line),
        shutdown: interfaceIsShutdown(this.tree, line),
        ipv4Addresses: interfaceIpv4Addresses(this.tree, line),
      });
    }
    return out;
  }
}
