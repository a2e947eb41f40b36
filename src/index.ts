/**
 * Library entrypoint: parse indentation-structured device configs into a line
 * tree and query it with named-group regexes.
 */
export { ConfigParser } from './tree/parser.js';
export type { InterfaceSummary, ParserOptions } from './tree/parser.js';
export type { ConfigLine, ConfigTree, GenericLine, InterfaceLine, LineKind, LineRole } from './tree/model.js';
export { ALL_GROUPS, DEFAULT_PATTERN_CACHE_SIZE, DEFAULT_PATTERN_FLAGS } from './tree/constants.js';
export { LoadError, errorDiagnostic, formatDiagnostic, outcome, warningDiagnostic } from './tree/diagnostics.js';
export type { Diagnostic, DiagnosticCode, LoadErrorCode, QueryOutcome } from './tree/diagnostics.js';
export { isBlankLine, lineIndent, normalizeIndentation, trimConfigBoundaries } from './tree/indent.js';
export type { BoundaryOptions, NormalizedLines } from './tree/indent.js';
export { buildConfigTree, parseConfigLines } from './tree/parse.js';
export {
  interfaceDescription,
  interfaceIpv4Addresses,
  interfaceIsShutdown,
  isChild,
  isInterfaceLine,
  isParent,
  lineChildren,
  lineMatches,
  lineParent,
  searchChildren,
  searchLine,
} from './tree/lines.js';
export type { InterfaceIpv4Address } from './tree/lines.js';
export { PatternCache, namedGroupNames, resolvePattern, sharedPatternCache } from './tree/patterns.js';
export type { CompiledPattern, GroupMap, PatternInput } from './tree/patterns.js';
export { findLines } from './tree/query.js';
export type { FindOptions, GroupSelector, QueryContext } from './tree/query.js';
export { resolveSection } from './tree/section.js';
export {
  autoExtractProperties,
  extractSectionProperties,
  firstCandidateOrNone,
  matchLineToDict,
} from './tree/extract.js';
export type { ExtractOptions, LineProperties, SectionExtractOptions } from './tree/extract.js';
export { loadText, splitLines } from './tree/load.js';
export type { TextSource } from './tree/load.js';
export { createStderrLogger, silentLogger } from './tree/logger.js';
export type { Logger, StderrLoggerOptions } from './tree/logger.js';
