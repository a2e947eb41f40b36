/**
 * Defaults shared by the parser session, the CLI and the MCP server.
 */

/**
 * Flags applied when a pattern is given as text.
 *
 * Lines are queried one at a time, so `m` only matters for callers that pass
 * multi-line text through the extractor helpers.
 */
export const DEFAULT_PATTERN_FLAGS = 'm';

/** Upper bound on compiled patterns kept by a `PatternCache`. */
export const DEFAULT_PATTERN_CACHE_SIZE = 1024;

/** Sentinel `group` value: return every named group of each match. */
export const ALL_GROUPS = 'ALL';

export const DEFAULT_FIRST_LINE_PATTERN = String.raw`^version \d+\.\d+`;
export const DEFAULT_LAST_LINE_PATTERN = '^end';

/**
 * Default directory (relative to `rootDir`) where configuration files live.
 */
export const DEFAULT_CONFIGS_DIR = 'configs';

/** File extensions treated as configuration dumps. */
export const CONFIG_FILE_EXTENSIONS = ['.cfg', '.conf', '.txt'] as const;

/** 1 critical, 2 error, 3 warning, 4 info, 5 debug. */
export const DEFAULT_VERBOSITY = 4;
