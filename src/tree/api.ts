import { access, readdir } from 'node:fs/promises';
import { extname, relative } from 'node:path';
import type { NetcfgTreeConfig } from '../config.js';
import { ALL_GROUPS, CONFIG_FILE_EXTENSIONS } from './constants.js';
import type { Diagnostic } from './diagnostics.js';
import { autoExtractProperties, extractSectionProperties, firstCandidateOrNone } from './extract.js';
import type { Logger } from './logger.js';
import { createStderrLogger } from './logger.js';
import { ConfigParser } from './parser.js';
import type { InterfaceSummary } from './parser.js';
import type { GroupMap } from './patterns.js';
import { findLines } from './query.js';
import type { GroupSelector } from './query.js';
import { resolveSection } from './section.js';
import { isSafeId, readConfigFileLines, resolveConfigPath, resolveConfigsDir } from './storage.js';
import type { LineFlatRow, LinePropertiesRow, LineTreeViewNode } from './view.js';
import { buildLineTreeView, toLineFlatRow, toLinePropertiesRow } from './view.js';

/**
 * Public API for file-level config queries.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - the parsing session (`parser.ts`)
 * - the outcome-returning queries (`query.ts`, `section.ts`, `extract.ts`)
 *
 * The CLI and the MCP server both call into here so their behavior stays in sync.
 * Query diagnostics are returned to the caller instead of being only logged.
 */
export interface ConfigSummary {
  configId: string;
  path: string;
  hostname: string | null;
  lines: number;
  interfaces: number;
  etag: string;
}

// A type alias (not an interface) so results stay assignable to MCP structured content.
export type QueryDiagnostics = {
  errors: Diagnostic[];
  warnings: Diagnostic[];
};

const HOSTNAME_RE = /^hostname (?<hostname>\S+)/;

function createApiLogger(config: NetcfgTreeConfig): Logger {
  return createStderrLogger({ name: 'netcfg-tree', verbosity: config.verbosity });
}

/**
 * Load and parse one config file using the surface configuration.
 */
export async function openConfig(
  config: NetcfgTreeConfig,
  configId: string
): Promise<{ parser: ConfigParser; etag: string }> {
  const logger = createApiLogger(config);
  const { lines, etag } = await readConfigFileLines(config, configId, logger);
  const parser = ConfigParser.fromLines(lines, {
    logger,
    minimalResults: config.minimalResults,
    cleanBoundaries: config.cleanBoundaries,
  });
  return { parser, etag };
}

/**
 * Combine parse-time diagnostics with a query's own.
 */
function collect(parser: ConfigParser, query: QueryDiagnostics): QueryDiagnostics {
  return {
    errors: [...parser.diagnostics.filter((d) => d.severity === 'error'), ...query.errors],
    warnings: [...parser.diagnostics.filter((d) => d.severity === 'warning'), ...query.warnings],
  };
}

/**
 * Parse a `--group` style value: digits select a group by index.
 */
export function parseGroupSelector(value: string | undefined): GroupSelector | undefined {
  if (value === undefined || value === '') return undefined;
  if (/^\d+$/.test(value)) return Number(value);
  return value;
}

export interface ListConfigsOptions {
  query?: string;
}

/**
 * List config files within `config.configsDir`.
 *
 * - Only `.cfg`, `.conf` and `.txt` files are considered.
 * - Config ids are file names and are validated for safety.
 */
export async function listConfigs(
  config: NetcfgTreeConfig,
  options: ListConfigsOptions = {}
): Promise<ConfigSummary[]> {
  const configsDir = resolveConfigsDir(config);
  try {
    await access(configsDir);
  } catch {
    return [];
  }

  const query = options.query?.trim().toLowerCase() || undefined;
  const entries = await readdir(configsDir, { withFileTypes: true });
  const summaries: ConfigSummary[] = [];
  const extensions: readonly string[] = CONFIG_FILE_EXTENSIONS;

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (!extensions.includes(extname(entry.name))) continue;
    if (!isSafeId(entry.name)) continue;

    const configId = entry.name;
    const { parser, etag } = await openConfig(config, configId);
    const hostnames = findLines(parser.context, HOSTNAME_RE, { group: ALL_GROUPS }).value.map(
      (groups) => groups.hostname ?? null
    );
    const hostname = firstCandidateOrNone(hostnames).value;

    if (query) {
      const haystack = `${configId}\n${hostname ?? ''}`.toLowerCase();
      if (!haystack.includes(query)) continue;
    }

    summaries.push({
      configId,
      path: relative(config.rootDir, resolveConfigPath(config, configId)),
      hostname,
      lines: parser.lines.length,
      interfaces: parser.lines.filter((line) => line.kind === 'interface').length,
      etag,
    });
  }

  summaries.sort((a, b) => a.configId.localeCompare(b.configId));
  return summaries;
}

export interface GetConfigTreeOptions {
  configId: string;
  view?: 'tree' | 'flat';
}

export async function getConfigTree(
  config: NetcfgTreeConfig,
  options: GetConfigTreeOptions
): Promise<{ lines: LineTreeViewNode[] | LineFlatRow[]; etag: string } & QueryDiagnostics> {
  const { parser, etag } = await openConfig(config, options.configId);
  const lines =
    options.view === 'flat' ? parser.lines.map(toLineFlatRow) : buildLineTreeView(parser.tree);
  return { lines, etag, ...collect(parser, { errors: [], warnings: [] }) };
}

export interface FindInConfigOptions {
  configId: string;
  pattern: string;
  flags?: string;
  group?: GroupSelector;
}

/**
 * Lines (as flat rows) matching `pattern`, or captured values when `group` is set.
 */
export async function findInConfig(
  config: NetcfgTreeConfig,
  options: FindInConfigOptions
): Promise<{ matches: LineFlatRow[] | string[] | GroupMap[] } & QueryDiagnostics> {
  const { parser } = await openConfig(config, options.configId);
  const flags = options.flags ?? parser.flags;
  const group = options.group;

  if (group === undefined) {
    const found = findLines(parser.context, options.pattern, { flags });
    return { matches: found.value.map(toLineFlatRow), ...collect(parser, found) };
  }
  if (group === ALL_GROUPS) {
    const found = findLines(parser.context, options.pattern, { flags, group: ALL_GROUPS });
    return { matches: found.value, ...collect(parser, found) };
  }
  const found = findLines(parser.context, options.pattern, { flags, group });
  return { matches: found.value, ...collect(parser, found) };
}

export interface GetSectionOptions {
  configId: string;
  parents: string[];
}

export async function getSection(
  config: NetcfgTreeConfig,
  options: GetSectionOptions
): Promise<{ lines: LineFlatRow[] } & QueryDiagnostics> {
  const { parser } = await openConfig(config, options.configId);
  const section = resolveSection(parser.context, options.parents, { flags: parser.flags });
  return { lines: section.value.map(toLineFlatRow), ...collect(parser, section) };
}

export interface ExtractPropertiesOptions {
  configId: string;
  candidatePattern: string;
  patterns: string[];
}

export async function extractProperties(
  config: NetcfgTreeConfig,
  options: ExtractPropertiesOptions
): Promise<{ entries: GroupMap[] } & QueryDiagnostics> {
  const { parser } = await openConfig(config, options.configId);
  const extracted = autoExtractProperties(parser.context, options.candidatePattern, options.patterns, {
    flags: parser.flags,
    minimalResults: parser.minimalResults,
  });
  return { entries: extracted.value, ...collect(parser, extracted) };
}

export interface ExtractSectionEntriesOptions {
  configId: string;
  parent: string;
  patterns: string[];
  withLine?: boolean;
}

/**
 * Per-parent dictionaries built from each parent's direct children.
 */
export async function extractSectionEntries(
  config: NetcfgTreeConfig,
  options: ExtractSectionEntriesOptions
): Promise<{ entries: GroupMap[] | LinePropertiesRow[] } & QueryDiagnostics> {
  const { parser } = await openConfig(config, options.configId);
  const extracted = extractSectionProperties(parser.context, options.parent, options.patterns, {
    flags: parser.flags,
    minimalResults: parser.minimalResults,
    withNode: true,
  });
  const entries = options.withLine
    ? extracted.value.map(([line, properties]) => toLinePropertiesRow(line, properties))
    : extracted.value.map(([, properties]) => properties);
  return { entries, ...collect(parser, extracted) };
}

export async function listInterfaces(
  config: NetcfgTreeConfig,
  options: { configId: string }
): Promise<{ interfaces: InterfaceSummary[]; etag: string }> {
  const { parser, etag } = await openConfig(config, options.configId);
  return { interfaces: parser.interfaces(), etag };
}
