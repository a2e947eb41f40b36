#!/usr/bin/env node

/**
 * `netcfg-tree` - local CLI for querying device configuration files.
 *
 * This CLI is a first-class interface alongside the stdio server. Both share
 * the same file-level API so behavior stays in sync.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { NetcfgTreeConfig } from './config.js';
import { parseVerbosity } from './config.js';
import {
  extractProperties,
  extractSectionEntries,
  findInConfig,
  getConfigTree,
  getSection,
  listConfigs,
  listInterfaces,
  parseGroupSelector,
} from './tree/api.js';
import { DEFAULT_CONFIGS_DIR, DEFAULT_VERBOSITY } from './tree/constants.js';

type TreeView = 'tree' | 'flat';

export interface NetcfgIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Render CLI help text.
 *
 * Keep this stable and human-readable: tests and users often depend on it.
 */
function helpText(defaultRoot: string): string {
  return [
    'netcfg-tree - query indentation-structured device configs',
    '',
    'Usage:',
    '  netcfg-tree [--root <dir>] [--configs <dir>] [--minimal] [--clean] [--verbosity <1-5>] <cmd>',
    '',
    'Commands:',
    '  netcfg-tree list [--query <text>]',
    '  netcfg-tree tree <configId> [--view tree|flat]',
    '  netcfg-tree find <configId> --pattern <regex> [--flags <flags>] [--group <name|index|ALL>]',
    '  netcfg-tree section <configId> --parent <regex> [--parent <regex> ...]',
    '  netcfg-tree extract <configId> --candidate <regex> --pattern <regex> [--pattern <regex> ...]',
    '  netcfg-tree section-extract <configId> --parent <regex> --pattern <regex> [--pattern <regex> ...] [--with-line]',
    '  netcfg-tree interfaces <configId>',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot} --configs=${DEFAULT_CONFIGS_DIR} --verbosity=${DEFAULT_VERBOSITY}`,
    '  <configId> is a file name inside the configs directory (ex: edge-1.cfg).',
    '  Patterns are JavaScript regular expressions; named groups use (?<name>...).',
    '  Output: JSON to stdout; logs and errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: NetcfgIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

/**
 * Write a JSON value to stdout (pretty-printed).
 */
function writeJson(io: NetcfgIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 *
 * Returns true if the flag was present and removed.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

/**
 * Consume every occurrence of a repeatable option, in argv order.
 */
function takeOptions(argv: string[], flag: string): string[] {
  const values: string[] = [];
  for (;;) {
    const value = takeOption(argv, flag);
    if (value === undefined) return values;
    values.push(value);
  }
}

/**
 * Ensure there are no remaining `--unknown` flags in argv.
 *
 * Commands should call this after consuming all expected flags/options.
 */
function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

function parseView(value: string | undefined): TreeView | undefined {
  if (!value) return undefined;
  if (value === 'tree' || value === 'flat') return value;
  throw new Error(`Invalid --view: ${JSON.stringify(value)}`);
}

/**
 * Parse global CLI options into an API config object.
 *
 * Commands share the same config shape as the MCP server.
 */
function takeCliConfig(argv: string[], defaultRoot: string): NetcfgTreeConfig {
  let rootDir = defaultRoot;
  const rootArg = takeOption(argv, '--root');
  if (rootArg) rootDir = resolvePath(defaultRoot, rootArg);

  const configsDir = takeOption(argv, '--configs') ?? DEFAULT_CONFIGS_DIR;
  const verbosityArg = takeOption(argv, '--verbosity');
  const verbosity = verbosityArg ? parseVerbosity(verbosityArg) : DEFAULT_VERBOSITY;
  const minimalResults = takeFlag(argv, '--minimal');
  const cleanBoundaries = takeFlag(argv, '--clean');

  return { rootDir, configsDir, minimalResults, cleanBoundaries, verbosity };
}

function requireConfigId(configId: string | undefined): string {
  if (!configId) throw new Error('Missing <configId>');
  return configId;
}

/**
 * Execute one command; `argv` starts after the command name.
 */
async function handleCommand(
  config: NetcfgTreeConfig,
  cmd: string,
  argv: string[],
  io: NetcfgIo
): Promise<number> {
  if (cmd === 'list') {
    const query = takeOption(argv, '--query');
    assertNoUnknownFlags(argv);
    const configs = await listConfigs(config, { query });
    writeJson(io, { configs });
    return 0;
  }

  if (cmd === 'tree') {
    const configId = argv.shift();
    const view = parseView(takeOption(argv, '--view'));
    assertNoUnknownFlags(argv);
    writeJson(io, await getConfigTree(config, { configId: requireConfigId(configId), view }));
    return 0;
  }

  if (cmd === 'find') {
    const configId = argv.shift();
    const pattern = takeOption(argv, '--pattern');
    const flags = takeOption(argv, '--flags');
    const group = parseGroupSelector(takeOption(argv, '--group'));
    assertNoUnknownFlags(argv);
    if (!pattern) throw new Error('Missing --pattern');
    writeJson(io, await findInConfig(config, { configId: requireConfigId(configId), pattern, flags, group }));
    return 0;
  }

  if (cmd === 'section') {
    const configId = argv.shift();
    const parents = takeOptions(argv, '--parent');
    assertNoUnknownFlags(argv);
    if (parents.length === 0) throw new Error('Missing --parent');
    writeJson(io, await getSection(config, { configId: requireConfigId(configId), parents }));
    return 0;
  }

  if (cmd === 'extract') {
    const configId = argv.shift();
    const candidatePattern = takeOption(argv, '--candidate');
    const patterns = takeOptions(argv, '--pattern');
    assertNoUnknownFlags(argv);
    if (!candidatePattern) throw new Error('Missing --candidate');
    if (patterns.length === 0) throw new Error('Missing --pattern');
    writeJson(
      io,
      await extractProperties(config, { configId: requireConfigId(configId), candidatePattern, patterns })
    );
    return 0;
  }

  if (cmd === 'section-extract') {
    const configId = argv.shift();
    const parent = takeOption(argv, '--parent');
    const patterns = takeOptions(argv, '--pattern');
    const withLine = takeFlag(argv, '--with-line');
    assertNoUnknownFlags(argv);
    if (!parent) throw new Error('Missing --parent');
    if (patterns.length === 0) throw new Error('Missing --pattern');
    writeJson(
      io,
      await extractSectionEntries(config, {
        configId: requireConfigId(configId),
        parent,
        patterns,
        withLine,
      })
    );
    return 0;
  }

  if (cmd === 'interfaces') {
    const configId = argv.shift();
    assertNoUnknownFlags(argv);
    writeJson(io, await listInterfaces(config, { configId: requireConfigId(configId) }));
    return 0;
  }

  throw new Error(`Unknown command: ${cmd}`);
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`. This keeps the CLI
 * testable without relying on spawning child processes.
 */
export async function runNetcfgCli(
  args: string[],
  io: NetcfgIo = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const argv = [...args];
  const defaultRoot = process.cwd();

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io, defaultRoot);
      return 0;
    }

    const config = takeCliConfig(argv, defaultRoot);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, defaultRoot);
      return 0;
    }

    return await handleCommand(config, cmd, argv, io);
  } catch (error) {
    io.stderr.write(`${(error as Error | undefined)?.message || String(error)}\n`);
    io.stderr.write('\n');
    writeHelp(io, defaultRoot);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runNetcfgCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
