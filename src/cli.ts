#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * This module is intentionally tiny:
 * - Parse CLI flags into a `NetcfgTreeConfig`.
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { runStdioServer } from './server.js';
import { loadConfigFromArgs } from './config.js';

const VERSION = '0.1.0';

function printHelp(): void {
  process.stdout.write(
    [
      'netcfg-tree-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  netcfg-tree-mcp [--root <dir>] [--configs <dir>] [--minimal] [--clean] [--verbosity <1-5>]',
      '',
      'Options:',
      '  --root       Root directory (default: cwd)',
      '  --configs    Config files directory relative to root (default: configs)',
      '  --minimal    Omit keys of patterns that did not match',
      '  --clean      Keep only the "version ..." .. "end" span of each file',
      '  --verbosity  stderr log level, 1 (critical) .. 5 (debug) (default: 4)',
      '  --help       Show help',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

/**
 * Parse args and run the stdio server.
 */
async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`netcfg-tree-mcp ${VERSION}\n`);
    return;
  }

  const config = loadConfigFromArgs(argv, process.cwd());
  await runStdioServer(config);
}

await main();
