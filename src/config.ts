import { resolve } from 'node:path';
import { DEFAULT_CONFIGS_DIR, DEFAULT_VERBOSITY } from './tree/constants.js';

/**
 * Runtime configuration for locating and querying config files.
 *
 * `rootDir` is treated as a trust boundary: config paths must resolve within it.
 */
export interface NetcfgTreeConfig {
  rootDir: string;
  configsDir: string;
  /** Omit keys of patterns that did not match instead of setting them to `null`. */
  minimalResults?: boolean;
  /** Keep only the `version ...` .. `end` span of each file. */
  cleanBoundaries?: boolean;
  /** 1 critical .. 5 debug (logs go to stderr). */
  verbosity?: number;
}

export function parseVerbosity(value: string): number {
  const verbosity = Number(value);
  if (!Number.isInteger(verbosity) || verbosity < 1 || verbosity > 5) {
    throw new Error(`Invalid --verbosity: ${JSON.stringify(value)} (expected 1..5)`);
  }
  return verbosity;
}

/**
 * Parse CLI args into a `NetcfgTreeConfig`.
 *
 * Supported flags:
 * - `--root <dir>`: filesystem root (defaults to `cwd`).
 * - `--configs <dir>`: configs directory relative to root (defaults to `configs`).
 * - `--minimal`: omit keys of patterns that did not match.
 * - `--clean`: trim each file to its `version` .. `end` span.
 * - `--verbosity <1-5>`: stderr log level (defaults to 4).
 */
export function loadConfigFromArgs(argv: string[], cwd: string): NetcfgTreeConfig {
  const args = [...argv];

  let rootDir = cwd;
  let configsDir = DEFAULT_CONFIGS_DIR;
  let minimalResults = false;
  let cleanBoundaries = false;
  let verbosity = DEFAULT_VERBOSITY;

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--root') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --root');
      rootDir = resolve(cwd, value);
      continue;
    }

    if (flag === '--configs') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --configs');
      configsDir = value;
      continue;
    }

    if (flag === '--verbosity') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --verbosity');
      verbosity = parseVerbosity(value);
      continue;
    }

    if (flag === '--minimal') {
      minimalResults = true;
      continue;
    }

    if (flag === '--clean') {
      cleanBoundaries = true;
      continue;
    }

    throw new Error(`Unknown argument: ${flag}`);
  }

  return { rootDir, configsDir, minimalResults, cleanBoundaries, verbosity };
}
