import { createHash } from 'node:crypto';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import type { NetcfgTreeConfig } from '../config.js';
import type { Logger } from './logger.js';
import { loadText } from './load.js';

/**
 * Filesystem helpers for config storage.
 *
 * Responsibilities:
 * - Validate config ids (file names) and paths.
 * - Ensure all reads stay within `config.rootDir`.
 * - Provide content hashing (etag) so callers can tell whether a dump changed.
 */
export interface ReadConfigFileResult {
  absolutePath: string;
  lines: string[];
  etag: string;
}

const SAFE_ID_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

export function isSafeId(value: string): boolean {
  return SAFE_ID_RE.test(value) && !value.includes('..');
}

export function assertSafeId(label: string, value: string): void {
  if (!isSafeId(value)) {
    throw new Error(
      `Invalid ${label}: ${JSON.stringify(value)} (expected 1..128 chars: first [A-Za-z0-9], then [A-Za-z0-9_.-])`
    );
  }
}

/**
 * Compute a stable hex-encoded SHA-256 digest.
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * We check via `relative()` rather than string prefix matching to handle path
 * normalization across platforms. Symlinks are not resolved.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }

  const parts = rel.split(sep);
  if (parts.includes('..')) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
}

/**
 * Resolve the configs directory and ensure it is inside `rootDir`.
 */
export function resolveConfigsDir(config: NetcfgTreeConfig): string {
  const rootDir = resolve(config.rootDir);
  const configsDir = resolve(rootDir, config.configsDir);
  assertPathWithinRoot(rootDir, configsDir);
  return configsDir;
}

/**
 * Resolve a config file path for a given config id (its file name).
 */
export function resolveConfigPath(config: NetcfgTreeConfig, configId: string): string {
  assertSafeId('configId', configId);
  const configsDir = resolveConfigsDir(config);
  const absolutePath = resolve(configsDir, configId);
  assertPathWithinRoot(resolve(config.rootDir), absolutePath);
  return absolutePath;
}

/**
 * Read a config file into raw lines and compute its etag.
 *
 * Throws `LoadError` when the file is missing or not a regular file.
 */
export async function readConfigFileLines(
  config: NetcfgTreeConfig,
  configId: string,
  logger: Logger
): Promise<ReadConfigFileResult> {
  const absolutePath = resolveConfigPath(config, configId);
  const lines = await loadText({ path: absolutePath }, logger);
  return { absolutePath, lines, etag: sha256Hex(lines.join('\n')) };
}
