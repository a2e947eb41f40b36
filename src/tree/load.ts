import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { LoadError } from './diagnostics.js';
import type { Logger } from './logger.js';

/**
 * Where configuration text comes from:
 * - `{ path }`: a file on disk
 * - a string: the whole configuration
 * - an array: the configuration lines
 */
export type TextSource = { path: string } | string | readonly string[];

/**
 * Split text into lines, without a trailing empty line for a final newline.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (text.endsWith('\n') && lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function isEnoent(error: unknown): boolean {
  return (error as NodeJS.ErrnoException | undefined)?.code === 'ENOENT';
}

/**
 * Read a config file, mapping filesystem failures to `LoadError`.
 */
export async function readConfigFile(path: string, logger: Logger): Promise<string> {
  const absolutePath = resolve(path);

  let isFile: boolean;
  try {
    isFile = (await stat(absolutePath)).isFile();
  } catch (error) {
    if (isEnoent(error)) {
      logger.error(`Path '${path}' does not exist.`);
      throw new LoadError('LOAD_NOT_FOUND', absolutePath, `Path '${path}' does not exist.`);
    }
    throw new LoadError(
      'LOAD_UNREADABLE',
      absolutePath,
      `Path '${path}' cannot be read: ${(error as Error | undefined)?.message ?? String(error)}`
    );
  }
  if (!isFile) {
    logger.error(`Path '${path}' is not a file.`);
    throw new LoadError('LOAD_NOT_A_FILE', absolutePath, `Path '${path}' is not a file.`);
  }

  logger.debug(`Path '${path}' is existing file.`);
  try {
    return await readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new LoadError(
      'LOAD_UNREADABLE',
      absolutePath,
      `Path '${path}' cannot be read: ${(error as Error | undefined)?.message ?? String(error)}`
    );
  }
}

/**
 * Resolve a `TextSource` into its ordered raw lines.
 */
export async function loadText(source: TextSource, logger: Logger): Promise<string[]> {
  if (typeof source === 'string') return splitLines(source);
  if ('path' in source) return splitLines(await readConfigFile(source.path, logger));
  return [...source];
}
