import { Writable } from 'node:stream';
import { vi } from 'vitest';
import type { Logger } from '../src/tree/logger.js';
import { ConfigParser } from '../src/tree/parser.js';
import type { ParserOptions } from '../src/tree/parser.js';
import { PatternCache } from '../src/tree/patterns.js';

export const SAMPLE_CONFIG = [
  'interface Ethernet0/0',
  ' description Test',
  ' ip address 10.0.0.1 255.255.255.0',
  'interface Ethernet0/1',
  ' shutdown',
];

/** A small router dump, as stored under `configs/`. */
export const EDGE_CONFIG = [
  'hostname edge-1',
  '!',
  'interface Ethernet0/0',
  ' description Test',
  ' ip address 10.0.0.1 255.255.255.0',
  '!',
  'interface Ethernet0/1',
  ' shutdown',
  '!',
  'end',
];

export interface RecordingLogger extends Logger {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

export function createRecordingLogger(): RecordingLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * Session with its own cache and a recording logger, so tests do not share state.
 */
export function createParser(
  lines: readonly string[],
  options: ParserOptions = {}
): { parser: ConfigParser; logger: RecordingLogger } {
  const logger = createRecordingLogger();
  const parser = ConfigParser.fromLines(lines, {
    logger,
    patternCache: new PatternCache(),
    ...options,
  });
  return { parser, logger };
}

/**
 * Writable that keeps everything written to it.
 */
export class MemoryStream extends Writable {
  readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}
