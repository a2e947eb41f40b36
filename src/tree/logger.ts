import { DEFAULT_VERBOSITY } from './constants.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Minimum verbosity at which a level is written. */
const LEVEL_VERBOSITY: Record<LogLevel, number> = {
  error: 2,
  warn: 3,
  info: 4,
  debug: 5,
};

export interface StderrLoggerOptions {
  name: string;
  /** 1 critical, 2 error, 3 warning, 4 info, 5 debug. */
  verbosity?: number;
  stream?: NodeJS.WritableStream;
}

/**
 * Logger writing `[name] LEVEL message` lines to stderr.
 *
 * stdout carries JSON (CLI) or the MCP transport, so log output never goes there.
 */
export function createStderrLogger(options: StderrLoggerOptions): Logger {
  const verbosity = options.verbosity ?? DEFAULT_VERBOSITY;
  const stream = options.stream ?? process.stderr;

  function write(level: LogLevel, message: string): void {
    if (verbosity < LEVEL_VERBOSITY[level]) return;
    stream.write(`[${options.name}] ${level.toUpperCase()} ${message}\n`);
  }

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
