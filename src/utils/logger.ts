import { Console } from 'node:console';
import * as fs from 'node:fs';
import { DEFAULT_LOG_FILE } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Diagnostics collaborator handed to each component at construction.
 * Components only report events through it; nothing they return depends on it.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export interface LoggingOptions {
  /** Appended to; ignored when `stream` is given */
  logFile?: string;
  level?: LogLevel;
  /** Write to this stream instead of a file. The caller keeps ownership of it. */
  stream?: NodeJS.WritableStream;
}

interface LogSink {
  output: Console;
  level: LogLevel;
  stream: NodeJS.WritableStream;
  ownsStream: boolean;
}

let activeSink: LogSink | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Opens the process-wide log sink. Call once at start-up and pair with
 * `shutdownLogging()` before exit. Returns false when the log file cannot be
 * opened; logging then stays disabled.
 */
export function initLogging(options: LoggingOptions = {}): boolean {
  if (activeSink) {
    return true;
  }

  const level = options.level ?? 'info';
  let stream: NodeJS.WritableStream;
  let ownsStream = false;

  if (options.stream) {
    stream = options.stream;
  } else {
    const logFile = options.logFile ?? DEFAULT_LOG_FILE;
    try {
      const fd = fs.openSync(logFile, 'a');
      stream = fs.createWriteStream(logFile, { fd, encoding: 'utf8' });
      ownsStream = true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`CRITICAL: Could not set up file logging: ${reason}\n`);
      return false;
    }
  }

  stream.on('error', (error: Error) => {
    process.stderr.write(`CRITICAL: Log stream failed, logging disabled: ${error.message}\n`);
    activeSink = null;
  });

  activeSink = {
    output: new Console({ stdout: stream, stderr: stream }),
    level,
    stream,
    ownsStream,
  };
  return true;
}

/** Flushes and closes the sink opened by `initLogging()`. */
export function shutdownLogging(): Promise<void> {
  const sink = activeSink;
  activeSink = null;
  if (!sink || !sink.ownsStream) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    sink.stream.end(() => resolve());
  });
}

function write(scope: string, level: LogLevel, message: string, details: unknown[]): void {
  const sink = activeSink;
  if (!sink || LEVEL_RANK[level] < LEVEL_RANK[sink.level]) {
    return;
  }
  const line = `${new Date().toISOString()} [${scope}] ${level.toUpperCase()}: ${message}`;
  if (level === 'error' || level === 'warn') {
    sink.output.error('%s', line, ...details);
  } else {
    sink.output.log('%s', line, ...details);
  }
}

/**
 * Returns a logger for one component. The sink is looked up on every call, so
 * loggers created at import time start writing once `initLogging()` has run.
 */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, ...details) => write(scope, 'debug', message, details),
    info: (message, ...details) => write(scope, 'info', message, details),
    warn: (message, ...details) => write(scope, 'warn', message, details),
    error: (message, ...details) => write(scope, 'error', message, details),
  };
}
