/**
 * Logger - leveled, structured logging for analysis runs
 *
 * Levels: silent, errors, warnings, info, debug (trace shares debug).
 * Console output goes to stderr so a report on stdout stays parseable.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Discovered source files', { count: 150 });
 *
 *   const logger = createLogger('warnings', { logFile: '.unread/run.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, accessSync, statSync, constants, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { LogLevel, Logger } from '@unread/types';

type LogMethod = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Log level priorities (higher = more verbose)
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum level priority each method needs
 */
const METHOD_LEVELS: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_TAGS: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

/**
 * JSON.stringify that prints circular references and Errors readably
 */
export function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(value, (_key, inner: unknown) => {
    if (inner instanceof Error) {
      return { name: inner.name, message: inner.message };
    }
    if (typeof inner === 'bigint') {
      return inner.toString();
    }
    if (typeof inner === 'object' && inner !== null) {
      if (seen.has(inner)) return '[Circular]';
      seen.add(inner);
    }
    return inner;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Level filtering shared by every sink; subclasses only write lines.
 */
abstract class LeveledLogger implements Logger {
  protected readonly priority: number;

  constructor(readonly level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: LogMethod, message: string, context?: Record<string, unknown>): void;

  private log(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    this.write(method, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }
}

export class ConsoleLogger extends LeveledLogger {
  constructor(logLevel: LogLevel = 'info') {
    super(logLevel);
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const line = formatMessage(`[${METHOD_TAGS[method]}] ${message}`, context);
    if (method === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }
}

/**
 * Writes ISO-timestamped lines to a file, truncated on construction.
 * Parent directories are created. Throws when the path is unusable.
 */
export class FileLogger extends LeveledLogger {
  private readonly stream: WriteStream;
  readonly filePath: string;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    this.filePath = resolve(filePath);

    const dir = dirname(this.filePath);
    mkdirSync(dir, { recursive: true });

    try {
      accessSync(dir, constants.W_OK);
    } catch {
      throw new Error(`Cannot write log file: directory '${dir}' is not writable`);
    }

    let isDirectory = false;
    try {
      isDirectory = statSync(this.filePath).isDirectory();
    } catch {
      // Does not exist yet
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${this.filePath}' is a directory`);
    }

    writeFileSync(this.filePath, '');
    this.stream = createWriteStream(this.filePath, { flags: 'a' });
    this.stream.on('error', (error: Error) => {
      console.error(`[ERROR] Log file write failed: ${error.message}`);
    });
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${METHOD_TAGS[method]}] ${message}`, context) + '\n');
  }

  /** Resolves once buffered lines are flushed */
  close(): Promise<void> {
    return new Promise(done => {
      this.stream.end(done);
    });
  }
}

/**
 * Fans out to several loggers; each applies its own level.
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      await closeLogger(logger);
    }
  }
}

/**
 * Flush a logger if it owns a file.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof FileLogger || logger instanceof MultiLogger) {
    await logger.close();
  }
}

/**
 * Console logger at `level`; with a log file, a MultiLogger whose file side
 * always records at debug level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}
