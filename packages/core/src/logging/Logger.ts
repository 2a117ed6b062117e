/**
 * Logger - Lightweight logging for polybridge
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Console and file output (or both via MultiLogger)
 * - Safe handling of circular references
 *
 * Usage:
 *   const logger = createLogger('debug');
 *   logger.debug('Registered class', { className: 'Base' });
 *
 *   const logger = createLogger('warnings', { logFile: '.polybridge/dispatch.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@polybridge/types';

export type { Logger, LogLevel };

type Method = keyof Logger;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum level required for each method
 */
const METHOD_LEVELS: Record<Method, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const LABELS: Record<Method, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Safe JSON stringify that handles circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    if (typeof value === 'function') {
      return `[Function ${value.name || 'anonymous'}]`;
    }
    return value;
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
 * Shared level filtering. Subclasses only decide where a line goes.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(readonly level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: Method, label: string, message: string, context?: Record<string, unknown>): void;

  private emit(method: Method, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    this.write(method, LABELS[method], message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.emit('trace', message, context);
  }
}

/**
 * Console-based Logger implementation
 *
 * error/warn/info go to the console method of the same name; debug and
 * trace both go to console.debug.
 */
export class ConsoleLogger extends LevelLogger {
  constructor(logLevel: LogLevel = 'info') {
    super(logLevel);
  }

  protected write(method: Method, label: string, message: string, context?: Record<string, unknown>): void {
    const line = formatMessage(`[${label}] ${message}`, context);
    try {
      switch (method) {
        case 'error':
          console.error(line);
          break;
        case 'warn':
          console.warn(line);
          break;
        case 'info':
          console.info(line);
          break;
        default:
          console.debug(line);
      }
    } catch {
      console.log(`[${label}] ${message} [logging failed]`);
    }
  }
}

/**
 * File-based Logger implementation
 *
 * Writes lines with ISO timestamps through a write stream. The file is
 * truncated on construction; parent directories are created.
 * Throws if the path points to a directory.
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });

    const existing = statSync(resolvedPath, { throwIfNoEntry: false });
    if (existing?.isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err) => {
      console.error(`[ERROR] Log file write failed: ${err.message}`);
    });
  }

  protected write(_method: Method, label: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${label}] ${message}`, context) + '\n');
  }

  /** Flush and close the write stream. */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(resolve);
    });
  }
}

/**
 * Delegates to several loggers; each applies its own level.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

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
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger with the given console level.
 *
 * With logFile, returns a MultiLogger whose file side always records at
 * 'debug', so dispatch traces are kept regardless of the console level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}
