import type { LogLevel } from '../types/options.js';

/**
 * Log entry with metadata.
 */
export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Receives entries that pass the level filter.
 */
export type LogSink = (entry: LogEntry) => void;

/**
 * Logger interface for the compiler pipeline.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  isEnabled(level: LogLevel): boolean;
  child(context: string): ILogger;
}

/**
 * Log level priority for filtering.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Writes an entry to the console method matching its level.
 */
export const consoleSink: LogSink = (entry) => {
  const prefix = entry.context ? ` [${entry.context}]` : '';
  const line = `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)}${prefix} ${entry.message}`;
  const args: unknown[] = entry.data ? [line, entry.data] : [line];

  switch (entry.level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
};

/**
 * Level-filtered logger. Writes to the console unless given another sink.
 */
export class Logger implements ILogger {
  private readonly levelPriority: number;

  constructor(
    private readonly level: LogLevel = 'warn',
    private readonly context?: string,
    private readonly sink: LogSink = consoleSink
  ) {
    this.levelPriority = LOG_LEVEL_PRIORITY[level];
  }

  /**
   * Creates a child logger with additional context.
   */
  child(context: string): ILogger {
    const fullContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(this.level, fullContext, this.sink);
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVEL_PRIORITY[level] >= this.levelPriority;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogEntry['level'], message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    this.sink({
      level,
      message,
      context: this.context,
      data,
      timestamp: new Date(),
    });
  }
}

/**
 * Creates a logger instance based on the log level.
 * 'silent' filters out every entry.
 */
export function createLogger(level: LogLevel = 'warn', context?: string, sink?: LogSink): ILogger {
  return new Logger(level, context, sink);
}
