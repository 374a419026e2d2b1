export { Logger, createLogger, consoleSink } from './Logger.js';
export type { ILogger, LogEntry, LogSink } from './Logger.js';

export { deepFreeze, freezeMap } from './freeze.js';
