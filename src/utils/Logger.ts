import type { LogLevel } from '../types/index.js';

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
 * Destination for log entries that passed level filtering.
 */
export type LogSink = (entry: LogEntry) => void;

/**
 * Logger interface for the rendering pipeline.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
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
 * Writes entries to the console as `<timestamp> LEVEL [context] message`.
 */
export const consoleSink: LogSink = (entry) => {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const line = `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)} ${prefix} ${entry.message}`;
  const write = console[entry.level];
  if (entry.data) {
    write(line, entry.data);
  } else {
    write(line);
  }
};

/**
 * Level-filtered logger with hierarchical contexts.
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
   * Creates a child logger with additional context (`parent:child`).
   */
  child(context: string): ILogger {
    const fullContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(this.level, fullContext, this.sink);
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
    if (LOG_LEVEL_PRIORITY[level] < this.levelPriority) {
      return;
    }
    this.sink({ level, message, context: this.context, data, timestamp: new Date() });
  }
}

/**
 * Creates a logger instance. The 'silent' level filters out every entry.
 */
export function createLogger(level: LogLevel = 'warn', context?: string, sink?: LogSink): ILogger {
  return new Logger(level, context, sink);
}

/**
 * Creates a logger that collects entries in memory, for inspection in tests
 * and scripts.
 */
export function createMemoryLogger(level: LogLevel = 'debug'): { logger: ILogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: createLogger(level, undefined, (entry) => entries.push(entry)), entries };
}
