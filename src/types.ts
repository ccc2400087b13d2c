import type { Logger } from './logger';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  SILENT = 5,
}

/**
 * String representation of the levels a record can carry
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevelName;
  timestamp: string;
  /** Dotted name of the logger that created the entry */
  logger: string;
  message: string;
  [key: string]: unknown;
}

/**
 * Sink interface for pluggable output destinations
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

export type MaskFn = (value: unknown) => unknown;

export type SinkErrorHandler = (error: unknown, entry: LogEntry, sink: LogSink) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  /**
   * Own minimum level. When omitted the logger inherits its parent's effective level.
   */
  level?: LogLevel;
  /**
   * Level used when neither the logger nor any ancestor sets one (default: INFO)
   */
  fallbackLevel?: LogLevel;
  parent?: Logger;
  sinks?: LogSink[];
  /**
   * Hand entries to ancestor sinks as well (default: true)
   */
  propagate?: boolean;
  /**
   * Applied to structured data before it is merged into an entry
   */
  mask?: MaskFn;
  onSinkError?: SinkErrorHandler;
}
