import { Logger } from './logger';
import { NoOpSink } from './sinks';
import { resolveLevel, type Env } from './config';
import type { LogLevel, SinkErrorHandler } from './types';

export interface LoggerRegistryOptions {
  /**
   * Fallback level of the loggers this registry creates. Resolved from the
   * environment when omitted.
   */
  level?: LogLevel;
  env?: Env;
  onSinkError?: SinkErrorHandler;
}

/**
 * Name → logger map. Dotted names form a hierarchy: `hmcclient.api` is a
 * child of `hmcclient`, and its entries reach the parent's sinks.
 */
export class LoggerRegistry {
  private readonly loggers = new Map<string, Logger>();
  private readonly fallbackLevel: LogLevel;
  private readonly onSinkError: SinkErrorHandler | undefined;

  constructor(options: LoggerRegistryOptions = {}) {
    this.fallbackLevel = resolveLevel(options.level, options.env);
    this.onSinkError = options.onSinkError;
  }

  /**
   * Return the logger for `name`, creating it on first access. A logger
   * without sinks gets a discard sink, so the library stays silent until a
   * consumer adds output of its own.
   */
  getLogger(name: string): Logger {
    const logger = this.lookupOrCreate(name);
    if (!logger.hasSinks()) {
      logger.addSink(new NoOpSink());
    }
    return logger;
  }

  has(name: string): boolean {
    return this.loggers.has(name);
  }

  names(): string[] {
    return Array.from(this.loggers.keys());
  }

  private lookupOrCreate(name: string): Logger {
    const existing = this.loggers.get(name);
    if (existing) return existing;

    const dot = name.lastIndexOf('.');
    const parent = dot > 0 ? this.lookupOrCreate(name.slice(0, dot)) : undefined;
    const logger = new Logger({
      name,
      parent,
      fallbackLevel: this.fallbackLevel,
      onSinkError: this.onSinkError,
    });
    this.loggers.set(name, logger);
    return logger;
  }
}

export const defaultRegistry = new LoggerRegistry();

/**
 * Logger for `name` from the process-wide registry
 */
export function getLogger(name: string): Logger {
  return defaultRegistry.getLogger(name);
}
