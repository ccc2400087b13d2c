import { LogLevel } from './types';
import type { LogLevelName, LogEntry, LogSink, LoggerConfig, MaskFn, SinkErrorHandler } from './types';

const RESERVED_FIELDS: ReadonlySet<string> = new Set(['level', 'timestamp', 'logger', 'message']);

// Sink failures stay silent unless the consumer installs `onSinkError`.
const ignoreSinkError: SinkErrorHandler = () => {};

/**
 * Named structured logger. Entries go to the logger's own sinks and, while
 * `propagate` is set, to the sinks of every ancestor.
 */
export class Logger {
  readonly name: string;
  readonly parent: Logger | undefined;
  propagate: boolean;
  private level: LogLevel | undefined;
  private readonly fallbackLevel: LogLevel;
  private readonly sinks: LogSink[];
  private readonly mask: MaskFn | undefined;
  private readonly onSinkError: SinkErrorHandler;
  private readonly context: Record<string, unknown>;

  constructor(config: LoggerConfig, context: Record<string, unknown> = {}) {
    this.name = config.name;
    this.parent = config.parent;
    this.propagate = config.propagate ?? true;
    this.level = config.level;
    this.fallbackLevel = config.fallbackLevel ?? LogLevel.INFO;
    this.sinks = config.sinks ?? [];
    this.mask = config.mask;
    this.onSinkError = config.onSinkError ?? ignoreSinkError;
    this.context = context;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, 'debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, 'info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, 'warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, 'error', message, data);
  }

  fatal(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, 'fatal', message, data);
  }

  /**
   * Create a logger with the same name, sinks and level whose entries
   * carry additional context fields
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      name: this.name,
      parent: this.parent,
      level: this.level,
      fallbackLevel: this.fallbackLevel,
      sinks: this.sinks,
      propagate: this.propagate,
      mask: this.mask,
      onSinkError: this.onSinkError,
    }, { ...this.context, ...context });
  }

  /**
   * Set the own minimum level; `undefined` falls back to inheritance
   */
  setLevel(level: LogLevel | undefined): void {
    this.level = level;
  }

  /**
   * The own level, if one was set
   */
  getLevel(): LogLevel | undefined {
    return this.level;
  }

  getEffectiveLevel(): LogLevel {
    if (this.level !== undefined) return this.level;
    return this.parent ? this.parent.getEffectiveLevel() : this.fallbackLevel;
  }

  isEnabledFor(level: LogLevel): boolean {
    return level >= this.getEffectiveLevel();
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  removeSink(sink: LogSink): void {
    const index = this.sinks.indexOf(sink);
    if (index > -1) {
      this.sinks.splice(index, 1);
    }
  }

  hasSinks(): boolean {
    return this.sinks.length > 0;
  }

  getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  private log(
    levelNum: LogLevel,
    levelName: LogLevelName,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabledFor(levelNum)) {
      return;
    }

    const entry: LogEntry = {
      level: levelName,
      timestamp: new Date().toISOString(),
      logger: this.name,
      message,
    };
    assignFields(entry, this.context);
    if (data) {
      const masked = this.mask ? this.mask(data) : data;
      if (isRecord(masked)) assignFields(entry, masked);
    }

    this.handle(entry);
  }

  private handle(entry: LogEntry): void {
    let current: Logger | undefined = this;
    while (current) {
      for (const sink of current.sinks) {
        try {
          sink.write(entry);
        } catch (err) {
          this.onSinkError(err, entry, sink);
        }
      }
      current = current.propagate ? current.parent : undefined;
    }
  }
}

function assignFields(entry: LogEntry, fields: Record<string, unknown>): void {
  for (const key of Object.keys(fields)) {
    if (!RESERVED_FIELDS.has(key)) entry[key] = fields[key];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Create a standalone logger that is not tracked by any registry
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
