import type { LogSink, LogEntry } from './types';
import type { EntryFormatter } from './format';

export interface ConsoleSinkOptions {
  /** Indented JSON instead of one line per entry */
  pretty?: boolean;
  /** Render each entry as a text line instead of JSON */
  formatter?: EntryFormatter;
}

/**
 * Console sink; picks the console method matching the entry level
 */
export class ConsoleSink implements LogSink {
  private readonly pretty: boolean;
  private readonly formatter: EntryFormatter | undefined;

  constructor(options: ConsoleSinkOptions = {}) {
    this.pretty = options.pretty ?? false;
    this.formatter = options.formatter;
  }

  write(entry: LogEntry): void {
    const output = this.formatter
      ? this.formatter(entry)
      : JSON.stringify(entry, null, this.pretty ? 2 : undefined);

    switch (entry.level) {
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
      case 'fatal':
        console.error(output);
        break;
    }
  }
}

/**
 * Anything with a string `write`, such as `process.stderr` or a file stream
 */
export interface WritableLike {
  write(chunk: string): unknown;
}

/**
 * Writes one JSON line (or formatted line) per entry to a stream
 */
export class StreamSink implements LogSink {
  constructor(
    private readonly stream: WritableLike,
    private readonly formatter?: EntryFormatter,
  ) {}

  write(entry: LogEntry): void {
    const line = this.formatter ? this.formatter(entry) : JSON.stringify(entry);
    this.stream.write(line + '\n');
  }
}

/**
 * Keeps entries in memory; for tests and for buffering before a real sink exists
 */
export class MemorySink implements LogSink {
  public logs: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.logs.push(entry);
  }

  clear(): void {
    this.logs = [];
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  messages(): string[] {
    return this.logs.map(entry => entry.message);
  }
}

/**
 * Discards every entry. Attached to registry loggers so nothing is output
 * until a consumer adds a sink of its own.
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // discard
  }
}
