import { createWriteStream, type WriteStream } from 'node:fs';
import { LogLevel, type LogEntry, type LogSink } from './types';
import { createColorFormatter, createPlainFormatter, shouldColor, type ColorMode, type LineFormatter } from './format';

/**
 * Console sink; ERROR goes to stderr, everything else to stdout
 */
export class ConsoleSink implements LogSink {
  readonly minLevel: LogLevel;
  private format: LineFormatter;

  constructor(label: string, minLevel: LogLevel = LogLevel.INFO, color: ColorMode = 'auto') {
    this.minLevel = minLevel;
    this.format = shouldColor(color) ? createColorFormatter(label) : createPlainFormatter(label);
  }

  write(entry: LogEntry): void {
    if (entry.level < this.minLevel) return;
    const output = this.format(entry) + '\n';
    if (entry.level >= LogLevel.ERROR) {
      process.stderr.write(output);
    } else {
      process.stdout.write(output);
    }
  }
}

/**
 * File sink; the file is truncated when the sink opens it.
 * A stream error stops the sink and is reported once on stderr.
 */
export class FileSink implements LogSink {
  readonly minLevel: LogLevel;
  readonly path: string;
  private stream: WriteStream;
  private format: LineFormatter;
  private broken = false;

  constructor(path: string, label: string, minLevel: LogLevel = LogLevel.DEBUG) {
    this.path = path;
    this.minLevel = minLevel;
    this.format = createPlainFormatter(label);
    this.stream = createWriteStream(path, { flags: 'w+', encoding: 'utf-8' });
    this.stream.on('error', (err) => {
      if (this.broken) return;
      this.broken = true;
      process.stderr.write(`${path}: file logging stopped (${err.message})\n`);
    });
  }

  /** True once the stream has failed; later records are dropped */
  get failed(): boolean {
    return this.broken;
  }

  write(entry: LogEntry): void {
    if (this.broken || entry.level < this.minLevel) return;
    this.stream.write(this.format(entry) + '\n');
  }

  /**
   * Flush pending lines and close the file
   */
  close(): Promise<void> {
    if (this.broken || this.stream.destroyed) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.stream.once('error', reject);
      this.stream.end(() => resolve());
    });
  }
}

/**
 * Memory sink for testing or buffering logs
 */
export class MemorySink implements LogSink {
  readonly minLevel: LogLevel;
  public logs: LogEntry[] = [];

  constructor(minLevel: LogLevel = LogLevel.DEBUG) {
    this.minLevel = minLevel;
  }

  write(entry: LogEntry): void {
    if (entry.level < this.minLevel) return;
    this.logs.push(entry);
  }

  clear(): void {
    this.logs = [];
  }

  /** Messages only, in arrival order */
  messages(): string[] {
    return this.logs.map((e) => e.message);
  }
}

