import { callerNames } from './callsite';
import { defaultCache } from './cache';
import { getConfig } from './config';
import { textOf } from './format';
import { SinkConfig } from './sink-config';
import { LogLevel, type LogEntry, type LogSink } from './types';

export interface LoggerConfig {
  /**
   * Minimum log level to output; sinks apply their own minimum on top
   */
  level?: LogLevel;
  /**
   * Pluggable sinks for output
   */
  sinks?: LogSink[];
  /** Clock source for testing. Default: () => new Date() */
  now?: () => Date;
}

/**
 * Line-oriented logger writing each record to every sink
 */
export class Logger {
  private level: LogLevel;
  private sinks: LogSink[];
  private now: () => Date;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? LogLevel.DEBUG;
    this.sinks = config.sinks ?? [];
    this.now = config.now ?? (() => new Date());
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  warning(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level
   */
  getLevel(): LogLevel {
    return this.level;
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

  log(level: LogLevel, message: string): void {
    if (level < this.level) {
      return;
    }
    const entry: LogEntry = { level, timestamp: this.now(), message };
    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }
}

/* --------------------------------- Facade --------------------------------- */

export interface CallOptions {
  /** Prefix `[caller]: ` to the message. Default: true */
  autoPrefix?: boolean;
  /** Calling function's name; skips stack inspection when given */
  caller?: string;
  /** Caller's caller, used by debug() to spot test functions */
  grandcaller?: string;
}

let active: Logger | undefined;
let built: SinkConfig | undefined;
let testNamePattern = /^test[_A-Z0-9]/;

/**
 * Active logger; the first call builds the sink configuration from the
 * process-wide config and keeps it for the life of the process.
 */
function ensureLogger(): Logger {
  if (!active) {
    const level = getConfig().LOG_LEVEL;
    built = defaultCache.getOrCreate<SinkConfig, [LogLevel]>(SinkConfig, [level]);
    active = new Logger({ sinks: [...built.sinks] });
  }
  return active;
}

/**
 * Install explicit sinks instead of the lazily built files and console.
 * Files built earlier are released and closed in the background.
 */
export function configureLogging(config: LoggerConfig): Logger {
  const files = built;
  built = undefined;
  defaultCache.clear(SinkConfig);
  const logger = new Logger(config);
  active = logger;
  if (files) {
    void files.close().catch((e: unknown) => logger.warning(`log files not closed cleanly (${textOf(e)})`));
  }
  return logger;
}

/**
 * Forget the active logger so the next call builds it again.
 * Closes the log files when they were built by this module.
 */
export async function resetLogging(): Promise<void> {
  const files = built;
  active = undefined;
  built = undefined;
  defaultCache.clear(SinkConfig);
  if (files) await files.close();
}

/** Names of functions whose direct calls surface debug() at INFO. */
export function setTestNamePattern(pattern: RegExp): void {
  testNamePattern = pattern;
}

export const isTestName = (name: string | undefined): boolean => !!name && testNamePattern.test(name);

function prefixed(message: string, name: string | undefined): string {
  return name ? `[${name}]: ${message}` : message;
}

/**
 * Log at INFO, prefixed with the calling function's name.
 */
export function info(message: string, options: CallOptions = {}): void {
  const logger = ensureLogger();
  const name = options.autoPrefix === false ? undefined : options.caller ?? callerNames(info, 1)[0];
  logger.info(options.autoPrefix === false ? message : prefixed(message, name));
}

/**
 * Log at DEBUG, prefixed with the calling function's name.
 * When the caller was itself called straight from a test function, the
 * record is promoted to INFO so it shows at the default console level.
 */
export function debug(message: string, options: CallOptions = {}): void {
  const logger = ensureLogger();
  const needStack = options.caller === undefined || options.grandcaller === undefined;
  const frames = needStack ? callerNames(debug, 2) : [];
  const caller = options.caller ?? frames[0];
  const grandcaller = options.grandcaller ?? frames[1];
  const text = options.autoPrefix === false ? message : prefixed(message, caller);
  if (isTestName(grandcaller)) logger.info(text);
  else logger.debug(text);
}

/**
 * Log at ERROR, prefixed with the calling function's name.
 */
export function error(message: string, options: CallOptions = {}): void {
  const logger = ensureLogger();
  const name = options.autoPrefix === false ? undefined : options.caller ?? callerNames(error, 1)[0];
  logger.error(options.autoPrefix === false ? message : prefixed(message, name));
}

export function warning(message: string): void {
  ensureLogger().warning(message);
}

/**
 * Log at ERROR with the error's stack on the following lines.
 */
export function exception(message: string, err?: unknown): void {
  const logger = ensureLogger();
  if (err === undefined) {
    logger.error(message);
    return;
  }
  const detail = err instanceof Error ? err.stack ?? `${err.name}: ${err.message}` : String(err);
  logger.error(`${message}\n${detail}`);
}

/**
 * Process-wide logging entry points
 *
 * @example
 * ```typescript
 * import { log } from 'calltrace';
 *
 * function openSettings() {
 *   log.info('opening');   // "[openSettings]: opening"
 * }
 * ```
 */
export const log = {
  info,
  debug,
  error,
  warning,
  exception,
};
