/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

/**
 * Upper-case label written into each line
 */
export type LogLevelName = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARNING]: 'WARNING',
  [LogLevel.ERROR]: 'ERROR',
};

/**
 * A single line-oriented log record
 */
export interface LogEntry {
  level: LogLevel;
  timestamp: Date;
  message: string;
}

/**
 * Sink interface for pluggable output destinations
 */
export interface LogSink {
  /** Records below this level are dropped by the sink */
  readonly minLevel: LogLevel;
  write(entry: LogEntry): void;
}

/**
 * Process-wide settings consumed read-only by the facade and the instrumentor
 */
export interface TraceConfig {
  CLASS_NAME_STARTSWITH: readonly string[];
  CLASS_NAME_ENDSWITH: readonly string[];
  CLASS_NAME_CONTAIN: readonly string[];
  LOG_LEVEL: LogLevel;
  /** Base directory; files land under `<LOG_FILE_PATH>/logs` */
  LOG_FILE_PATH: string;
  HOST_IP: string;
  SYS_ARCH: string;
}

/* ------------------------------- Descriptors ------------------------------- */

/**
 * - `positional`: a plain identifier parameter
 * - `keyword`: a property of a destructured object parameter
 * - `rest`: a `...rest` parameter, bound to the remaining arguments
 */
export type ParamKind = 'positional' | 'keyword' | 'rest';

export interface ParamDescriptor {
  name: string;
  kind: ParamKind;
  /** Argument position the parameter reads from */
  index: number;
  hasDefault: boolean;
  defaultValue?: unknown;
}

/** Where a callable was found when it was captured. */
export type Placement = 'prototype' | 'static' | 'none';

export type CallableKind = 'function' | 'instance' | 'static' | 'class';

/**
 * Immutable description of a wrapped callable, captured once at decoration time.
 * `params` is null when the source text could not be read.
 */
export interface CallableDescriptor {
  readonly name: string;
  readonly owner?: Function;
  readonly placement: Placement;
  readonly params: readonly ParamDescriptor[] | null;
  readonly doc?: string;
}

/** Parameter name → value supplied for one call. Built per invocation. */
export type BindingMap = Map<string, unknown>;

/** Class-name rules deciding which classes get traced. */
export interface MatchPolicy {
  startsWith: readonly string[];
  endsWith: readonly string[];
  contains: readonly string[];
}
