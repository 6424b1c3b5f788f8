/**
 * calltrace: call tracing for classes and a process-wide logging facade
 * for Node test and automation code
 */

export { instrument, matchesPolicy } from './instrument';
export type { InstrumentOptions } from './instrument';
export { trace, traceConstructor, renderCall, isInstrumented, unwrap } from './tracer';
export type { TraceOptions, AnyFunction } from './tracer';
export { document, docOf, describeCallable, paramsOf } from './describe';
export { classify } from './classify';
export { bindArguments, renderTitle, extractTitle } from './title';
export { InstanceCache, defaultCache, deriveKey, keyed } from './cache';
export type { Constructor, Ref } from './cache';
export {
  log,
  info,
  debug,
  error,
  warning,
  exception,
  Logger,
  configureLogging,
  resetLogging,
  setTestNamePattern,
} from './logger';
export type { CallOptions, LoggerConfig } from './logger';
export { SinkConfig } from './sink-config';
export { ConsoleSink, FileSink, MemorySink } from './sinks';
export { NoopStepReporter, MemoryStepReporter, getStepReporter, setStepReporter } from './steps';
export type { StepReporter, StepScope, StepRecord } from './steps';
export { getConfig, setConfig, resolveConfig, parseLogLevel } from './config';
export { InstanceCacheError, SinkConfigError } from './errors';
export { LogLevel } from './types';
export type {
  LogLevelName,
  LogEntry,
  LogSink,
  TraceConfig,
  MatchPolicy,
  CallableDescriptor,
  CallableKind,
  ParamDescriptor,
} from './types';

// Default export
import { instrument } from './instrument';
import { log } from './logger';

export default {
  instrument,
  log,
};
