/**
 * hmc-client-log: silent-by-default named loggers and API call tracing
 * for the HMC client
 */

export { Logger, createLogger } from './logger';
export { LoggerRegistry, defaultRegistry, getLogger } from './registry';
export type { LoggerRegistryOptions } from './registry';
export {
  ApiCallLogging,
  apiCalls,
  createApiCallLogging,
  createLoggedApiCall,
  loggedApiCall,
  runExternal,
  runInternal,
} from './logged-api-call';
export type { ApiCallLoggingOptions, LoggedApiCall } from './logged-api-call';
export { CallContext, defaultCallContext } from './call-context';
export { ConsoleSink, StreamSink, MemorySink, NoOpSink } from './sinks';
export type { ConsoleSinkOptions, WritableLike } from './sinks';
export { createConsoleFormatter, repr, capRepr } from './format';
export type { ColorMode, EntryFormatter } from './format';
export { redact, makeMask, extendDefaultMaskKeys, DEFAULT_MASK_KEYS } from './redact';
export type { RedactOptions } from './redact';
export { parseLogLevel, resolveLevel, DEBUG_ENV_VAR, LEVEL_ENV_VAR } from './config';
export type { Env } from './config';
export { LoggingConfigurationError } from './errors';
export {
  LIBRARY_NAMESPACE,
  API_LOGGER_NAME,
  HMC_LOGGER_NAME,
  ARGS_REPR_LIMIT,
  RESULT_REPR_LIMIT,
  TRUNCATION_MARKER,
} from './constants';
export { LogLevel } from './types';
export type {
  LogLevelName,
  LogEntry,
  LogSink,
  LoggerConfig,
  MaskFn,
  SinkErrorHandler,
} from './types';

// Default export
import { getLogger } from './registry';
import { loggedApiCall } from './logged-api-call';
import { LogLevel } from './types';

export default {
  getLogger,
  loggedApiCall,
  LogLevel,
};
