/**
 * threadline
 *
 * Offload work to isolated workers, bound how many run at once, and
 * coordinate tasks through typed channels.
 */

export * from './concurrency/index.js';
export * from './workers/index.js';
export * from './channels/index.js';

export {
  ThreadlineError,
  UsageError,
  TaskFailure,
  ChannelClosedError,
  AggregateFailure,
  TimeoutError,
  FilterRejectedError,
  ConfigurationError,
  isThreadlineError,
  getErrorMessage,
  serializeError,
  deserializeError,
} from './utils/errors.js';
export type { SerializedError } from './utils/errors.js';

export {
  Logger,
  createLogger,
  getLogger,
  resetLogger,
  logger,
  isDebugEnabled,
  resolveLoggerOptions,
} from './utils/logger.js';
export type { LogLevel, LogFormat, LogContext, LogEntry, LoggerOptions } from './utils/logger.js';

export {
  loadConfig,
  loadWorkerConfig,
  loadLoggingConfig,
  ThreadlineEnvSchema,
  WorkerEnvSchema,
  LoggingEnvSchema,
} from './config/threadline-config.js';
export type {
  ThreadlineConfig,
  WorkerConfig,
  LoggingConfig,
  WorkerAdapterKind,
} from './config/threadline-config.js';
export { ENV_SCHEMA, validateEnv, getEnvSummary, getEnvDef } from './config/env-schema.js';
export type { EnvVarDef, EnvCategory, EnvKind, ValidationResult } from './config/env-schema.js';
