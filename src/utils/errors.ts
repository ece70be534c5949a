/**
 * Custom error classes for threadline
 */

/**
 * Base error class for all threadline errors
 */
export class ThreadlineError extends Error {
  constructor(message: string, public code?: string, public details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Error thrown when an operation is called with invalid arguments.
 * Raised before any worker is spawned.
 */
export class UsageError extends ThreadlineError {
  constructor(message: string, public argument?: string, public value?: unknown) {
    super(message, 'USAGE_ERROR', { argument, value });
  }
}

/**
 * Error thrown when a task fails inside its worker
 */
export class TaskFailure extends ThreadlineError {
  constructor(
    message: string,
    public workerName: string,
    cause?: Error
  ) {
    super(message, 'TASK_FAILURE', { workerName });
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Error thrown by send/receive on a closed channel
 */
export class ChannelClosedError extends ThreadlineError {
  constructor(message: string = 'Channel is closed') {
    super(message, 'CHANNEL_CLOSED');
  }
}

/**
 * Error thrown when every task of a race has failed
 */
export class AggregateFailure extends ThreadlineError {
  constructor(
    message: string,
    public lastError: unknown,
    public failureCount: number
  ) {
    super(message, 'AGGREGATE_FAILURE', { failureCount });
    this.cause = lastError;
  }
}

/**
 * Error thrown when operation times out
 */
export class TimeoutError extends ThreadlineError {
  constructor(message: string, public timeoutMs: number) {
    super(message, 'TIMEOUT_ERROR', { timeoutMs });
  }
}

/**
 * Error thrown by filter() when a value fails its predicate
 */
export class FilterRejectedError extends ThreadlineError {
  constructor(public value: unknown) {
    super('Value did not pass the filter predicate', 'FILTER_REJECTED', { value });
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ThreadlineError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', { issues });
  }
}

/**
 * Checks if an error is a ThreadlineError or subclass
 */
export function isThreadlineError(error: unknown): error is ThreadlineError {
  return error instanceof ThreadlineError;
}

/**
 * Safely extracts error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unknown error occurred';
}

// ============================================================================
// Worker boundary
// ============================================================================

/**
 * Plain form of an error, safe to post across a worker boundary
 */
export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: getErrorMessage(error) };
}

/**
 * Rebuild an Error from its serialized form, keeping the remote stack
 */
export function deserializeError(serialized: SerializedError): Error {
  // Sanitize sizes
  const error = new Error(String(serialized.message).slice(0, 10000));
  error.name = serialized.name;
  if (serialized.stack) {
    error.stack = String(serialized.stack).slice(0, 10000);
  }
  return error;
}
