/**
 * Toolkit configuration
 *
 * Reads the environment variables documented in env-schema.ts and parses
 * them into a typed configuration with Zod. Worker settings are strict;
 * logging settings are case-insensitive and fall back to their defaults,
 * so a log variable never stops workers from starting.
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

// ============================================================================
// Schema
// ============================================================================

/** Treat unset and empty variables alike */
const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const lowercaseEnv = (value: unknown) =>
  typeof value === 'string' && value !== '' ? value.toLowerCase() : undefined;

export const WorkerEnvSchema = z.object({
  THREADLINE_WORKER_ADAPTER: optionalEnv(z.enum(['thread', 'inline']).default('thread')),
  THREADLINE_DEFAULT_CONCURRENCY: optionalEnv(z.coerce.number().int().min(1).default(10)),
  THREADLINE_WORKER_MEMORY_MB: optionalEnv(z.coerce.number().int().min(16).max(4096).optional()),
});

export const LoggingEnvSchema = z.object({
  LOG_LEVEL: z.preprocess(lowercaseEnv, z.enum(['debug', 'info', 'warn', 'error']).catch('info')),
  LOG_FORMAT: z.preprocess(lowercaseEnv, z.enum(['text', 'json']).catch('text')),
  LOG_FILE: optionalEnv(z.string().optional()),
  NO_COLOR: optionalEnv(z.string().optional()),
});

export const ThreadlineEnvSchema = WorkerEnvSchema.merge(LoggingEnvSchema);

export type WorkerAdapterKind = 'thread' | 'inline';

export interface WorkerConfig {
  adapter: WorkerAdapterKind;
  defaultConcurrency: number;
  memoryLimitMb?: number;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  format: 'text' | 'json';
  file?: string;
  /** NO_COLOR is set to any non-empty value */
  noColor: boolean;
}

export interface ThreadlineConfig {
  workers: WorkerConfig;
  logging: LoggingConfig;
}

type Env = Record<string, string | undefined>;

// ============================================================================
// Loading
// ============================================================================

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: Env): z.output<S> {
  const result = schema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid threadline configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Parse the worker settings. Throws ConfigurationError listing every
 * invalid variable.
 */
export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  const parsed = parseEnv(WorkerEnvSchema, env);
  return {
    adapter: parsed.THREADLINE_WORKER_ADAPTER,
    defaultConcurrency: parsed.THREADLINE_DEFAULT_CONCURRENCY,
    memoryLimitMb: parsed.THREADLINE_WORKER_MEMORY_MB,
  };
}

/**
 * Parse the logging settings. Unknown levels and formats fall back to
 * info and text.
 */
export function loadLoggingConfig(env: Env = process.env): LoggingConfig {
  const parsed = parseEnv(LoggingEnvSchema, env);
  return {
    level: parsed.LOG_LEVEL,
    format: parsed.LOG_FORMAT,
    file: parsed.LOG_FILE,
    noColor: parsed.NO_COLOR !== undefined,
  };
}

/**
 * Parse the whole configuration from an environment map
 */
export function loadConfig(env: Env = process.env): ThreadlineConfig {
  return {
    workers: loadWorkerConfig(env),
    logging: loadLoggingConfig(env),
  };
}
