/**
 * Logger
 *
 * Leveled logger with text and JSON output. Entries go to stderr, or are
 * appended to LOG_FILE when it is set. Each logger carries a source label
 * and an optional context that children extend.
 */

import * as fs from 'fs';
import chalk from 'chalk';
import { loadLoggingConfig } from '../config/threadline-config.js';
import { serializeError, type SerializedError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  source?: string;
  context?: LogContext;
  error?: SerializedError;
}

export interface LoggerOptions {
  /** Minimum level written (default: LOG_LEVEL or 'info') */
  level?: LogLevel;
  /** Output format (default: LOG_FORMAT or 'text') */
  format?: LogFormat;
  /** Label of the component writing the entries */
  source?: string;
  /** Append entries to this file instead of stderr (default: LOG_FILE) */
  file?: string;
  /** Colorize text output (default: stderr is a TTY and NO_COLOR unset) */
  colors?: boolean;
  /** Fields attached to every entry */
  context?: LogContext;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve logger defaults from the environment
 */
export function resolveLoggerOptions(
  env: Record<string, string | undefined> = process.env
): Required<Pick<LoggerOptions, 'level' | 'format' | 'colors'>> & { file?: string } {
  const { level, format, file, noColor } = loadLoggingConfig(env);
  return {
    level,
    format,
    file,
    colors: Boolean(process.stderr.isTTY) && !noColor,
  };
}

// ============================================================================
// Logger
// ============================================================================

export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly source?: string;
  private readonly file?: string;
  private readonly colors: boolean;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}) {
    const defaults = resolveLoggerOptions();
    this.level = options.level ?? defaults.level;
    this.format = options.format ?? defaults.format;
    this.source = options.source;
    this.file = options.file ?? defaults.file;
    this.colors = options.colors ?? defaults.colors;
    this.context = options.context ?? {};
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Create a logger sharing this one's settings with extra context
   */
  child(context: LogContext, source?: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      source: source ?? this.source,
      file: this.file,
      colors: this.colors,
      context: { ...this.context, ...context },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    try {
      const entry = this.buildEntry(level, message, data);
      const line = this.format === 'json' ? JSON.stringify(entry) : this.formatText(entry);
      if (this.file) {
        fs.appendFileSync(this.file, line + '\n');
      } else {
        process.stderr.write(line + '\n');
      }
    } catch (err) {
      // Unserializable data and write failures are reported on stderr, never thrown
      process.stderr.write(`[logger] failed to write entry "${message}": ${String(err)}\n`);
    }
  }

  private buildEntry(level: LogLevel, message: string, data?: unknown): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (this.source) {
      entry.source = this.source;
    }

    let context: LogContext = { ...this.context };
    if (data instanceof Error) {
      entry.error = serializeError(data);
    } else if (isRecord(data)) {
      context = { ...context, ...data };
    } else if (data !== undefined) {
      context.data = data;
    }

    if (Object.keys(context).length > 0) {
      entry.context = context;
    }
    return entry;
  }

  private formatText(entry: LogEntry): string {
    const label = entry.level.toUpperCase().padEnd(5);
    const parts = [
      entry.timestamp,
      this.colors ? LEVEL_COLORS[entry.level](label) : label,
    ];
    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }
    parts.push(entry.message);
    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      parts.push(`${entry.error.name}: ${entry.error.message}`);
    }
    return parts.join(' ');
  }
}

// ============================================================================
// Singleton
// ============================================================================

let loggerInstance: Logger | null = null;

/**
 * Get the shared logger
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

/**
 * Drop the shared logger so the next call re-reads the environment
 */
export function resetLogger(): void {
  loggerInstance = null;
}

/**
 * Create a logger for a component
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * Shared logger; forwards to the current singleton
 */
export const logger = {
  debug: (message: string, data?: unknown) => getLogger().debug(message, data),
  info: (message: string, data?: unknown) => getLogger().info(message, data),
  warn: (message: string, data?: unknown) => getLogger().warn(message, data),
  error: (message: string, data?: unknown) => getLogger().error(message, data),
};

export function isDebugEnabled(): boolean {
  return getLogger().isLevelEnabled('debug');
}
