/**
 * Environment variable registry
 *
 * Every variable threadline reads, with its kind, default and a one-line
 * summary. `validateEnv` checks an environment against the registry and
 * `getEnvSummary` renders it for diagnostics. Parsing into a typed
 * configuration lives in threadline-config.ts.
 */

export type EnvCategory = 'workers' | 'logging';

export type EnvKind = 'enum' | 'integer' | 'path' | 'flag';

export interface EnvVarDef {
  name: string;
  kind: EnvKind;
  /** Value used when the variable is unset */
  default?: string;
  summary: string;
  category: EnvCategory;
  /** Accepted values of an enum */
  choices?: readonly string[];
  /** Compare enum values case-insensitively */
  ignoreCase?: boolean;
  /** An unknown value falls back to the default instead of failing */
  lenient?: boolean;
  /** Inclusive bounds of an integer */
  min?: number;
  max?: number;
}

export const ENV_SCHEMA: readonly EnvVarDef[] = [
  {
    name: 'THREADLINE_WORKER_ADAPTER',
    kind: 'enum',
    default: 'thread',
    summary: 'Where tasks run: a worker thread each, or inline on the event loop',
    category: 'workers',
    choices: ['thread', 'inline'],
  },
  {
    name: 'THREADLINE_DEFAULT_CONCURRENCY',
    kind: 'integer',
    default: '10',
    summary: 'Limit used by concurrent() when none is passed',
    category: 'workers',
    min: 1,
  },
  {
    name: 'THREADLINE_WORKER_MEMORY_MB',
    kind: 'integer',
    summary: 'Old-generation heap limit of each worker thread',
    category: 'workers',
    min: 16,
    max: 4096,
  },
  {
    name: 'LOG_LEVEL',
    kind: 'enum',
    default: 'info',
    summary: 'Lowest level written by the logger',
    category: 'logging',
    choices: ['debug', 'info', 'warn', 'error'],
    ignoreCase: true,
    lenient: true,
  },
  {
    name: 'LOG_FORMAT',
    kind: 'enum',
    default: 'text',
    summary: 'Log line format',
    category: 'logging',
    choices: ['text', 'json'],
    ignoreCase: true,
    lenient: true,
  },
  {
    name: 'LOG_FILE',
    kind: 'path',
    summary: 'Append log lines to this file instead of stderr',
    category: 'logging',
  },
  {
    name: 'NO_COLOR',
    kind: 'flag',
    summary: 'Disable colored log levels',
    category: 'logging',
  },
];

const definitions = new Map(ENV_SCHEMA.map((def) => [def.name, def]));

export function getEnvDef(name: string): EnvVarDef | undefined {
  return definitions.get(name);
}

// ============================================================================
// Validation
// ============================================================================

export interface ValidationResult {
  valid: boolean;
  /** Values that are ignored or misread */
  warnings: string[];
  /** Values loadConfig() rejects */
  errors: string[];
}

type Check = { level: 'error' | 'warning'; message: string } | null;

const FLAG_VALUES = ['true', 'false', '1', '0', 'yes', 'no'];

function checkValue(def: EnvVarDef, raw: string): Check {
  switch (def.kind) {
    case 'enum': {
      const value = def.ignoreCase ? raw.toLowerCase() : raw;
      if (!def.choices || def.choices.includes(value)) {
        return null;
      }
      const message = `${def.name} must be one of ${def.choices.join(', ')}, got "${raw}"`;
      return def.lenient
        ? { level: 'warning', message: `${message}; using ${def.default}` }
        : { level: 'error', message };
    }

    case 'integer': {
      const value = Number(raw);
      if (!Number.isInteger(value)) {
        return { level: 'error', message: `${def.name} must be an integer, got "${raw}"` };
      }
      if (def.min !== undefined && value < def.min) {
        return { level: 'error', message: `${def.name}=${raw} is below the minimum of ${def.min}` };
      }
      if (def.max !== undefined && value > def.max) {
        return { level: 'error', message: `${def.name}=${raw} is above the maximum of ${def.max}` };
      }
      return null;
    }

    case 'flag':
      if (!FLAG_VALUES.includes(raw.toLowerCase())) {
        return {
          level: 'warning',
          message: `${def.name}="${raw}" is not a recognised flag value; any non-empty value enables it`,
        };
      }
      return null;

    case 'path':
      return null;
  }
}

/**
 * Check every registered variable that is set in `env`
 */
export function validateEnv(env: Record<string, string | undefined> = process.env): ValidationResult {
  const result: ValidationResult = { valid: true, warnings: [], errors: [] };

  for (const def of ENV_SCHEMA) {
    const raw = env[def.name];
    if (!raw) {
      continue;
    }
    const check = checkValue(def, raw);
    if (check?.level === 'error') {
      result.errors.push(check.message);
    } else if (check) {
      result.warnings.push(check.message);
    }
  }

  result.valid = result.errors.length === 0;
  return result;
}

// ============================================================================
// Summary
// ============================================================================

const CATEGORIES: Array<[EnvCategory, string]> = [
  ['workers', 'Workers'],
  ['logging', 'Logging'],
];

const NAME_WIDTH = Math.max(...ENV_SCHEMA.map((def) => def.name.length)) + 2;

function describeValue(def: EnvVarDef, raw: string | undefined): string {
  if (raw) {
    return raw;
  }
  return def.default !== undefined ? `${def.default} (default)` : '-';
}

/**
 * Render the effective environment, grouped by category, followed by
 * any validation problems
 */
export function getEnvSummary(env: Record<string, string | undefined> = process.env): string {
  const title = 'threadline environment';
  const lines = [title, '='.repeat(title.length)];

  for (const [category, heading] of CATEGORIES) {
    lines.push('', `${heading}:`);
    for (const def of ENV_SCHEMA) {
      if (def.category === category) {
        lines.push(`  ${def.name.padEnd(NAME_WIDTH)}${describeValue(def, env[def.name])}`);
      }
    }
  }

  const { errors, warnings } = validateEnv(env);
  if (errors.length > 0 || warnings.length > 0) {
    lines.push('', 'Problems:');
    lines.push(...errors.map((message) => `  error: ${message}`));
    lines.push(...warnings.map((message) => `  warning: ${message}`));
  }

  return lines.join('\n');
}
