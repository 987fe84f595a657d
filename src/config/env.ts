/**
 * Environment variable overrides for configuration.
 *
 * TRIZ_* variables override values from triz.toml, which override defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvVarMapping =
  | {
      readonly type: 'string';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: string) => void;
    }
  | {
      readonly type: 'number';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: number) => void;
    }
  | {
      readonly type: 'boolean';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: boolean) => void;
    };

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: TRIZ_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * TRIZ_SESSIONS_DIR and TRIZ_DEBUG are shortcuts. When both a shortcut and
 * the full name are set, the full name wins because it is applied later.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  TRIZ_SESSIONS_DIR: {
    type: 'string',
    description: 'Override the sessions directory (shortcut for TRIZ_PATHS_SESSIONS)',
    apply: (o, v) => {
      o.paths = { ...o.paths, sessions: v };
    },
  },
  TRIZ_PATHS_SESSIONS: {
    type: 'string',
    description: 'Override the sessions directory',
    apply: (o, v) => {
      o.paths = { ...o.paths, sessions: v };
    },
  },
  TRIZ_PATHS_CATALOG: {
    type: 'string',
    description: 'Override the step catalog path',
    apply: (o, v) => {
      o.paths = { ...o.paths, catalog: v };
    },
  },
  TRIZ_VALIDATION_MIN_CONTENT_LENGTH: {
    type: 'number',
    description: 'Override the minimum trimmed length of string findings',
    apply: (o, v) => {
      o.validation = { ...o.validation, min_content_length: v };
    },
  },
  TRIZ_VALIDATION_FIELD_KEY_PREFIX_LENGTH: {
    type: 'number',
    description: 'Override the prefix length used when normalizing field keys',
    apply: (o, v) => {
      o.validation = { ...o.validation, field_key_prefix_length: v };
    },
  },
  TRIZ_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging (shortcut for TRIZ_LOGGING_DEBUG)',
    apply: (o, v) => {
      o.logging = { ...o.logging, debug: v };
    },
  },
  TRIZ_LOGGING_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging',
    apply: (o, v) => {
      o.logging = { ...o.logging, debug: v };
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is empty or not numeric.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', case-insensitively.
 *
 * @throws EnvCoercionError if the value is not one of the accepted words.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function applyMapping(
  overrides: PartialConfig,
  mapping: EnvVarMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(overrides, value);
      return;
    case 'number':
      mapping.apply(overrides, coerceToNumber(value, envVar));
      return;
    case 'boolean':
      mapping.apply(overrides, coerceToBoolean(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied, in application order. */
  appliedVars: string[];
  /** Coercion errors, populated only when `collectErrors` is set. */
  errors: EnvCoercionError[];
}

/**
 * Reads TRIZ_* environment variables into a partial configuration.
 *
 * Unset and empty variables are ignored.
 *
 * @param env - The environment to read (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Overrides, the applied variable names and any collected errors.
 * @throws EnvCoercionError on the first bad value unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ TRIZ_SESSIONS_DIR: '/data/sessions' });
 * result.overrides.paths?.sessions; // "/data/sessions"
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    paths: { ...base.paths, ...partial.paths },
    validation: { ...base.validation, ...partial.validation },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies TRIZ_* environment overrides to a configuration.
 *
 * @param config - The base configuration.
 * @param env - The environment to read (defaults to process.env).
 * @returns A new configuration with environment values taking precedence.
 * @throws EnvCoercionError if a variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Documentation for every supported environment variable, for help output.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
