/**
 * Configuration module for triz.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  LoggingConfig,
  PartialConfig,
  PathConfig,
  ValidationConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
  DEFAULT_VALIDATION,
} from './defaults.js';
export {
  ConfigValidationError,
  MIN_FIELD_KEY_PREFIX_LENGTH,
  validateConfig,
  assertConfigValid,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
