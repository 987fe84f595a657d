/**
 * Default configuration values for triz.toml.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, PathConfig, ValidationConfig } from './types.js';

/**
 * Default paths, relative to the working directory.
 */
export const DEFAULT_PATHS: PathConfig = {
  sessions: '.triz/sessions',
  catalog: '',
};

/**
 * Default findings validation thresholds.
 */
export const DEFAULT_VALIDATION: ValidationConfig = {
  min_content_length: 10,
  field_key_prefix_length: 40,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  paths: DEFAULT_PATHS,
  validation: DEFAULT_VALIDATION,
  logging: DEFAULT_LOGGING,
};

/**
 * File name looked up in the working directory when no config path is given.
 */
export const DEFAULT_CONFIG_FILE = 'triz.toml';
