/**
 * Configuration types for triz.toml parsing.
 *
 * Field names use snake_case to match the TOML keys.
 *
 * @packageDocumentation
 */

/**
 * Filesystem locations used by the engine.
 */
export interface PathConfig {
  /** Directory holding one JSON document and one trace file per session. */
  sessions: string;
  /** Path to a custom step catalog. Empty string selects the bundled catalog. */
  catalog: string;
}

/**
 * Structural validation thresholds applied to submitted findings.
 */
export interface ValidationConfig {
  /** Minimum trimmed length of every string value in a findings mapping. */
  min_content_length: number;
  /** Number of characters kept when normalizing field keys for matching. */
  field_key_prefix_length: number;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level log entries. */
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  paths: PathConfig;
  validation: ValidationConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration used for overrides.
 */
export interface PartialConfig {
  paths?: Partial<PathConfig>;
  validation?: Partial<ValidationConfig>;
  logging?: Partial<LoggingConfig>;
}
