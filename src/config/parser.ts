/**
 * TOML configuration parser for triz.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_PATHS, DEFAULT_VALIDATION } from './defaults.js';
import type { Config, LoggingConfig, PathConfig, ValidationConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Narrows a raw TOML value to a table, rejecting scalars and arrays.
 */
function asTable(value: unknown, section: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected table`);
  }
  return value as Record<string, unknown>;
}

function parsePaths(raw: Record<string, unknown> | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('sessions' in raw) {
    result.sessions = validateString(raw.sessions, 'paths.sessions');
  }
  if ('catalog' in raw) {
    result.catalog = validateString(raw.catalog, 'paths.catalog');
  }

  return result;
}

function parseValidation(raw: Record<string, unknown> | undefined): ValidationConfig {
  const result: ValidationConfig = { ...DEFAULT_VALIDATION };
  if (raw === undefined) {
    return result;
  }

  if ('min_content_length' in raw) {
    result.min_content_length = validateNumber(
      raw.min_content_length,
      'validation.min_content_length'
    );
  }
  if ('field_key_prefix_length' in raw) {
    result.field_key_prefix_length = validateNumber(
      raw.field_key_prefix_length,
      'validation.field_key_prefix_length'
    );
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a Config, filling missing fields with defaults.
 *
 * @param tomlContent - Raw TOML content.
 * @returns The parsed configuration.
 * @throws ConfigParseError for invalid TOML syntax or wrongly typed values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [validation]
 * min_content_length = 20
 * `);
 * config.validation.min_content_length; // 20
 * config.paths.sessions; // ".triz/sessions"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    paths: parsePaths(asTable(parsed.paths, 'paths')),
    validation: parseValidation(asTable(parsed.validation, 'validation')),
    logging: parseLogging(asTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    paths: { ...DEFAULT_CONFIG.paths },
    validation: { ...DEFAULT_CONFIG.validation },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
