/**
 * Semantic validation for configuration values.
 *
 * Checks ranges that type checking in the parser cannot express.
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Smallest prefix length accepted for field key normalization.
 * Shorter prefixes make distinct field names collide.
 */
export const MIN_FIELD_KEY_PREFIX_LENGTH = 8;

function validatePositiveInteger(value: number, fieldPath: string, errors: ValidationError[]): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration.
 * @returns Validation result with any errors.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.paths.sessions.trim() === '') {
    errors.push({
      field: 'paths.sessions',
      value: config.paths.sessions,
      message: `'paths.sessions' cannot be empty`,
    });
  }

  validatePositiveInteger(
    config.validation.min_content_length,
    'validation.min_content_length',
    errors
  );

  validatePositiveInteger(
    config.validation.field_key_prefix_length,
    'validation.field_key_prefix_length',
    errors
  );
  if (config.validation.field_key_prefix_length < MIN_FIELD_KEY_PREFIX_LENGTH) {
    errors.push({
      field: 'validation.field_key_prefix_length',
      value: config.validation.field_key_prefix_length,
      message: `'validation.field_key_prefix_length' must be at least ${String(MIN_FIELD_KEY_PREFIX_LENGTH)}`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
