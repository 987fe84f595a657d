import { describe, expect, it } from 'vitest';
import {
  ConfigValidationError,
  assertConfigValid,
  getDefaultConfig,
  validateConfig,
} from './index.js';

describe('Config Validator', () => {
  it('should accept the default configuration', () => {
    expect(validateConfig(getDefaultConfig())).toEqual({ valid: true, errors: [] });
  });

  it('should reject non-integer and non-positive lengths', () => {
    const config = getDefaultConfig();
    config.validation.min_content_length = 0;
    config.validation.field_key_prefix_length = 12.5;

    const result = validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.field)).toEqual([
      'validation.min_content_length',
      'validation.field_key_prefix_length',
    ]);
  });

  it('should reject a prefix length below the minimum', () => {
    const config = getDefaultConfig();
    config.validation.field_key_prefix_length = 4;

    const result = validateConfig(config);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.message).toBe(
      "'validation.field_key_prefix_length' must be at least 8"
    );
  });

  it('should reject an empty sessions path', () => {
    const config = getDefaultConfig();
    config.paths.sessions = '  ';

    expect(validateConfig(config).errors[0]?.field).toBe('paths.sessions');
  });

  it('should throw ConfigValidationError listing every error', () => {
    const config = getDefaultConfig();
    config.validation.min_content_length = -1;

    expect(() => {
      assertConfigValid(config);
    }).toThrow(ConfigValidationError);
    expect(() => {
      assertConfigValid(config);
    }).toThrow(/failed with 1 error\(s\)/);
  });
});
