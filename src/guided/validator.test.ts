/**
 * Tests for findings validation.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { makeInstruction } from './test-helpers.js';
import {
  findFieldKey,
  isFindingsObject,
  isJsonValue,
  normalizeFieldKey,
  validateFindings,
} from './validator.js';

const instruction = makeInstruction(3, {
  title: 'Research Super-System environment',
  requiredFields: ['users', 'user_needs', 'operating_environment'],
});

describe('normalizeFieldKey', () => {
  it('should lower-case, trim and replace whitespace runs with underscores', () => {
    expect(normalizeFieldKey('  Operating   Environment ', 40)).toBe('operating_environment');
  });

  it('should truncate to the prefix length', () => {
    expect(normalizeFieldKey('operating_environment', 9)).toBe('operating');
  });
});

describe('isFindingsObject', () => {
  it('should accept plain and null-prototype objects', () => {
    expect(isFindingsObject({ a: 1 })).toBe(true);
    expect(isFindingsObject(Object.create(null))).toBe(true);
  });

  it.each([null, undefined, 'text', 42, ['a'], new Date(0), new Map()])(
    'should reject %p',
    (value) => {
      expect(isFindingsObject(value)).toBe(false);
    }
  );
});

describe('findFieldKey', () => {
  it('should prefer an exact key', () => {
    expect(findFieldKey({ 'User Needs': 'x', user_needs: 'y' }, 'user_needs')).toBe('user_needs');
  });

  it('should match a normalized variant', () => {
    expect(findFieldKey({ 'User Needs': 'x' }, 'user_needs')).toBe('User Needs');
  });

  it('should return undefined when nothing matches', () => {
    expect(findFieldKey({ users: 'x' }, 'user_needs')).toBeUndefined();
  });
});

describe('validateFindings', () => {
  it('should accept complete findings with a message naming the step title', () => {
    const result = validateFindings(instruction, {
      users: 'Commuters and delivery riders',
      user_needs: ['Low vibration at speed'],
      operating_environment: { climate: 'wet urban roads' },
    });

    expect(result).toEqual({
      valid: true,
      message: 'Step 3 validated successfully: Research Super-System environment',
      findings: {
        users: 'Commuters and delivery riders',
        user_needs: ['Low vibration at speed'],
        operating_environment: { climate: 'wet urban roads' },
      },
    });
  });

  it('should accept normalized key variants', () => {
    const result = validateFindings(instruction, {
      Users: 'Commuters and delivery riders',
      'User Needs': 'Low vibration at speed',
      'OPERATING ENVIRONMENT': 'Wet urban roads all year',
    });

    expect(result.valid).toBe(true);
  });

  it('should list every missing field by its declared name', () => {
    const result = validateFindings(instruction, { users: 'Commuters and delivery riders' });

    expect(result).toEqual({
      valid: false,
      message: 'Missing required findings: user_needs, operating_environment',
      hint: 'Provide all required fields: users, user_needs, operating_environment',
      missingFields: ['user_needs', 'operating_environment'],
      invalidFields: [],
    });
  });

  it('should reject short strings and empty collections', () => {
    const result = validateFindings(instruction, {
      users: '  n/a     ',
      user_needs: [],
      operating_environment: {},
      extra_notes: null,
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.invalidFields).toEqual([
        'users',
        'user_needs',
        'operating_environment',
        'extra_notes',
      ]);
      expect(result.message).toBe(
        'Findings too short or empty: users, user_needs, operating_environment, extra_notes'
      );
      expect(result.hint).toBe(
        'Text findings need at least 10 characters; lists and objects must not be empty'
      );
    }
  });

  it('should accept numbers and booleans without a length check', () => {
    const numeric = makeInstruction(9, { requiredFields: ['ideality_score', 'reviewed'] });
    expect(validateFindings(numeric, { ideality_score: 0.4, reviewed: false }).valid).toBe(true);
  });

  it('should reject values that do not survive a JSON round trip', () => {
    const result = validateFindings(instruction, {
      users: 12345678901234567890n,
      user_needs: Number.NaN,
      operating_environment: { climate: undefined },
      scale: Number.POSITIVE_INFINITY,
      callback: () => 'n/a',
      gaps: ['documented gap', undefined],
      notes: 'Field engineers in remote sites',
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.missingFields).toEqual([]);
      expect(result.invalidFields).toEqual([
        'users',
        'user_needs',
        'operating_environment',
        'scale',
        'callback',
        'gaps',
      ]);
      expect(result.message).toBe(
        'Findings cannot be stored as JSON: users, user_needs, operating_environment, scale, callback, gaps'
      );
    }
  });

  it('should reject cyclic and non-plain objects', () => {
    const cyclic: Record<string, unknown> = { label: 'loop' };
    cyclic['self'] = cyclic;
    const result = validateFindings(instruction, {
      users: cyclic,
      user_needs: new Date(0),
      operating_environment: 'Dusty workshop floors',
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.invalidFields).toEqual(['users', 'user_needs']);
    }
  });

  it('should accept shared references that are not cycles', () => {
    const shared = { source: 'interview' };
    const result = validateFindings(instruction, {
      users: [shared, shared],
      user_needs: { first: shared, second: shared },
      operating_environment: 'Dusty workshop floors',
    });
    expect(result.valid).toBe(true);
  });

  it('should treat every JSON value as storable (property-based)', () => {
    fc.assert(
      fc.property(fc.jsonValue(), (value) => {
        expect(isJsonValue(value)).toBe(true);
      })
    );
  });

  it('should honour custom thresholds', () => {
    const result = validateFindings(
      instruction,
      { users: 'abc', user_needs: 'def', operating_environment: 'ghi' },
      { minContentLength: 3, fieldKeyPrefixLength: 40 }
    );
    expect(result.valid).toBe(true);
  });

  it('should reject non-object findings listing every required field as missing', () => {
    const result = validateFindings(instruction, ['users']);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.message).toBe('Findings must be an object mapping field names to values');
      expect(result.missingFields).toEqual(['users', 'user_needs', 'operating_environment']);
    }
  });

  it('should report exactly the omitted fields for any subset (property-based)', () => {
    const fields = ['alpha_field', 'beta_field', 'gamma_field', 'delta_field', 'epsilon_field'];
    const wide = makeInstruction(20, { requiredFields: fields });

    fc.assert(
      fc.property(fc.subarray(fields), (present) => {
        const findings = Object.fromEntries(present.map((f) => [f, 'long enough value']));
        const result = validateFindings(wide, findings);
        const expectedMissing = fields.filter((f) => !present.includes(f));

        if (expectedMissing.length === 0) {
          expect(result.valid).toBe(true);
        } else {
          expect(result.valid).toBe(false);
          if (!result.valid) {
            expect(result.missingFields).toEqual(expectedMissing);
          }
        }
      })
    );
  });
});
