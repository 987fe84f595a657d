/**
 * Structural validation of submitted findings.
 *
 * Checks presence of every required field and that each submitted value has
 * content. It does not judge whether the research is correct.
 *
 * @packageDocumentation
 */

import type { Findings, StepInstruction } from './types.js';

/**
 * Thresholds for findings validation.
 */
export interface ValidationOptions {
  /** Minimum trimmed length of every string value. */
  readonly minContentLength: number;
  /** Characters kept when normalizing keys for matching. */
  readonly fieldKeyPrefixLength: number;
}

/**
 * Default validation thresholds.
 */
export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  minContentLength: 10,
  fieldKeyPrefixLength: 40,
};

/**
 * Outcome of validating a findings submission.
 */
export type FindingsValidation =
  | {
      readonly valid: true;
      readonly message: string;
      readonly findings: Findings;
    }
  | {
      readonly valid: false;
      readonly message: string;
      readonly hint: string;
      /** Required fields without a matching key, by their declared names. */
      readonly missingFields: readonly string[];
      /** Submitted keys whose values are too short or empty. */
      readonly invalidFields: readonly string[];
    };

/**
 * Normalizes a field name or findings key for lenient matching.
 *
 * @example
 * ```typescript
 * normalizeFieldKey('Sub System Components', 40); // "sub_system_components"
 * ```
 */
export function normalizeFieldKey(key: string, prefixLength: number): string {
  return key.trim().toLowerCase().replace(/\s+/g, '_').slice(0, prefixLength);
}

/**
 * Checks whether a value is a plain object usable as a findings mapping.
 */
export function isFindingsObject(value: unknown): value is Findings {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Finds the key in `findings` that satisfies a required field.
 *
 * An exact key wins; otherwise the first key whose normalized form equals
 * the field's normalized form is returned.
 *
 * @returns The matching key, or undefined.
 */
export function findFieldKey(
  findings: Findings,
  field: string,
  prefixLength: number = DEFAULT_VALIDATION_OPTIONS.fieldKeyPrefixLength
): string | undefined {
  if (Object.prototype.hasOwnProperty.call(findings, field)) {
    return field;
  }
  const target = normalizeFieldKey(field, prefixLength);
  return Object.keys(findings).find((key) => normalizeFieldKey(key, prefixLength) === target);
}

/**
 * Checks whether a value equals its own JSON copy: null, strings, booleans,
 * finite numbers, and arrays or plain objects of those, without cycles.
 */
export function isJsonValue(value: unknown, ancestors: readonly object[] = []): boolean {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (typeof value !== 'object' || ancestors.includes(value)) {
    return false;
  }
  const path = [...ancestors, value];
  if (Array.isArray(value)) {
    return value.every((item: unknown) => isJsonValue(item, path));
  }
  return isFindingsObject(value) && Object.values(value).every((item) => isJsonValue(item, path));
}

function hasContent(value: unknown, minContentLength: number): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim().length >= minContentLength;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return true;
}

function describeRequiredFields(instruction: StepInstruction): string {
  return `Provide all required fields: ${instruction.requiredFields.join(', ')}`;
}

/**
 * Validates findings against a step instruction.
 *
 * @param instruction - The instruction the findings answer.
 * @param findings - The submitted value, not yet known to be an object.
 * @param options - Validation thresholds.
 */
export function validateFindings(
  instruction: StepInstruction,
  findings: unknown,
  options: ValidationOptions = DEFAULT_VALIDATION_OPTIONS
): FindingsValidation {
  if (!isFindingsObject(findings)) {
    return {
      valid: false,
      message: 'Findings must be an object mapping field names to values',
      hint: describeRequiredFields(instruction),
      missingFields: [...instruction.requiredFields],
      invalidFields: [],
    };
  }

  const missingFields = instruction.requiredFields.filter(
    (field) => findFieldKey(findings, field, options.fieldKeyPrefixLength) === undefined
  );

  if (missingFields.length > 0) {
    return {
      valid: false,
      message: `Missing required findings: ${missingFields.join(', ')}`,
      hint: describeRequiredFields(instruction),
      missingFields,
      invalidFields: [],
    };
  }

  const unstorableFields = Object.keys(findings).filter(
    (key) => findings[key] !== undefined && !isJsonValue(findings[key])
  );

  if (unstorableFields.length > 0) {
    return {
      valid: false,
      message: `Findings cannot be stored as JSON: ${unstorableFields.join(', ')}`,
      hint: 'Use strings, finite numbers, booleans, lists and objects; undefined, NaN, Infinity, bigint and function values are not allowed',
      missingFields: [],
      invalidFields: unstorableFields,
    };
  }

  const invalidFields = Object.keys(findings).filter(
    (key) => !hasContent(findings[key], options.minContentLength)
  );

  if (invalidFields.length > 0) {
    return {
      valid: false,
      message: `Findings too short or empty: ${invalidFields.join(', ')}`,
      hint: `Text findings need at least ${String(options.minContentLength)} characters; lists and objects must not be empty`,
      missingFields: [],
      invalidFields,
    };
  }

  return {
    valid: true,
    message: `Step ${String(instruction.stepNumber)} validated successfully: ${instruction.title}`,
    findings,
  };
}
