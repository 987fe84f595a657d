/**
 * TOML step catalog parser.
 *
 * The catalog holds one `[[step]]` table per protocol step. Parsing checks
 * numbering, required text, field name collisions, aliases and placeholder
 * syntax so that a catalog that loads can serve every step.
 *
 * @packageDocumentation
 */

import * as toml from '@iarna/toml';
import { fileURLToPath } from 'node:url';
import { checkTemplate } from './template.js';
import { DEFAULT_VALIDATION_OPTIONS, normalizeFieldKey } from '../validator.js';
import { STEP_KEY_PATTERN, TOTAL_STEPS } from '../types.js';
import { safeReadFile } from '../../utils/safe-fs.js';

/**
 * Catalog bundled with the package.
 */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../../catalog/steps.toml', import.meta.url)
);

/**
 * One `[[step]]` table. Text fields may contain placeholders.
 */
export interface StepDefinition {
  readonly number: number;
  readonly title: string;
  readonly task: string;
  readonly tool: string;
  readonly searchQueries: readonly string[];
  readonly requiredFields: readonly string[];
  readonly validationCriteria: string;
  readonly rationale: string;
  readonly aliases: Readonly<Record<string, string>>;
}

/**
 * A parsed catalog; `steps[n - 1]` defines step n.
 */
export interface StepCatalog {
  readonly filePath: string;
  readonly steps: readonly StepDefinition[];
}

/**
 * Error type for catalog parsing failures.
 */
export interface CatalogParseError {
  /** Discriminator for error type. */
  error: true;
  type: 'parse_error' | 'validation_error';
  message: string;
  filePath: string;
  /** Field that caused the error, e.g. `step[3].required_fields`. */
  field?: string;
}

/**
 * Result type for parsing functions.
 */
export type ParseResult<T> = T | CatalogParseError;

/**
 * Type guard to check if a result is an error.
 */
export function isCatalogError<T>(result: ParseResult<T>): result is CatalogParseError {
  return typeof result === 'object' && result !== null && 'error' in result && result.error;
}

export interface CatalogParseOptions {
  /** Reported in errors. */
  readonly filePath?: string;
  /** Prefix length used for the field collision check. */
  readonly fieldKeyPrefixLength?: number;
}

function createError(
  type: 'parse_error' | 'validation_error',
  message: string,
  filePath: string,
  field?: string
): CatalogParseError {
  if (field !== undefined) {
    return { error: true, type, message, filePath, field };
  }
  return { error: true, type, message, filePath };
}

function isTable(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const ALIAS_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TEMPLATE_KEYS = ['title', 'task', 'validation_criteria', 'rationale'] as const;

function readText(
  table: Readonly<Record<string, unknown>>,
  key: string,
  field: string,
  filePath: string
): ParseResult<string> {
  const value = table[key];
  if (typeof value !== 'string' || value.trim() === '') {
    return createError(
      'validation_error',
      `Missing or empty "${key}" in ${field}`,
      filePath,
      `${field}.${key}`
    );
  }
  return value;
}

function readTextList(
  table: Readonly<Record<string, unknown>>,
  key: string,
  field: string,
  filePath: string
): ParseResult<string[]> {
  const value: unknown = table[key];
  if (!Array.isArray(value) || value.length === 0) {
    return createError(
      'validation_error',
      `"${key}" in ${field} must be a non-empty array of strings`,
      filePath,
      `${field}.${key}`
    );
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string' || item.trim() === '') {
      return createError(
        'validation_error',
        `"${key}" in ${field} must contain only non-empty strings`,
        filePath,
        `${field}.${key}`
      );
    }
    items.push(item);
  }
  return items;
}

function readAliases(
  table: Readonly<Record<string, unknown>>,
  requiredFields: readonly string[],
  field: string,
  filePath: string
): ParseResult<Record<string, string>> {
  const value = table.aliases;
  if (value === undefined) {
    return {};
  }
  if (!isTable(value)) {
    return createError(
      'validation_error',
      `"aliases" in ${field} must be a table`,
      filePath,
      `${field}.aliases`
    );
  }

  const aliases: Record<string, string> = {};
  for (const [alias, source] of Object.entries(value)) {
    if (!ALIAS_NAME_PATTERN.test(alias) || alias === 'problem' || STEP_KEY_PATTERN.test(alias)) {
      return createError(
        'validation_error',
        `Invalid alias name "${alias}" in ${field}`,
        filePath,
        `${field}.aliases.${alias}`
      );
    }
    if (typeof source !== 'string' || !requiredFields.includes(source)) {
      return createError(
        'validation_error',
        `Alias "${alias}" in ${field} must name one of the required fields`,
        filePath,
        `${field}.aliases.${alias}`
      );
    }
    aliases[alias] = source;
  }
  return aliases;
}

function parseStep(
  entry: unknown,
  index: number,
  filePath: string,
  prefixLength: number
): ParseResult<StepDefinition> {
  const field = `step[${String(index)}]`;
  if (!isTable(entry)) {
    return createError('validation_error', `${field} must be a table`, filePath, field);
  }

  const expected = index + 1;
  if (entry.number !== expected) {
    return createError(
      'validation_error',
      `${field}.number must be ${String(expected)}; steps are numbered 1 to ${String(TOTAL_STEPS)} in order`,
      filePath,
      `${field}.number`
    );
  }

  const texts: Record<string, string> = {};
  for (const key of [...TEMPLATE_KEYS, 'tool']) {
    const text = readText(entry, key, field, filePath);
    if (isCatalogError(text)) {
      return text;
    }
    texts[key] = text;
  }

  const searchQueries = readTextList(entry, 'search_queries', field, filePath);
  if (isCatalogError(searchQueries)) {
    return searchQueries;
  }
  const requiredFields = readTextList(entry, 'required_fields', field, filePath);
  if (isCatalogError(requiredFields)) {
    return requiredFields;
  }

  const seen = new Map<string, string>();
  for (const name of requiredFields) {
    const normalized = normalizeFieldKey(name, prefixLength);
    const previous = seen.get(normalized);
    if (previous !== undefined) {
      return createError(
        'validation_error',
        `Required fields "${previous}" and "${name}" in ${field} normalize to the same key`,
        filePath,
        `${field}.required_fields`
      );
    }
    seen.set(normalized, name);
  }

  const aliases = readAliases(entry, requiredFields, field, filePath);
  if (isCatalogError(aliases)) {
    return aliases;
  }

  for (const [key, template] of [
    ...TEMPLATE_KEYS.map((k): [string, string] => [k, texts[k] ?? '']),
    ...searchQueries.map((q, i): [string, string] => [`search_queries[${String(i)}]`, q]),
  ]) {
    const [problem] = checkTemplate(template);
    if (problem !== undefined) {
      return createError('validation_error', problem, filePath, `${field}.${key}`);
    }
  }

  return {
    number: expected,
    title: texts.title ?? '',
    task: texts.task ?? '',
    tool: texts.tool ?? '',
    searchQueries,
    requiredFields,
    validationCriteria: texts.validation_criteria ?? '',
    rationale: texts.rationale ?? '',
    aliases,
  };
}

/**
 * Parses a step catalog from a TOML string.
 *
 * @returns Either the catalog or the first error found.
 */
export function parseStepCatalog(
  tomlStr: string,
  options: CatalogParseOptions = {}
): ParseResult<StepCatalog> {
  const filePath = options.filePath ?? '<string>';
  const prefixLength =
    options.fieldKeyPrefixLength ?? DEFAULT_VALIDATION_OPTIONS.fieldKeyPrefixLength;

  let parsed: unknown;
  try {
    parsed = toml.parse(tomlStr);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return createError('parse_error', `Failed to parse TOML: ${message}`, filePath);
  }

  const entries: unknown = isTable(parsed) ? parsed.step : undefined;
  if (!Array.isArray(entries)) {
    return createError('validation_error', 'Missing [[step]] tables', filePath, 'step');
  }
  if (entries.length !== TOTAL_STEPS) {
    return createError(
      'validation_error',
      `Expected ${String(TOTAL_STEPS)} [[step]] tables, found ${String(entries.length)}`,
      filePath,
      'step'
    );
  }

  const steps: StepDefinition[] = [];
  const aliasOwners = new Map<string, number>();
  for (const [index, entry] of entries.entries()) {
    const step = parseStep(entry, index, filePath, prefixLength);
    if (isCatalogError(step)) {
      return step;
    }
    for (const alias of Object.keys(step.aliases)) {
      const owner = aliasOwners.get(alias);
      if (owner !== undefined) {
        return createError(
          'validation_error',
          `Alias "${alias}" is declared by steps ${String(owner)} and ${String(step.number)}`,
          filePath,
          `step[${String(index)}].aliases.${alias}`
        );
      }
      aliasOwners.set(alias, step.number);
    }
    steps.push(step);
  }

  return { filePath, steps };
}

/**
 * Loads and parses a step catalog file.
 *
 * @param filePath - Catalog path; the bundled catalog when omitted or empty.
 * @throws Error listing the parse failure.
 */
export async function loadStepCatalog(
  filePath?: string,
  options: Omit<CatalogParseOptions, 'filePath'> = {}
): Promise<StepCatalog> {
  const path = filePath !== undefined && filePath !== '' ? filePath : DEFAULT_CATALOG_PATH;
  const content = await safeReadFile(path);
  const result = parseStepCatalog(content, { ...options, filePath: path });
  if (isCatalogError(result)) {
    throw new Error(`Failed to load catalog:\n${result.filePath}: ${result.message}`);
  }
  return result;
}

/**
 * Returns the definition of a step.
 *
 * @throws RangeError for step numbers outside the catalog.
 */
export function getStepDefinition(catalog: StepCatalog, stepNumber: number): StepDefinition {
  const step = catalog.steps[stepNumber - 1];
  if (step === undefined || !Number.isInteger(stepNumber)) {
    throw new RangeError(`Step ${String(stepNumber)} is not in the catalog`);
  }
  return step;
}
