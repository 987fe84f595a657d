/**
 * Tests for the TOML step catalog parser.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  getStepDefinition,
  isCatalogError,
  loadStepCatalog,
  parseStepCatalog,
  type CatalogParseError,
  type StepCatalog,
} from './catalog.js';

type StepOverrides = Readonly<Record<string, string>>;

function stepToml(stepNumber: number, overrides: StepOverrides = {}): string {
  const fields: Record<string, string> = {
    number: String(stepNumber),
    title: `'Step ${String(stepNumber)}'`,
    task: `'Task for {{problem}}'`,
    tool: `'Tool'`,
    search_queries: `['query {{problem}}']`,
    required_fields: `['finding_a', 'finding_b']`,
    validation_criteria: `'Both present'`,
    rationale: `'Needed later'`,
    ...overrides,
  };
  const lines = Object.entries(fields)
    .filter(([, value]) => value !== '')
    .map(([key, value]) => `${key} = ${value}`);
  return `[[step]]\n${lines.join('\n')}\n`;
}

function catalogToml(
  overrides: ReadonlyMap<number, StepOverrides> = new Map(),
  count = 60
): string {
  return Array.from({ length: count }, (_, i) => stepToml(i + 1, overrides.get(i + 1))).join('\n');
}

function expectError(toml: string): CatalogParseError {
  const result = parseStepCatalog(toml);
  if (!isCatalogError(result)) {
    throw new Error('expected a catalog error');
  }
  return result;
}

describe('parseStepCatalog', () => {
  it('parses a complete catalog', () => {
    const result = parseStepCatalog(
      catalogToml(new Map([[3, { aliases: `{ first_finding = 'finding_a' }` }]]))
    );

    expect(isCatalogError(result)).toBe(false);
    const catalog = result as StepCatalog;
    expect(catalog.filePath).toBe('<string>');
    expect(catalog.steps).toHaveLength(60);
    expect(catalog.steps[0]).toEqual({
      number: 1,
      title: 'Step 1',
      task: 'Task for {{problem}}',
      tool: 'Tool',
      searchQueries: ['query {{problem}}'],
      requiredFields: ['finding_a', 'finding_b'],
      validationCriteria: 'Both present',
      rationale: 'Needed later',
      aliases: {},
    });
    expect(catalog.steps[2]?.aliases).toEqual({ first_finding: 'finding_a' });
  });

  it('reports TOML syntax errors as parse errors', () => {
    const error = expectError('[[step]\nnumber = ');

    expect(error.type).toBe('parse_error');
    expect(error.message.startsWith('Failed to parse TOML: ')).toBe(true);
  });

  it('requires step tables', () => {
    expect(expectError('title = "none"').message).toBe('Missing [[step]] tables');
  });

  it('requires exactly 60 steps', () => {
    expect(expectError(catalogToml(new Map(), 59)).message).toBe(
      'Expected 60 [[step]] tables, found 59'
    );
  });

  it('requires steps in order', () => {
    const error = expectError(catalogToml(new Map([[5, { number: '6' }]])));

    expect(error.message).toBe('step[4].number must be 5; steps are numbered 1 to 60 in order');
    expect(error.field).toBe('step[4].number');
  });

  it('requires non-empty text', () => {
    const error = expectError(catalogToml(new Map([[2, { rationale: `'  '` }]])));

    expect(error.message).toBe('Missing or empty "rationale" in step[1]');
    expect(error.field).toBe('step[1].rationale');
  });

  it('requires at least one required field', () => {
    expect(expectError(catalogToml(new Map([[1, { required_fields: '[]' }]]))).message).toBe(
      '"required_fields" in step[0] must be a non-empty array of strings'
    );
  });

  it('rejects required fields that normalize to the same key', () => {
    const error = expectError(
      catalogToml(new Map([[1, { required_fields: `['Past Systems', 'past_systems']` }]]))
    );

    expect(error.message).toBe(
      'Required fields "Past Systems" and "past_systems" in step[0] normalize to the same key'
    );
  });

  it('rejects aliases of fields the step does not require', () => {
    expect(
      expectError(catalogToml(new Map([[1, { aliases: `{ other = 'finding_c' }` }]]))).message
    ).toBe('Alias "other" in step[0] must name one of the required fields');
  });

  it('rejects aliases that shadow step keys or the problem', () => {
    expect(
      expectError(catalogToml(new Map([[1, { aliases: `{ step_3 = 'finding_a' }` }]]))).message
    ).toBe('Invalid alias name "step_3" in step[0]');
    expect(
      expectError(catalogToml(new Map([[1, { aliases: `{ problem = 'finding_a' }` }]]))).message
    ).toBe('Invalid alias name "problem" in step[0]');
  });

  it('rejects an alias declared by two steps', () => {
    const shared = { aliases: `{ shared = 'finding_a' }` };

    expect(
      expectError(
        catalogToml(
          new Map([
            [1, shared],
            [2, shared],
          ])
        )
      ).message
    ).toBe('Alias "shared" is declared by steps 1 and 2');
  });

  it('rejects malformed placeholders', () => {
    const error = expectError(catalogToml(new Map([[7, { task: `'Study {{bad path!}}'` }]])));

    expect(error.message).toBe('Invalid placeholder alternative "bad path!" in "{{bad path!}}"');
    expect(error.field).toBe('step[6].task');
  });
});

describe('loadStepCatalog', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'catalog-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loads the bundled catalog', async () => {
    const catalog = await loadStepCatalog();

    expect(catalog.steps).toHaveLength(60);
    expect(catalog.steps[0]?.requiredFields).toEqual([
      'sub_system_components',
      'system_description',
      'super_system_context',
      'past_evolution',
      'future_predictions',
    ]);
    expect(catalog.steps[28]?.requiredFields).toEqual(['lookups', 'recommended_principles']);
    expect(catalog.steps[32]?.aliases).toEqual({
      primary_principle: 'principle_number',
      primary_principle_name: 'principle_name',
    });
  });

  it('loads a catalog from a path', async () => {
    const path = join(tempDir, 'steps.toml');
    await writeFile(path, catalogToml());

    const catalog = await loadStepCatalog(path);

    expect(catalog.filePath).toBe(path);
    expect(catalog.steps[59]?.title).toBe('Step 60');
  });

  it('throws with the file path for an invalid catalog', async () => {
    const path = join(tempDir, 'steps.toml');
    await writeFile(path, catalogToml(new Map(), 3));

    await expect(loadStepCatalog(path)).rejects.toThrow(
      `Failed to load catalog:\n${path}: Expected 60 [[step]] tables, found 3`
    );
  });
});

describe('getStepDefinition', () => {
  it('rejects step numbers outside 1..60', async () => {
    const catalog = await loadStepCatalog();

    expect(getStepDefinition(catalog, 60).number).toBe(60);
    expect(() => getStepDefinition(catalog, 0)).toThrow(RangeError);
    expect(() => getStepDefinition(catalog, 61)).toThrow('Step 61 is not in the catalog');
  });
});
