/**
 * Shared fixtures for guided engine tests.
 *
 * @packageDocumentation
 */

import type { InstructionProvider } from './instructions/provider.js';
import type { AccumulatedKnowledge, StepInstruction } from './types.js';

/**
 * Builds an instruction with two required fields unless overridden.
 */
export function makeInstruction(
  stepNumber: number,
  overrides: Partial<StepInstruction> = {}
): StepInstruction {
  const requiredFields = overrides.requiredFields ?? ['primary_finding', 'supporting_detail'];
  return {
    stepNumber,
    title: `Stub step ${String(stepNumber)}`,
    task: `Research task for step ${String(stepNumber)}`,
    searchQueries: [`query for step ${String(stepNumber)}`],
    validationCriteria: 'All fields present',
    expectedOutputShape: JSON.stringify(Object.fromEntries(requiredFields.map((f) => [f, '...']))),
    rationale: 'Feeds later steps',
    relatedTool: 'Stub Tool',
    aliases: {},
    ...overrides,
    requiredFields,
  };
}

/**
 * Findings that satisfy every required field of an instruction.
 */
export function validFindingsFor(instruction: StepInstruction): Record<string, string> {
  return Object.fromEntries(
    instruction.requiredFields.map((field) => [field, `Findings for ${field} in detail`])
  );
}

/**
 * Records of calls made to a {@link StubInstructionProvider}.
 */
export interface ProviderCall {
  readonly stepNumber: number;
  readonly problem: string;
  readonly knowledgeKeys: readonly string[];
}

/**
 * Deterministic in-process provider.
 *
 * `overrides` replaces the generated instruction for selected steps;
 * `failOn` makes generation reject for a step.
 */
export class StubInstructionProvider implements InstructionProvider {
  readonly calls: ProviderCall[] = [];
  private readonly overrides: ReadonlyMap<number, Partial<StepInstruction>>;
  private readonly failOn: Set<number>;

  constructor(
    options: {
      overrides?: ReadonlyMap<number, Partial<StepInstruction>>;
      failOn?: Iterable<number>;
    } = {}
  ) {
    this.overrides = options.overrides ?? new Map();
    this.failOn = new Set(options.failOn ?? []);
  }

  /** Makes generation of `stepNumber` fail from now on. */
  failStep(stepNumber: number): void {
    this.failOn.add(stepNumber);
  }

  generate(
    stepNumber: number,
    problem: string,
    knowledge: AccumulatedKnowledge
  ): Promise<StepInstruction> {
    this.calls.push({ stepNumber, problem, knowledgeKeys: Object.keys(knowledge) });
    if (this.failOn.has(stepNumber)) {
      return Promise.reject(new Error(`provider unavailable for step ${String(stepNumber)}`));
    }
    return Promise.resolve(makeInstruction(stepNumber, this.overrides.get(stepNumber) ?? {}));
  }

  describeStep(stepNumber: number): string {
    return `Stub step ${String(stepNumber)}`;
  }
}
