/**
 * Instruction provider backed by the TOML step catalog.
 *
 * @packageDocumentation
 */

import { getStepDefinition, type StepCatalog } from './catalog.js';
import type { InstructionProvider } from './provider.js';
import { renderTemplate, type TemplateContext } from './template.js';
import type { AccumulatedKnowledge, StepInstruction } from '../types.js';

export interface CatalogInstructionProviderOptions {
  /** Prefix length used when placeholders look up findings keys. */
  readonly fieldKeyPrefixLength?: number;
}

/**
 * Example findings object listing every required field.
 *
 * @example
 * ```typescript
 * describeOutputShape(['past_systems']);
 * // '{\n  "past_systems": "<past systems>"\n}'
 * ```
 */
export function describeOutputShape(requiredFields: readonly string[]): string {
  return JSON.stringify(
    Object.fromEntries(requiredFields.map((field) => [field, `<${field.replace(/_/g, ' ')}>`])),
    null,
    2
  );
}

/**
 * Renders catalog steps against a session's problem and knowledge.
 */
export class CatalogInstructionProvider implements InstructionProvider {
  private readonly catalog: StepCatalog;
  private readonly fieldKeyPrefixLength: number | undefined;

  constructor(catalog: StepCatalog, options: CatalogInstructionProviderOptions = {}) {
    this.catalog = catalog;
    this.fieldKeyPrefixLength = options.fieldKeyPrefixLength;
  }

  generate(
    stepNumber: number,
    problem: string,
    knowledge: AccumulatedKnowledge
  ): Promise<StepInstruction> {
    try {
      return Promise.resolve(this.render(stepNumber, problem, knowledge));
    } catch (error) {
      return Promise.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }

  describeStep(stepNumber: number): string {
    return getStepDefinition(this.catalog, stepNumber).title;
  }

  private render(
    stepNumber: number,
    problem: string,
    knowledge: AccumulatedKnowledge
  ): StepInstruction {
    const step = getStepDefinition(this.catalog, stepNumber);
    const context: TemplateContext =
      this.fieldKeyPrefixLength === undefined
        ? { problem, knowledge }
        : { problem, knowledge, fieldKeyPrefixLength: this.fieldKeyPrefixLength };

    return {
      stepNumber,
      title: renderTemplate(step.title, context),
      task: renderTemplate(step.task, context),
      searchQueries: step.searchQueries.map((query) => renderTemplate(query, context)),
      requiredFields: step.requiredFields,
      validationCriteria: renderTemplate(step.validationCriteria, context),
      expectedOutputShape: describeOutputShape(step.requiredFields),
      rationale: renderTemplate(step.rationale, context),
      relatedTool: step.tool,
      aliases: step.aliases,
    };
  }
}
