/**
 * The instruction provider contract consumed by the research engine.
 *
 * @packageDocumentation
 */

import type { AccumulatedKnowledge, StepInstruction } from '../types.js';

/**
 * Produces the research instruction for a step.
 *
 * Implementations must be total over steps 1..60 and deterministic: the same
 * step, problem and knowledge always yield the same instruction.
 */
export interface InstructionProvider {
  /**
   * Generates the instruction for a step.
   *
   * @param stepNumber - Step to generate, 1..60.
   * @param problem - The session's problem statement.
   * @param knowledge - Everything recorded by previously validated steps.
   */
  generate(
    stepNumber: number,
    problem: string,
    knowledge: AccumulatedKnowledge
  ): Promise<StepInstruction>;

  /**
   * Static title of a step, used for placeholders before an instruction exists.
   */
  describeStep?(stepNumber: number): string;
}
