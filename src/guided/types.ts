/**
 * Core types for the guided TRIZ research protocol.
 *
 * A session walks 60 ordered steps grouped into six phases. Each step moves
 * PENDING → AWAITING_RESEARCH → VALIDATED and never regresses.
 *
 * @packageDocumentation
 */

/**
 * The six phases of the guided protocol, in order.
 */
export type ResearchPhase =
  | 'UNDERSTAND_SCOPE'
  | 'DEFINE_IDEAL'
  | 'FUNCTION_ANALYSIS'
  | 'SELECT_TOOLS'
  | 'GENERATE_SOLUTIONS'
  | 'RANK_IMPLEMENT';

/**
 * Array of all phases in protocol order.
 */
export const RESEARCH_PHASES: readonly ResearchPhase[] = [
  'UNDERSTAND_SCOPE',
  'DEFINE_IDEAL',
  'FUNCTION_ANALYSIS',
  'SELECT_TOOLS',
  'GENERATE_SOLUTIONS',
  'RANK_IMPLEMENT',
] as const;

/**
 * Lifecycle of a single step.
 *
 * SKIPPED is reserved and never assigned by the engine.
 */
export type StepStatus = 'PENDING' | 'AWAITING_RESEARCH' | 'VALIDATED' | 'SKIPPED';

/**
 * Lifecycle of a session. COMPLETED is terminal.
 */
export type SessionStatus = 'ACTIVE' | 'COMPLETED';

/** Total number of steps in the protocol. */
export const TOTAL_STEPS = 60;

/**
 * Static description of a phase.
 */
export interface PhaseDefinition {
  readonly phase: ResearchPhase;
  /** 1-based position of the phase. */
  readonly index: number;
  readonly name: string;
  readonly description: string;
  /** TRIZ tools exercised in this phase. */
  readonly tools: readonly string[];
  /** First step number, inclusive. */
  readonly firstStep: number;
  /** Last step number, inclusive. */
  readonly lastStep: number;
}

/**
 * The fixed phase table.
 */
export const PHASE_DEFINITIONS: readonly PhaseDefinition[] = [
  {
    phase: 'UNDERSTAND_SCOPE',
    index: 1,
    name: 'Understand & Scope',
    description:
      'Map the system in time and scale with the 9 Boxes and audit its current benefits, costs and harms.',
    tools: ['9 Boxes', 'Ideality Audit'],
    firstStep: 1,
    lastStep: 10,
  },
  {
    phase: 'DEFINE_IDEAL',
    index: 2,
    name: 'Define Ideal Outcome',
    description:
      'Describe the ideal final result and inventory the resources already present in and around the system.',
    tools: ['Ideal Outcome', 'Resources'],
    firstStep: 11,
    lastStep: 16,
  },
  {
    phase: 'FUNCTION_ANALYSIS',
    index: 3,
    name: 'Function Analysis',
    description:
      'Model subject-action-object functions, classify them and extract technical and physical contradictions.',
    tools: ['Function Map', 'Contradictions'],
    firstStep: 17,
    lastStep: 26,
  },
  {
    phase: 'SELECT_TOOLS',
    index: 4,
    name: 'Select TRIZ Tools',
    description:
      'Route each prioritized problem to the matrix, standard solutions, effects or evolution trends.',
    tools: ['Contradiction Matrix', 'Tool Selection'],
    firstStep: 27,
    lastStep: 32,
  },
  {
    phase: 'GENERATE_SOLUTIONS',
    index: 5,
    name: 'Generate Solutions',
    description:
      'Apply the selected principles, standard solutions, effects and materials research to build solution concepts.',
    tools: ['40 Principles', 'Standard Solutions', 'Effects', 'Materials'],
    firstStep: 33,
    lastStep: 50,
  },
  {
    phase: 'RANK_IMPLEMENT',
    index: 6,
    name: 'Rank & Implement',
    description:
      'Score every concept for ideality, plot and categorize them, then plan implementation of the best.',
    tools: ['Ideality Plot', 'Implementation Planning'],
    firstStep: 51,
    lastStep: 60,
  },
] as const;

/**
 * Research instruction for a single step, as produced by an instruction provider.
 */
export interface StepInstruction {
  readonly stepNumber: number;
  readonly title: string;
  readonly task: string;
  readonly searchQueries: readonly string[];
  /** Keys the findings mapping must contain. Never empty. */
  readonly requiredFields: readonly string[];
  readonly validationCriteria: string;
  /** Example of the expected findings object, as text. */
  readonly expectedOutputShape: string;
  /** Why the step matters for later steps. */
  readonly rationale: string;
  /** TRIZ tool the step exercises. */
  readonly relatedTool: string;
  /**
   * Alias name → required field. On validation the field's value is also
   * recorded in accumulated knowledge under the alias.
   */
  readonly aliases: Readonly<Record<string, string>>;
}

/**
 * Findings submitted for a step.
 */
export type Findings = Readonly<Record<string, unknown>>;

/**
 * Knowledge accumulated from validated steps, keyed `step_<n>` plus aliases.
 */
export type AccumulatedKnowledge = Readonly<Record<string, unknown>>;

/**
 * One of the 60 step slots of a session.
 */
export interface StepRecord {
  readonly stepNumber: number;
  readonly phase: ResearchPhase;
  readonly title: string;
  readonly status: StepStatus;
  /** Present once status is AWAITING_RESEARCH or later. */
  readonly instruction?: StepInstruction;
  /** Present once VALIDATED. */
  readonly findings?: Findings;
  readonly validationResult?: string;
  readonly validatedAt?: string;
}

/**
 * A guided research session. Treated as immutable; transitions produce new objects.
 */
export interface GuidedSession {
  readonly sessionId: string;
  readonly problem: string;
  readonly status: SessionStatus;
  /** Lowest step not yet validated, 1..60. Stays at 60 after completion. */
  readonly currentStep: number;
  /** Exactly 60 records, index i holds step i + 1. */
  readonly steps: readonly StepRecord[];
  readonly accumulatedKnowledge: AccumulatedKnowledge;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly completedAt?: string;
}

/**
 * Checks whether a value is a step number of the protocol.
 */
export function isValidStepNumber(stepNumber: number): boolean {
  return Number.isInteger(stepNumber) && stepNumber >= 1 && stepNumber <= TOTAL_STEPS;
}

/**
 * Returns the phase definition containing a step.
 *
 * @throws RangeError if the step number is outside 1..60.
 */
export function getPhaseDefinition(stepNumber: number): PhaseDefinition {
  const definition = PHASE_DEFINITIONS.find(
    (d) => stepNumber >= d.firstStep && stepNumber <= d.lastStep
  );
  if (definition === undefined || !isValidStepNumber(stepNumber)) {
    throw new RangeError(
      `Step number must be an integer between 1 and ${String(TOTAL_STEPS)}, got ${String(stepNumber)}`
    );
  }
  return definition;
}

/**
 * Returns the phase containing a step.
 *
 * @throws RangeError if the step number is outside 1..60.
 */
export function getPhaseForStep(stepNumber: number): ResearchPhase {
  return getPhaseDefinition(stepNumber).phase;
}

/**
 * Knowledge key under which a step's findings are recorded.
 *
 * @example
 * ```typescript
 * stepKey(14); // "step_14"
 * ```
 */
export function stepKey(stepNumber: number): string {
  return `step_${String(stepNumber)}`;
}

/**
 * Matches knowledge keys reserved for step findings.
 */
export const STEP_KEY_PATTERN = /^step_\d+$/;

/**
 * Builds the 60 PENDING step placeholders of a new session.
 *
 * @param describeStep - Optional title lookup; defaults to "Step n".
 */
export function createInitialSteps(describeStep?: (stepNumber: number) => string): StepRecord[] {
  const steps: StepRecord[] = [];
  for (let n = 1; n <= TOTAL_STEPS; n++) {
    steps.push({
      stepNumber: n,
      phase: getPhaseForStep(n),
      title: describeStep?.(n) ?? `Step ${String(n)}`,
      status: 'PENDING',
    });
  }
  return steps;
}
