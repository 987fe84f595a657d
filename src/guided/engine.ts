/**
 * The guided research step sequencer.
 *
 * Walks a session through the 60 protocol steps: generates each step's
 * instruction, validates submitted findings, records them in accumulated
 * knowledge, persists the whole session after every transition and
 * synthesizes the final deliverable once step 60 validates.
 *
 * Transitions are computed on new objects; the store only ever sees a
 * finished snapshot, so a failing provider or store leaves the persisted
 * session as it was.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type { InstructionProvider } from './instructions/provider.js';
import { KnowledgeConflictError, recordFindings } from './knowledge.js';
import type { SessionStore } from './persistence.js';
import {
  buildSessionSummary,
  synthesizeFinalDeliverable,
  type FinalDeliverable,
  type SessionSummary,
} from './synthesizer.js';
import type { ResearchTrace, TraceEventType } from './trace.js';
import {
  TOTAL_STEPS,
  createInitialSteps,
  getPhaseDefinition,
  type Findings,
  type GuidedSession,
  type ResearchPhase,
  type StepInstruction,
  type StepRecord,
} from './types.js';
import {
  DEFAULT_VALIDATION_OPTIONS,
  isFindingsObject,
  validateFindings,
  type ValidationOptions,
} from './validator.js';
import { Logger } from '../utils/logger.js';

/**
 * Error codes raised by the engine.
 */
export type GuidedEngineErrorCode =
  | 'INVALID_PROBLEM'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_COMPLETED'
  | 'STATE_INCONSISTENT'
  | 'INVALID_INSTRUCTION'
  | 'KNOWLEDGE_CONFLICT';

/**
 * Error class for engine operation failures.
 */
export class GuidedEngineError extends Error {
  public readonly code: GuidedEngineErrorCode;
  public readonly details: string | undefined;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: GuidedEngineErrorCode,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'GuidedEngineError';
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Checks whether an error reports an unknown session id.
 */
export function isSessionNotFound(error: unknown): error is GuidedEngineError {
  return error instanceof GuidedEngineError && error.code === 'SESSION_NOT_FOUND';
}

/**
 * Collaborators and settings of a {@link GuidedResearchEngine}.
 */
export interface GuidedEngineOptions {
  readonly store: SessionStore;
  readonly provider: InstructionProvider;
  /** Defaults to a stderr logger. */
  readonly logger?: Logger;
  /** Optional audit trail; failures to append are logged, not thrown. */
  readonly trace?: ResearchTrace;
  readonly validation?: Partial<ValidationOptions>;
  /** Session id generator. Defaults to random UUIDs. */
  readonly generateId?: () => string;
  readonly now?: () => Date;
}

/**
 * Phase fields shared by results that point at a current step.
 */
export interface PhasePosition {
  readonly phase: ResearchPhase;
  readonly phaseName: string;
  readonly phaseDescription: string;
}

export interface StartResult extends PhasePosition {
  readonly sessionId: string;
  readonly totalSteps: number;
  readonly currentStep: 1;
  readonly instruction: StepInstruction;
  /** `currentStep / 60`. */
  readonly progressFraction: number;
}

/**
 * Findings failed validation; the session is unchanged.
 */
export interface RejectedResult {
  readonly kind: 'rejected';
  readonly sessionId: string;
  readonly step: number;
  readonly error: string;
  readonly hint: string;
  readonly missingFields: readonly string[];
  readonly invalidFields: readonly string[];
  /** The stored instruction of the step, re-offered as is. */
  readonly instruction: StepInstruction;
}

/**
 * A step validated and the next one is ready.
 */
export interface ProgressedResult extends PhasePosition {
  readonly kind: 'progressed';
  readonly sessionId: string;
  /** Validation confirmation message. */
  readonly validation: string;
  readonly completedStep: number;
  readonly currentStep: number;
  readonly totalSteps: number;
  /** e.g. "Step 2 of 10 in Phase 1 (Understand & Scope)". */
  readonly phaseProgress: string;
  readonly instruction: StepInstruction;
  /** `currentStep / 60`. */
  readonly progressFraction: number;
  /** `completedStep / 60`. */
  readonly completedFraction: number;
}

/**
 * Step 60 validated and the session is complete.
 */
export interface CompletedResult {
  readonly kind: 'completed';
  readonly sessionId: string;
  readonly validation: string;
  readonly totalSteps: number;
  readonly finalDeliverable: FinalDeliverable;
  readonly summary: SessionSummary;
}

export type SubmitResult = RejectedResult | ProgressedResult | CompletedResult;

/**
 * Where an active session stands.
 */
export interface ActiveStepView extends PhasePosition {
  readonly kind: 'active';
  readonly sessionId: string;
  readonly problem: string;
  readonly currentStep: number;
  readonly totalSteps: number;
  readonly phaseProgress: string;
  readonly instruction: StepInstruction;
  readonly progressFraction: number;
  readonly completedFraction: number;
}

export interface CompletedStepView {
  readonly kind: 'completed';
  readonly sessionId: string;
  readonly problem: string;
  readonly totalSteps: number;
  readonly finalDeliverable: FinalDeliverable;
  readonly summary: SessionSummary;
}

export type CurrentStepView = ActiveStepView | CompletedStepView;

function phasePosition(stepNumber: number): PhasePosition {
  const definition = getPhaseDefinition(stepNumber);
  return {
    phase: definition.phase,
    phaseName: definition.name,
    phaseDescription: definition.description,
  };
}

/**
 * Describes a step's position within its phase.
 *
 * @example
 * ```typescript
 * describePhaseProgress(12); // "Step 2 of 6 in Phase 2 (Define Ideal Outcome)"
 * ```
 */
export function describePhaseProgress(stepNumber: number): string {
  const definition = getPhaseDefinition(stepNumber);
  const position = stepNumber - definition.firstStep + 1;
  const size = definition.lastStep - definition.firstStep + 1;
  return `Step ${String(position)} of ${String(size)} in Phase ${String(definition.index)} (${definition.name})`;
}

function replaceStep(steps: readonly StepRecord[], record: StepRecord): StepRecord[] {
  return steps.map((step) => (step.stepNumber === record.stepNumber ? record : step));
}

/**
 * Copies findings through JSON so the recorded value equals what a reload yields.
 */
function cloneFindings(findings: Findings): Findings {
  const copy: unknown = JSON.parse(JSON.stringify(findings));
  return isFindingsObject(copy) ? copy : {};
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Drives guided research sessions.
 *
 * @example
 * ```typescript
 * const engine = new GuidedResearchEngine({
 *   store: new FileSessionStore('.triz/sessions'),
 *   provider: new CatalogInstructionProvider(await loadStepCatalog()),
 * });
 * const { sessionId, instruction } = await engine.start('Reduce vibration without increasing mass');
 * const result = await engine.submit(sessionId, findings);
 * ```
 */
export class GuidedResearchEngine {
  private readonly store: SessionStore;
  private readonly provider: InstructionProvider;
  private readonly logger: Logger;
  private readonly trace: ResearchTrace | undefined;
  private readonly validation: ValidationOptions;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: GuidedEngineOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.logger = options.logger ?? new Logger({ component: 'GuidedResearchEngine' });
    this.trace = options.trace;
    this.validation = { ...DEFAULT_VALIDATION_OPTIONS, ...options.validation };
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Starts a session and returns the instruction for step 1.
   *
   * The provider is called before anything is stored; if it fails, no
   * session exists.
   *
   * @throws GuidedEngineError with code INVALID_PROBLEM for a blank problem.
   */
  async start(problem: string): Promise<StartResult> {
    const statement = problem.trim();
    if (statement === '') {
      throw new GuidedEngineError('Problem statement must not be empty', 'INVALID_PROBLEM');
    }

    const sessionId = this.generateId();
    const pending = createInitialSteps((n) => this.describeStep(n));
    const instruction = await this.generateInstruction(1, statement, {});
    const timestamp = this.now().toISOString();

    const session: GuidedSession = {
      sessionId,
      problem: statement,
      status: 'ACTIVE',
      currentStep: 1,
      steps: replaceStep(pending, this.awaitResearch(1, instruction)),
      accumulatedKnowledge: {},
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.store.create(session);

    this.logger.info('session_started', { sessionId, problem: statement });
    await this.appendTrace(sessionId, 'session_started', 1, { problem: statement });

    return {
      sessionId,
      totalSteps: TOTAL_STEPS,
      currentStep: 1,
      ...phasePosition(1),
      instruction,
      progressFraction: 1 / TOTAL_STEPS,
    };
  }

  /**
   * Submits findings for the current step of a session.
   *
   * Invalid findings produce a `rejected` result and change nothing. Valid
   * findings are recorded and the session advances or completes.
   *
   * @throws GuidedEngineError for unknown, completed or inconsistent sessions.
   */
  async submit(sessionId: string, findings: unknown): Promise<SubmitResult> {
    const session = await this.loadSession(sessionId);
    if (session.status === 'COMPLETED') {
      throw new GuidedEngineError(
        `Session ${sessionId} is already completed`,
        'SESSION_COMPLETED'
      );
    }

    const stepNumber = session.currentStep;
    const { record, instruction } = this.currentRecord(session);
    const outcome = validateFindings(instruction, findings, this.validation);

    if (!outcome.valid) {
      this.logger.info('step_rejected', {
        sessionId,
        step: stepNumber,
        missingFields: outcome.missingFields,
        invalidFields: outcome.invalidFields,
      });
      await this.appendTrace(sessionId, 'step_rejected', stepNumber, {
        missing_fields: outcome.missingFields,
        invalid_fields: outcome.invalidFields,
      });
      return {
        kind: 'rejected',
        sessionId,
        step: stepNumber,
        error: outcome.message,
        hint: outcome.hint,
        missingFields: outcome.missingFields,
        invalidFields: outcome.invalidFields,
        instruction,
      };
    }

    const recorded = cloneFindings(outcome.findings);
    const knowledge = this.record(session, instruction, recorded);
    const timestamp = this.now().toISOString();
    const validated: StepRecord = {
      ...record,
      status: 'VALIDATED',
      findings: recorded,
      validationResult: outcome.message,
      validatedAt: timestamp,
    };

    if (stepNumber === TOTAL_STEPS) {
      return this.complete(session, validated, knowledge, outcome.message, timestamp);
    }

    const nextStep = stepNumber + 1;
    const nextInstruction = await this.generateInstruction(nextStep, session.problem, knowledge);
    const steps = replaceStep(
      replaceStep(session.steps, validated),
      this.awaitResearch(nextStep, nextInstruction)
    );

    await this.store.save({
      ...session,
      currentStep: nextStep,
      steps,
      accumulatedKnowledge: knowledge,
      updatedAt: timestamp,
    });

    this.logger.info('step_validated', { sessionId, step: stepNumber, nextStep });
    await this.appendTrace(sessionId, 'step_validated', stepNumber, {
      fields: Object.keys(recorded),
      next_step: nextStep,
    });

    return {
      kind: 'progressed',
      sessionId,
      validation: outcome.message,
      completedStep: stepNumber,
      currentStep: nextStep,
      totalSteps: TOTAL_STEPS,
      ...phasePosition(nextStep),
      phaseProgress: describePhaseProgress(nextStep),
      instruction: nextInstruction,
      progressFraction: nextStep / TOTAL_STEPS,
      completedFraction: stepNumber / TOTAL_STEPS,
    };
  }

  /**
   * Returns where a session stands, for resuming it.
   *
   * An active session yields the stored instruction of its current step;
   * a completed one yields its deliverable.
   */
  async getCurrentStep(sessionId: string): Promise<CurrentStepView> {
    const session = await this.loadSession(sessionId);
    if (session.status === 'COMPLETED') {
      return {
        kind: 'completed',
        sessionId,
        problem: session.problem,
        totalSteps: TOTAL_STEPS,
        finalDeliverable: synthesizeFinalDeliverable(session),
        summary: buildSessionSummary(session),
      };
    }

    const { instruction } = this.currentRecord(session);
    return {
      kind: 'active',
      sessionId,
      problem: session.problem,
      currentStep: session.currentStep,
      totalSteps: TOTAL_STEPS,
      ...phasePosition(session.currentStep),
      phaseProgress: describePhaseProgress(session.currentStep),
      instruction,
      progressFraction: session.currentStep / TOTAL_STEPS,
      completedFraction: (session.currentStep - 1) / TOTAL_STEPS,
    };
  }

  /**
   * Per-phase counts of validated steps.
   */
  async getSummary(sessionId: string): Promise<SessionSummary> {
    return buildSessionSummary(await this.loadSession(sessionId));
  }

  private async complete(
    session: GuidedSession,
    validated: StepRecord,
    knowledge: Readonly<Record<string, unknown>>,
    message: string,
    timestamp: string
  ): Promise<CompletedResult> {
    const completed: GuidedSession = {
      ...session,
      status: 'COMPLETED',
      steps: replaceStep(session.steps, validated),
      accumulatedKnowledge: knowledge,
      updatedAt: timestamp,
      completedAt: timestamp,
    };
    const finalDeliverable = synthesizeFinalDeliverable(completed);
    const summary = buildSessionSummary(completed);

    await this.store.save(completed);

    this.logger.info('session_completed', {
      sessionId: session.sessionId,
      validatedSteps: summary.validatedSteps,
    });
    await this.appendTrace(session.sessionId, 'session_completed', TOTAL_STEPS, {
      validated_steps: summary.validatedSteps,
    });

    return {
      kind: 'completed',
      sessionId: session.sessionId,
      validation: message,
      totalSteps: TOTAL_STEPS,
      finalDeliverable,
      summary,
    };
  }

  private async loadSession(sessionId: string): Promise<GuidedSession> {
    const session = await this.store.load(sessionId);
    if (session === undefined) {
      throw new GuidedEngineError(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
    }
    return session;
  }

  private currentRecord(session: GuidedSession): {
    record: StepRecord;
    instruction: StepInstruction;
  } {
    const record = session.steps[session.currentStep - 1];
    const instruction = record?.instruction;
    if (record === undefined || record.status !== 'AWAITING_RESEARCH' || instruction === undefined) {
      throw new GuidedEngineError(
        `Session ${session.sessionId} has no instruction awaiting research for step ${String(session.currentStep)}`,
        'STATE_INCONSISTENT',
        { details: `status: ${record?.status ?? 'missing'}` }
      );
    }
    return { record, instruction };
  }

  private record(
    session: GuidedSession,
    instruction: StepInstruction,
    findings: Findings
  ): Readonly<Record<string, unknown>> {
    try {
      return recordFindings(
        session.accumulatedKnowledge,
        instruction,
        findings,
        this.validation.fieldKeyPrefixLength
      );
    } catch (error) {
      if (error instanceof KnowledgeConflictError) {
        throw new GuidedEngineError(error.message, 'KNOWLEDGE_CONFLICT', {
          details: `key: ${error.key}`,
          cause: error,
        });
      }
      throw error;
    }
  }

  private async generateInstruction(
    stepNumber: number,
    problem: string,
    knowledge: Readonly<Record<string, unknown>>
  ): Promise<StepInstruction> {
    const instruction = await this.provider.generate(stepNumber, problem, knowledge);
    if (instruction.stepNumber !== stepNumber) {
      throw new GuidedEngineError(
        `Provider returned an instruction for step ${String(instruction.stepNumber)} instead of step ${String(stepNumber)}`,
        'INVALID_INSTRUCTION'
      );
    }
    if (instruction.requiredFields.length === 0) {
      throw new GuidedEngineError(
        `Provider returned no required fields for step ${String(stepNumber)}`,
        'INVALID_INSTRUCTION'
      );
    }
    this.logger.debug('instruction_generated', {
      step: stepNumber,
      requiredFields: instruction.requiredFields,
    });
    return instruction;
  }

  private describeStep(stepNumber: number): string {
    return this.provider.describeStep?.(stepNumber) ?? `Step ${String(stepNumber)}`;
  }

  private awaitResearch(stepNumber: number, instruction: StepInstruction): StepRecord {
    return {
      stepNumber,
      phase: getPhaseDefinition(stepNumber).phase,
      title: this.provider.describeStep?.(stepNumber) ?? instruction.title,
      status: 'AWAITING_RESEARCH',
      instruction,
    };
  }

  private async appendTrace(
    sessionId: string,
    event: TraceEventType,
    step: number,
    data: Readonly<Record<string, unknown>>
  ): Promise<void> {
    if (this.trace === undefined) {
      return;
    }
    try {
      await this.trace.append({
        timestamp: this.now().toISOString(),
        sessionId,
        event,
        step,
        data,
      });
    } catch (error) {
      this.logger.warn('trace_write_failed', {
        sessionId,
        event,
        error: toError(error).message,
      });
    }
  }
}
