/**
 * Final deliverable synthesis and session summaries.
 *
 * Both functions are pure and total: any session, including one with sparse
 * findings, produces a complete report with default text where a well-known
 * key is absent.
 *
 * @packageDocumentation
 */

import { lookupKnowledge } from './knowledge.js';
import {
  PHASE_DEFINITIONS,
  TOTAL_STEPS,
  type GuidedSession,
  type ResearchPhase,
  type SessionStatus,
} from './types.js';

/**
 * What one phase contributed, with validated steps cited as evidence.
 */
export interface PhaseTrace {
  readonly phase: ResearchPhase;
  readonly name: string;
  readonly tools: readonly string[];
  readonly stepRange: string;
  /** `Step n: title` for every validated step of the phase. */
  readonly evidence: readonly string[];
}

export interface RecommendedSolution {
  readonly summary: string;
  readonly rationale: string;
  /** Steps whose findings the recommendation was taken from. */
  readonly evidenceSteps: readonly number[];
}

/**
 * The terminal report of a completed session.
 */
export interface FinalDeliverable {
  readonly problem: string;
  readonly methodology: string;
  readonly executiveSummary: string;
  readonly methodologyTrace: readonly PhaseTrace[];
  readonly recommendedSolution: RecommendedSolution;
  readonly implementationRoadmap: string;
  readonly supportingEvidence: string;
  readonly futureIterations: readonly string[];
  readonly conclusion: string;
}

export interface PhaseSummary {
  readonly phase: ResearchPhase;
  readonly name: string;
  readonly validated: number;
  readonly total: number;
  readonly tools: string;
}

export interface SessionSummary {
  readonly sessionId: string;
  readonly problem: string;
  readonly status: SessionStatus;
  readonly validatedSteps: number;
  readonly totalSteps: number;
  readonly phases: readonly PhaseSummary[];
}

/**
 * Renders a findings value as text.
 *
 * Arrays are joined with "; " and objects become "key: value" pairs.
 * Returns undefined for values with no text content.
 */
export function renderFindingText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value
      .map((item: unknown) => renderFindingText(item))
      .filter((part): part is string => part !== undefined);
    return parts.length === 0 ? undefined : parts.join('; ');
  }
  if (typeof value === 'object' && value !== null) {
    const parts = Object.entries(value)
      .map(([key, item]: [string, unknown]) => {
        const text = renderFindingText(item);
        return text === undefined ? undefined : `${key}: ${text}`;
      })
      .filter((part): part is string => part !== undefined);
    return parts.length === 0 ? undefined : parts.join('; ');
  }
  return undefined;
}

interface Sourced {
  readonly text: string;
  readonly step: number;
}

/**
 * First path among `paths` with text content, with the step it came from.
 */
function firstText(session: GuidedSession, paths: readonly string[]): Sourced | undefined {
  for (const path of paths) {
    const text = renderFindingText(lookupKnowledge(session.accumulatedKnowledge, path));
    if (text !== undefined) {
      return { text, step: Number(path.slice('step_'.length, path.indexOf('.'))) };
    }
  }
  return undefined;
}

function countValidated(session: GuidedSession): number {
  return session.steps.filter((s) => s.status === 'VALIDATED').length;
}

function buildPhaseTrace(session: GuidedSession): PhaseTrace[] {
  return PHASE_DEFINITIONS.map((definition) => ({
    phase: definition.phase,
    name: definition.name,
    tools: definition.tools,
    stepRange: `Steps ${String(definition.firstStep)}-${String(definition.lastStep)}`,
    evidence: session.steps
      .filter(
        (s) =>
          s.status === 'VALIDATED' &&
          s.stepNumber >= definition.firstStep &&
          s.stepNumber <= definition.lastStep
      )
      .map((s) => `Step ${String(s.stepNumber)}: ${s.title}`),
  }));
}

function futureIterations(session: GuidedSession): string[] {
  const value = lookupKnowledge(session.accumulatedKnowledge, 'step_60.future_triz_iterations');
  const items = Array.isArray(value) ? value : [value];
  const rendered = items
    .map((item: unknown) => renderFindingText(item))
    .filter((text): text is string => text !== undefined);

  if (rendered.length > 0) {
    return rendered;
  }
  return [
    'Apply the protocol again to the highest-priority problem left unsolved',
    'Revisit parked solutions once their research questions are answered',
  ];
}

/**
 * Assembles the final deliverable from a session's accumulated knowledge.
 */
export function synthesizeFinalDeliverable(session: GuidedSession): FinalDeliverable {
  const validated = countValidated(session);
  const tools = PHASE_DEFINITIONS.flatMap((d) => d.tools);

  const solution = firstText(session, [
    'step_60.recommended_solution_details',
    'step_57.selected_solutions',
    'step_50.integrated_solutions',
  ]);
  const justification = firstText(session, ['step_57.selection_justification']);

  const evidenceSteps = [solution?.step, justification?.step]
    .filter((step): step is number => step !== undefined)
    .filter((step, index, all) => all.indexOf(step) === index)
    .sort((a, b) => a - b);

  const roadmap = firstText(session, [
    'step_60.implementation_roadmap',
    'step_59.timeline_phases',
    'step_50.implementation_roadmap',
  ]);

  return {
    problem: session.problem,
    methodology: `TRIZ guided research across ${String(PHASE_DEFINITIONS.length)} phases using ${tools.join(', ')}`,
    executiveSummary:
      firstText(session, ['step_60.executive_summary'])?.text ??
      `Guided TRIZ research on "${session.problem}" validated ${String(validated)} of ${String(TOTAL_STEPS)} steps.`,
    methodologyTrace: buildPhaseTrace(session),
    recommendedSolution: {
      summary: solution?.text ?? 'No solution was recorded as recommended.',
      rationale:
        justification?.text ??
        'Selected by ideality scoring of the solution concepts generated in phase 5.',
      evidenceSteps,
    },
    implementationRoadmap: roadmap?.text ?? 'No implementation roadmap was recorded.',
    supportingEvidence:
      firstText(session, ['step_60.supporting_evidence'])?.text ??
      `Findings from ${String(validated)} validated steps, listed per phase in the methodology trace.`,
    futureIterations: futureIterations(session),
    conclusion:
      firstText(session, ['step_60.conclusion'])?.text ??
      `The recommended solution addresses "${session.problem}" and is ready for implementation planning.`,
  };
}

/**
 * Counts validated steps per phase.
 */
export function buildSessionSummary(session: GuidedSession): SessionSummary {
  return {
    sessionId: session.sessionId,
    problem: session.problem,
    status: session.status,
    validatedSteps: countValidated(session),
    totalSteps: TOTAL_STEPS,
    phases: PHASE_DEFINITIONS.map((definition) => ({
      phase: definition.phase,
      name: definition.name,
      validated: session.steps.filter(
        (s) =>
          s.status === 'VALIDATED' &&
          s.stepNumber >= definition.firstStep &&
          s.stepNumber <= definition.lastStep
      ).length,
      total: definition.lastStep - definition.firstStep + 1,
      tools: definition.tools.join(', '),
    })),
  };
}
