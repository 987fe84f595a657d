/**
 * Tests for the guided research step sequencer.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  GuidedEngineError,
  GuidedResearchEngine,
  describePhaseProgress,
  isSessionNotFound,
  type GuidedEngineOptions,
  type SubmitResult,
} from './engine.js';
import { CatalogInstructionProvider } from './instructions/catalog-provider.js';
import { loadStepCatalog } from './instructions/catalog.js';
import type { InstructionProvider } from './instructions/provider.js';
import { FileSessionStore, MemorySessionStore, type SessionStore } from './persistence.js';
import { StubInstructionProvider, makeInstruction, validFindingsFor } from './test-helpers.js';
import { MemoryResearchTrace, type ResearchTrace } from './trace.js';
import type { StepInstruction, StepRecord } from './types.js';
import { Logger } from '../utils/logger.js';

const PROBLEM = 'Reduce vibration without increasing mass';
const NOW = new Date('2025-01-01T00:00:00.000Z');
const NINE_FIELDS = Array.from({ length: 9 }, (_, i) => `field_${String(i + 1)}`);

interface Harness {
  readonly engine: GuidedResearchEngine;
  readonly store: MemorySessionStore;
  readonly trace: MemoryResearchTrace;
  readonly logLines: string[];
}

function createHarness(
  provider: InstructionProvider = new StubInstructionProvider(),
  options: Partial<GuidedEngineOptions> = {}
): Harness {
  const store = new MemorySessionStore();
  const trace = new MemoryResearchTrace();
  const logLines: string[] = [];
  let counter = 0;
  const engine = new GuidedResearchEngine({
    store,
    provider,
    trace,
    logger: new Logger({ component: 'test', write: (line) => logLines.push(line) }),
    generateId: () => {
      counter += 1;
      return `session-${String(counter)}`;
    },
    now: () => NOW,
    ...options,
  });
  return { engine, store, trace, logLines };
}

async function submitValid(engine: GuidedResearchEngine, sessionId: string): Promise<SubmitResult> {
  const view = await engine.getCurrentStep(sessionId);
  if (view.kind !== 'active') {
    throw new Error(`session ${sessionId} is not active`);
  }
  return engine.submit(sessionId, validFindingsFor(view.instruction));
}

function loggedEvents(lines: readonly string[]): string[] {
  return lines.map((line) => (JSON.parse(line) as { event: string }).event);
}

describe('describePhaseProgress', () => {
  it('describes the position within a phase', () => {
    expect(describePhaseProgress(2)).toBe('Step 2 of 10 in Phase 1 (Understand & Scope)');
    expect(describePhaseProgress(12)).toBe('Step 2 of 6 in Phase 2 (Define Ideal Outcome)');
    expect(describePhaseProgress(60)).toBe('Step 10 of 10 in Phase 6 (Rank & Implement)');
  });
});

describe('GuidedResearchEngine.start', () => {
  it('creates a session awaiting research on step 1', async () => {
    const { engine, store } = createHarness();

    const result = await engine.start(`  ${PROBLEM}  `);

    expect(result).toMatchObject({
      sessionId: 'session-1',
      totalSteps: 60,
      currentStep: 1,
      phase: 'UNDERSTAND_SCOPE',
      phaseName: 'Understand & Scope',
      progressFraction: 1 / 60,
    });
    expect(result.instruction.stepNumber).toBe(1);

    const session = await store.load('session-1');
    expect(session?.problem).toBe(PROBLEM);
    expect(session?.status).toBe('ACTIVE');
    expect(session?.createdAt).toBe('2025-01-01T00:00:00.000Z');
    expect(session?.steps[0]?.status).toBe('AWAITING_RESEARCH');
    expect(session?.steps[0]?.instruction).toEqual(result.instruction);
    expect(session?.steps.slice(1).every((s) => s.status === 'PENDING')).toBe(true);
    expect(session?.steps[41]?.title).toBe('Stub step 42');
    expect(session?.accumulatedKnowledge).toEqual({});
  });

  it('rejects a blank problem without storing anything', async () => {
    const { engine, store } = createHarness();

    await expect(engine.start('   ')).rejects.toMatchObject({ code: 'INVALID_PROBLEM' });
    expect(store.size).toBe(0);
  });

  it('stores nothing when the provider fails', async () => {
    const { engine, store } = createHarness(new StubInstructionProvider({ failOn: [1] }));

    await expect(engine.start(PROBLEM)).rejects.toThrow('provider unavailable for step 1');
    expect(store.size).toBe(0);
  });

  it('takes step titles from instructions when the provider has no describeStep', async () => {
    const provider: InstructionProvider = {
      generate: (stepNumber) =>
        Promise.resolve(makeInstruction(stepNumber, { title: `Generated ${String(stepNumber)}` })),
    };
    const { engine, store } = createHarness(provider);

    await engine.start(PROBLEM);
    const session = await store.load('session-1');

    expect(session?.steps[0]?.title).toBe('Generated 1');
    expect(session?.steps[1]?.title).toBe('Step 2');

    await submitValid(engine, 'session-1');
    const advanced = await store.load('session-1');
    expect(advanced?.steps[1]?.title).toBe('Generated 2');
    expect(advanced?.steps[2]?.title).toBe('Step 3');
  });

  it('keeps the described title when the instruction title differs', async () => {
    const provider = new StubInstructionProvider({
      overrides: new Map([[1, { title: 'Rendered title for step 1' }]]),
    });
    const { engine, store } = createHarness(provider);

    const { instruction } = await engine.start(PROBLEM);
    const session = await store.load('session-1');

    expect(instruction.title).toBe('Rendered title for step 1');
    expect(session?.steps[0]?.title).toBe('Stub step 1');
  });

  it('records a session_started trace entry', async () => {
    const { engine, trace, logLines } = createHarness();

    await engine.start(PROBLEM);

    expect(trace.entries).toEqual([
      {
        timestamp: '2025-01-01T00:00:00.000Z',
        sessionId: 'session-1',
        event: 'session_started',
        step: 1,
        data: { problem: PROBLEM },
      },
    ]);
    expect(loggedEvents(logLines)).toEqual(['session_started']);
  });
});

describe('GuidedResearchEngine.submit', () => {
  it('advances to the next step on valid findings', async () => {
    const provider = new StubInstructionProvider();
    const { engine, store } = createHarness(provider);
    const { sessionId, instruction } = await engine.start(PROBLEM);
    const findings = validFindingsFor(instruction);

    const result = await engine.submit(sessionId, findings);

    expect(result).toMatchObject({
      kind: 'progressed',
      validation: 'Step 1 validated successfully: Stub step 1',
      completedStep: 1,
      currentStep: 2,
      phase: 'UNDERSTAND_SCOPE',
      phaseProgress: 'Step 2 of 10 in Phase 1 (Understand & Scope)',
      progressFraction: 2 / 60,
      completedFraction: 1 / 60,
    });

    const session = await store.load(sessionId);
    expect(session?.currentStep).toBe(2);
    expect(session?.steps[0]).toMatchObject({
      status: 'VALIDATED',
      findings,
      validationResult: 'Step 1 validated successfully: Stub step 1',
      validatedAt: '2025-01-01T00:00:00.000Z',
    });
    expect(session?.steps[1]?.status).toBe('AWAITING_RESEARCH');
    expect(session?.accumulatedKnowledge).toEqual({ step_1: findings });
    expect(provider.calls[1]).toEqual({
      stepNumber: 2,
      problem: PROBLEM,
      knowledgeKeys: ['step_1'],
    });
  });

  it('rejects findings missing required fields and re-offers the same instruction', async () => {
    const provider = new StubInstructionProvider({
      overrides: new Map([[1, { requiredFields: NINE_FIELDS }]]),
    });
    const { engine, store } = createHarness(provider);
    const { sessionId, instruction } = await engine.start(PROBLEM);
    const before = store.getDocument(sessionId);
    const findings: Record<string, string> = { ...validFindingsFor(instruction) };
    delete findings.field_3;
    delete findings.field_7;

    const result = await engine.submit(sessionId, findings);

    expect(result).toEqual({
      kind: 'rejected',
      sessionId,
      step: 1,
      error: 'Missing required findings: field_3, field_7',
      hint: `Provide all required fields: ${NINE_FIELDS.join(', ')}`,
      missingFields: ['field_3', 'field_7'],
      invalidFields: [],
      instruction,
    });
    expect(store.getDocument(sessionId)).toBe(before);
    expect(provider.calls).toHaveLength(1);
  });

  it('rejects findings that are not an object', async () => {
    const { engine } = createHarness();
    const { sessionId } = await engine.start(PROBLEM);

    const result = await engine.submit(sessionId, ['not', 'a', 'mapping']);

    expect(result.kind).toBe('rejected');
    expect(result.kind === 'rejected' ? result.error : '').toBe(
      'Findings must be an object mapping field names to values'
    );
  });

  it('rejects findings with too little content', async () => {
    const { engine } = createHarness();
    const { sessionId } = await engine.start(PROBLEM);

    const result = await engine.submit(sessionId, {
      primary_finding: 'short',
      supporting_detail: 'Long enough supporting detail',
    });

    expect(result).toMatchObject({
      kind: 'rejected',
      error: 'Findings too short or empty: primary_finding',
      invalidFields: ['primary_finding'],
    });
  });

  it('rejects findings that cannot be stored as JSON instead of throwing', async () => {
    const { engine, store } = createHarness();
    const { sessionId } = await engine.start(PROBLEM);
    const before = store.getDocument(sessionId);

    const bigint = await engine.submit(sessionId, {
      primary_finding: 12345678901234567890n,
      supporting_detail: 'Long enough supporting detail',
    });
    const lossy = await engine.submit(sessionId, {
      primary_finding: Number.NaN,
      supporting_detail: { source: undefined },
    });

    expect(bigint).toMatchObject({
      kind: 'rejected',
      error: 'Findings cannot be stored as JSON: primary_finding',
      invalidFields: ['primary_finding'],
    });
    expect(lossy).toMatchObject({
      kind: 'rejected',
      error: 'Findings cannot be stored as JSON: primary_finding, supporting_detail',
      invalidFields: ['primary_finding', 'supporting_detail'],
    });
    expect(store.getDocument(sessionId)).toBe(before);
  });

  it('honours the configured minimum content length', async () => {
    const { engine } = createHarness(new StubInstructionProvider(), {
      validation: { minContentLength: 3 },
    });
    const { sessionId } = await engine.start(PROBLEM);

    const result = await engine.submit(sessionId, {
      primary_finding: 'abc',
      supporting_detail: 'defg',
    });

    expect(result.kind).toBe('progressed');
  });

  it('accepts keys that match required fields after normalization', async () => {
    const { engine, store } = createHarness();
    const { sessionId } = await engine.start(PROBLEM);

    const result = await engine.submit(sessionId, {
      'Primary Finding': 'Rotor imbalance dominates',
      supporting_detail: 'Peak at the rotation frequency',
    });

    expect(result.kind).toBe('progressed');
    const session = await store.load(sessionId);
    expect(session?.accumulatedKnowledge.step_1).toEqual({
      'Primary Finding': 'Rotor imbalance dominates',
      supporting_detail: 'Peak at the rotation frequency',
    });
  });

  it('records aliases declared by the instruction', async () => {
    const provider = new StubInstructionProvider({
      overrides: new Map([[1, { aliases: { scope_summary: 'primary_finding' } }]]),
    });
    const { engine, store } = createHarness(provider);
    const { sessionId } = await engine.start(PROBLEM);

    await submitValid(engine, sessionId);

    const session = await store.load(sessionId);
    expect(session?.accumulatedKnowledge.scope_summary).toBe(
      'Findings for primary_finding in detail'
    );
    expect(provider.calls[1]?.knowledgeKeys).toEqual(['step_1', 'scope_summary']);
  });

  it('reports an unknown session as not found', async () => {
    const { engine } = createHarness();

    const error: unknown = await engine.submit('nope', {}).catch((e: unknown) => e);

    expect(isSessionNotFound(error)).toBe(true);
    expect(error).toBeInstanceOf(GuidedEngineError);
    expect((error as GuidedEngineError).message).toBe('Session not found: nope');
  });

  it('leaves the stored session unchanged when the provider fails', async () => {
    const provider = new StubInstructionProvider();
    const { engine, store } = createHarness(provider);
    const { sessionId, instruction } = await engine.start(PROBLEM);
    const before = store.getDocument(sessionId);
    provider.failStep(2);

    await expect(engine.submit(sessionId, validFindingsFor(instruction))).rejects.toThrow(
      'provider unavailable for step 2'
    );

    expect(store.getDocument(sessionId)).toBe(before);
    const view = await engine.getCurrentStep(sessionId);
    expect(view.kind === 'active' ? view.currentStep : 0).toBe(1);
  });

  it('propagates a failed save and keeps the stored document', async () => {
    const memory = new MemorySessionStore();
    const storageError = new Error('disk full');
    let failSaves = false;
    const store: SessionStore = {
      create: (session) => memory.create(session),
      save: (session) => (failSaves ? Promise.reject(storageError) : memory.save(session)),
      load: (sessionId) => memory.load(sessionId),
    };
    const { engine, trace } = createHarness(new StubInstructionProvider(), { store });
    const { sessionId, instruction } = await engine.start(PROBLEM);
    const before = memory.getDocument(sessionId);
    failSaves = true;

    const error: unknown = await engine
      .submit(sessionId, validFindingsFor(instruction))
      .catch((e: unknown) => e);

    expect(error).toBe(storageError);
    expect(memory.getDocument(sessionId)).toBe(before);
    expect(trace.entries.map((e) => e.event)).toEqual(['session_started']);
  });

  it('refuses an instruction generated for the wrong step', async () => {
    const provider = new StubInstructionProvider({
      overrides: new Map([[2, { stepNumber: 3 }]]),
    });
    const { engine, store } = createHarness(provider);
    const { sessionId, instruction } = await engine.start(PROBLEM);
    const before = store.getDocument(sessionId);

    await expect(engine.submit(sessionId, validFindingsFor(instruction))).rejects.toMatchObject({
      code: 'INVALID_INSTRUCTION',
    });
    expect(store.getDocument(sessionId)).toBe(before);
  });

  it('refuses an instruction without required fields', async () => {
    const provider: InstructionProvider = {
      generate: (stepNumber) => {
        const instruction: StepInstruction = { ...makeInstruction(stepNumber), requiredFields: [] };
        return Promise.resolve(instruction);
      },
    };
    const { engine, store } = createHarness(provider);

    await expect(engine.start(PROBLEM)).rejects.toMatchObject({ code: 'INVALID_INSTRUCTION' });
    expect(store.size).toBe(0);
  });

  it('refuses to overwrite existing knowledge', async () => {
    const aliases = { shared: 'primary_finding' };
    const provider = new StubInstructionProvider({
      overrides: new Map([
        [1, { aliases }],
        [2, { aliases }],
      ]),
    });
    const { engine, store } = createHarness(provider);
    const { sessionId } = await engine.start(PROBLEM);
    await submitValid(engine, sessionId);
    const before = store.getDocument(sessionId);

    await expect(submitValid(engine, sessionId)).rejects.toMatchObject({
      code: 'KNOWLEDGE_CONFLICT',
      details: 'key: shared',
    });
    expect(store.getDocument(sessionId)).toBe(before);
  });

  it('reports a session without an awaiting instruction as inconsistent', async () => {
    const { engine, store } = createHarness();
    const { sessionId } = await engine.start(PROBLEM);
    const session = await store.load(sessionId);
    if (session === undefined) {
      throw new Error('session missing');
    }
    await store.save({
      ...session,
      steps: session.steps.map(
        (s): StepRecord =>
          s.stepNumber === 1
            ? { stepNumber: 1, phase: s.phase, title: s.title, status: 'PENDING' }
            : s
      ),
    });

    await expect(submitValid(engine, sessionId)).rejects.toMatchObject({
      code: 'STATE_INCONSISTENT',
    });
  });

  it('traces rejections and validations', async () => {
    const { engine, trace, logLines } = createHarness();
    const { sessionId, instruction } = await engine.start(PROBLEM);

    await engine.submit(sessionId, {});
    await engine.submit(sessionId, validFindingsFor(instruction));

    expect(trace.entries.map((e) => [e.event, e.step])).toEqual([
      ['session_started', 1],
      ['step_rejected', 1],
      ['step_validated', 1],
    ]);
    expect(trace.entries[1]?.data).toEqual({
      missing_fields: ['primary_finding', 'supporting_detail'],
      invalid_fields: [],
    });
    expect(loggedEvents(logLines)).toEqual(['session_started', 'step_rejected', 'step_validated']);
  });

  it('logs trace failures without failing the submission', async () => {
    const failingTrace: ResearchTrace = {
      append: () => Promise.reject(new Error('disk full')),
    };
    const { engine, logLines } = createHarness(new StubInstructionProvider(), {
      trace: failingTrace,
    });
    const { sessionId } = await engine.start(PROBLEM);

    const result = await submitValid(engine, sessionId);

    expect(result.kind).toBe('progressed');
    const warnings = logLines
      .map((line) => JSON.parse(line) as { level: string; event: string; data?: unknown })
      .filter((entry) => entry.level === 'warn');
    expect(warnings).toHaveLength(2);
    expect(warnings[1]?.event).toBe('trace_write_failed');
    expect(warnings[1]?.data).toEqual({
      sessionId,
      event: 'step_validated',
      error: 'disk full',
    });
  });
});

describe('completing a session', () => {
  it('validates all 60 steps and returns the deliverable', async () => {
    const { engine, trace } = createHarness();
    const { sessionId } = await engine.start(PROBLEM);

    let result: SubmitResult | undefined;
    let fractionAfterStep15: number | undefined;
    for (let step = 1; step <= 60; step++) {
      result = await submitValid(engine, sessionId);
      if (result.kind === 'progressed' && result.completedStep === 15) {
        fractionAfterStep15 = result.completedFraction;
      }
    }

    expect(fractionAfterStep15).toBe(0.25);
    if (result?.kind !== 'completed') {
      throw new Error('expected a completed result');
    }
    expect(result.validation).toBe('Step 60 validated successfully: Stub step 60');
    expect(result.summary.validatedSteps).toBe(60);
    expect(result.summary.phases.map((p) => [p.validated, p.total])).toEqual([
      [10, 10],
      [6, 6],
      [10, 10],
      [6, 6],
      [18, 18],
      [10, 10],
    ]);
    expect(result.finalDeliverable.executiveSummary).toBe(
      `Guided TRIZ research on "${PROBLEM}" validated 60 of 60 steps.`
    );
    expect(trace.entries.at(-1)).toMatchObject({ event: 'session_completed', step: 60 });

    const view = await engine.getCurrentStep(sessionId);
    expect(view.kind).toBe('completed');
    expect(view.kind === 'completed' ? view.finalDeliverable : undefined).toEqual(
      result.finalDeliverable
    );

    await expect(engine.submit(sessionId, {})).rejects.toMatchObject({
      code: 'SESSION_COMPLETED',
    });
    const summary = await engine.getSummary(sessionId);
    expect(summary.status).toBe('COMPLETED');
  });
});

describe('resuming a session', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'engine-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns the stored instruction byte for byte after a restart', async () => {
    const catalog = await loadStepCatalog();
    const options = {
      provider: new CatalogInstructionProvider(catalog),
      logger: new Logger({ component: 'test', write: () => undefined }),
    };
    const first = new GuidedResearchEngine({
      ...options,
      store: new FileSessionStore(tempDir),
    });
    const { sessionId, instruction } = await first.start(PROBLEM);
    const progressed = await first.submit(sessionId, validFindingsFor(instruction));

    const restarted = new GuidedResearchEngine({
      ...options,
      store: new FileSessionStore(tempDir),
    });
    const view = await restarted.getCurrentStep(sessionId);

    expect(progressed.kind).toBe('progressed');
    expect(view.kind).toBe('active');
    expect(JSON.stringify(view.kind === 'active' ? view.instruction : null)).toBe(
      JSON.stringify(progressed.kind === 'progressed' ? progressed.instruction : null)
    );
  });
});

describe('scenario: reduce vibration without increasing mass', () => {
  it('starts on the five-field context map and advances to step 2', async () => {
    const catalog = await loadStepCatalog();
    const { engine } = createHarness(new CatalogInstructionProvider(catalog));

    const started = await engine.start(PROBLEM);
    expect(started.phase).toBe('UNDERSTAND_SCOPE');
    expect(started.instruction.requiredFields).toHaveLength(5);

    const result = await engine.submit(started.sessionId, validFindingsFor(started.instruction));

    expect(result.kind).toBe('progressed');
    if (result.kind === 'progressed') {
      expect(result.currentStep).toBe(2);
      expect(result.phase).toBe('UNDERSTAND_SCOPE');
      expect(Math.round(result.progressFraction * 100)).toBe(3);
    }
  });
});

describe('engine properties', () => {
  it('rejects exactly the omitted required fields and keeps the step', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 9 }).chain((count) => {
          const fields = NINE_FIELDS.slice(0, count);
          return fc.tuple(fc.constant(fields), fc.subarray(fields, { minLength: 1 }));
        }),
        async ([fields, omitted]) => {
          const provider = new StubInstructionProvider({
            overrides: new Map([[1, { requiredFields: fields }]]),
          });
          const { engine } = createHarness(provider);
          const { sessionId, instruction } = await engine.start(PROBLEM);
          const findings = Object.fromEntries(
            Object.entries(validFindingsFor(instruction)).filter(([key]) => !omitted.includes(key))
          );

          const result = await engine.submit(sessionId, findings);

          expect(result.kind === 'rejected' ? result.missingFields : undefined).toEqual(omitted);
          expect(result.kind === 'rejected' ? result.step : undefined).toBe(1);
        }
      ),
      { numRuns: 25 }
    );
  });

  it('advances exactly one step per valid submission', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 12 }), async (submissions) => {
        const { engine, store } = createHarness();
        const { sessionId } = await engine.start(PROBLEM);

        for (let i = 0; i < submissions; i++) {
          await submitValid(engine, sessionId);
        }

        const session = await store.load(sessionId);
        expect(session?.currentStep).toBe(submissions + 1);
        expect(Object.keys(session?.accumulatedKnowledge ?? {})).toHaveLength(submissions);
        expect(session?.steps.filter((s) => s.status === 'AWAITING_RESEARCH')).toHaveLength(1);
      }),
      { numRuns: 10 }
    );
  });

  it('starts any non-blank problem on step 1 with required fields', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.string({ minLength: 1 }).filter((s) => s.trim() !== ''),
        async (problem) => {
          const { engine } = createHarness();
          const result = await engine.start(problem);

          expect(result.currentStep).toBe(1);
          expect(result.instruction.requiredFields.length).toBeGreaterThan(0);
        }
      ),
      { numRuns: 25 }
    );
  });
});
