/**
 * Session persistence for guided research.
 *
 * Every mutation writes the complete session document, so any single file is
 * enough to resume. File writes go to a temporary file in the same directory
 * and are renamed into place.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import {
  isErrnoCode,
  resolveWithin,
  safeLink,
  safeMkdir,
  safeReadFile,
  safeReaddir,
  safeRename,
  safeUnlink,
  safeWriteFile,
  PathValidationError,
} from '../utils/safe-fs.js';
import {
  RESEARCH_PHASES,
  TOTAL_STEPS,
  getPhaseForStep,
  type GuidedSession,
  type ResearchPhase,
  type SessionStatus,
  type StepInstruction,
  type StepRecord,
  type StepStatus,
} from './types.js';

/**
 * Version of the persisted document format.
 */
export const SESSION_FORMAT_VERSION = '1.0.0';

/**
 * Error type for session persistence operations.
 */
export type SessionPersistenceErrorType =
  | 'parse_error'
  | 'schema_error'
  | 'file_error'
  | 'corruption_error'
  | 'already_exists';

/**
 * Error class for session storage failures.
 */
export class SessionPersistenceError extends Error {
  /** The type of persistence error. */
  public readonly errorType: SessionPersistenceErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new SessionPersistenceError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of persistence error.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: SessionPersistenceErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'SessionPersistenceError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Durable storage of whole session documents.
 */
export interface SessionStore {
  /**
   * Persists a new session.
   * @throws SessionPersistenceError with `already_exists` if the id is taken.
   */
  create(session: GuidedSession): Promise<void>;

  /** Overwrites the stored document for the session's id. */
  save(session: GuidedSession): Promise<void>;

  /** Loads a session, or undefined if no document exists for the id. */
  load(sessionId: string): Promise<GuidedSession | undefined>;
}

/**
 * Listing entry returned by {@link FileSessionStore.list}.
 */
export interface SessionListing {
  readonly sessionId: string;
  readonly problem: string;
  readonly status: SessionStatus;
  readonly currentStep: number;
  readonly updatedAt: string;
}

interface PersistedInstruction {
  step_number: number;
  title: string;
  task: string;
  search_queries: string[];
  required_fields: string[];
  validation_criteria: string;
  expected_output_shape: string;
  rationale: string;
  related_tool: string;
  aliases: Record<string, string>;
}

interface PersistedStep {
  step_number: number;
  phase: ResearchPhase;
  title: string;
  status: StepStatus;
  instruction: PersistedInstruction | null;
  findings: Record<string, unknown> | null;
  validation_result: string | null;
  validated_at: string | null;
}

/**
 * On-disk document layout.
 */
export interface PersistedSessionDocument {
  version: string;
  session_id: string;
  problem: string;
  status: SessionStatus;
  current_step: number;
  accumulated_knowledge: Record<string, unknown>;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
  steps: PersistedStep[];
}

const STEP_STATUSES: readonly StepStatus[] = ['PENDING', 'AWAITING_RESEARCH', 'VALIDATED', 'SKIPPED'];
const SESSION_STATUSES: readonly SessionStatus[] = ['ACTIVE', 'COMPLETED'];

/**
 * Session ids accepted by the file store. Anything else cannot name a file.
 */
const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

function toPersistedInstruction(instruction: StepInstruction): PersistedInstruction {
  return {
    step_number: instruction.stepNumber,
    title: instruction.title,
    task: instruction.task,
    search_queries: [...instruction.searchQueries],
    required_fields: [...instruction.requiredFields],
    validation_criteria: instruction.validationCriteria,
    expected_output_shape: instruction.expectedOutputShape,
    rationale: instruction.rationale,
    related_tool: instruction.relatedTool,
    aliases: { ...instruction.aliases },
  };
}

function toPersistedStep(step: StepRecord): PersistedStep {
  return {
    step_number: step.stepNumber,
    phase: step.phase,
    title: step.title,
    status: step.status,
    instruction: step.instruction === undefined ? null : toPersistedInstruction(step.instruction),
    findings: step.findings === undefined ? null : { ...step.findings },
    validation_result: step.validationResult ?? null,
    validated_at: step.validatedAt ?? null,
  };
}

/**
 * Converts a session to its persisted document layout.
 */
export function toPersistedDocument(session: GuidedSession): PersistedSessionDocument {
  return {
    version: SESSION_FORMAT_VERSION,
    session_id: session.sessionId,
    problem: session.problem,
    status: session.status,
    current_step: session.currentStep,
    accumulated_knowledge: { ...session.accumulatedKnowledge },
    created_at: session.createdAt,
    updated_at: session.updatedAt,
    completed_at: session.completedAt ?? null,
    steps: session.steps.map(toPersistedStep),
  };
}

/**
 * Serializes a session to pretty-printed JSON.
 */
export function serializeSession(session: GuidedSession): string {
  return JSON.stringify(toPersistedDocument(session), null, 2);
}

function schemaError(message: string, details?: string): SessionPersistenceError {
  return new SessionPersistenceError(`Invalid session document: ${message}`, 'schema_error', {
    details,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, field: string, context: string): string {
  const value = obj[field];
  if (typeof value !== 'string') {
    throw schemaError(`${context}${field} must be a string`);
  }
  return value;
}

function readOptionalString(
  obj: Record<string, unknown>,
  field: string,
  context: string
): string | undefined {
  const value = obj[field];
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw schemaError(`${context}${field} must be a string or null`);
  }
  return value;
}

function readStringArray(obj: Record<string, unknown>, field: string, context: string): string[] {
  const value = obj[field];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw schemaError(`${context}${field} must be an array of strings`);
  }
  return value;
}

function readStringRecord(
  obj: Record<string, unknown>,
  field: string,
  context: string
): Record<string, string> {
  const value = obj[field];
  if (!isRecord(value)) {
    throw schemaError(`${context}${field} must be an object`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw schemaError(`${context}${field}.${key} must be a string`);
    }
    result[key] = entry;
  }
  return result;
}

function parseInstruction(value: unknown, context: string): StepInstruction {
  if (!isRecord(value)) {
    throw schemaError(`${context}instruction must be an object or null`);
  }
  const stepNumber = value.step_number;
  if (typeof stepNumber !== 'number') {
    throw schemaError(`${context}instruction.step_number must be a number`);
  }
  const inner = `${context}instruction.`;
  return {
    stepNumber,
    title: readString(value, 'title', inner),
    task: readString(value, 'task', inner),
    searchQueries: readStringArray(value, 'search_queries', inner),
    requiredFields: readStringArray(value, 'required_fields', inner),
    validationCriteria: readString(value, 'validation_criteria', inner),
    expectedOutputShape: readString(value, 'expected_output_shape', inner),
    rationale: readString(value, 'rationale', inner),
    relatedTool: readString(value, 'related_tool', inner),
    aliases: readStringRecord(value, 'aliases', inner),
  };
}

function parseStep(value: unknown, index: number): StepRecord {
  const context = `steps[${String(index)}].`;
  if (!isRecord(value)) {
    throw schemaError(`steps[${String(index)}] must be an object`);
  }

  const expectedNumber = index + 1;
  if (value.step_number !== expectedNumber) {
    throw schemaError(`${context}step_number must be ${String(expectedNumber)}`);
  }

  const phase = value.phase;
  if (phase !== getPhaseForStep(expectedNumber)) {
    throw schemaError(
      `${context}phase must be ${getPhaseForStep(expectedNumber)}`,
      `Valid phases: ${RESEARCH_PHASES.join(', ')}`
    );
  }

  const rawStatus = value.status;
  const status = STEP_STATUSES.find((s) => s === rawStatus);
  if (status === undefined) {
    throw schemaError(`${context}status must be one of: ${STEP_STATUSES.join(', ')}`);
  }

  let step: StepRecord = {
    stepNumber: expectedNumber,
    phase: getPhaseForStep(expectedNumber),
    title: readString(value, 'title', context),
    status,
  };

  if (value.instruction !== null && value.instruction !== undefined) {
    step = { ...step, instruction: parseInstruction(value.instruction, context) };
  }
  if (value.findings !== null && value.findings !== undefined) {
    if (!isRecord(value.findings)) {
      throw schemaError(`${context}findings must be an object or null`);
    }
    step = { ...step, findings: value.findings };
  }
  const validationResult = readOptionalString(value, 'validation_result', context);
  if (validationResult !== undefined) {
    step = { ...step, validationResult };
  }
  const validatedAt = readOptionalString(value, 'validated_at', context);
  if (validatedAt !== undefined) {
    step = { ...step, validatedAt };
  }

  return step;
}

function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    throw new SessionPersistenceError(
      `Failed to parse session JSON: ${parseError.message}`,
      'parse_error',
      { cause: parseError, details: 'The file does not contain valid JSON' }
    );
  }
}

/**
 * Parses and validates a persisted session document.
 *
 * @param json - Document text.
 * @returns The session.
 * @throws SessionPersistenceError with `parse_error` or `schema_error`.
 */
export function deserializeSession(json: string): GuidedSession {
  const data = parseJson(json);

  if (!isRecord(data)) {
    throw schemaError('expected an object');
  }

  const version = readString(data, 'version', '');
  if (!/^\d+\.\d+\.\d+$/.test(version)) {
    throw schemaError(`version "${version}" does not match semver pattern`);
  }

  const sessionId = readString(data, 'session_id', '');
  if (sessionId.length === 0) {
    throw schemaError('session_id must be a non-empty string');
  }

  const problem = readString(data, 'problem', '');

  const rawStatus = data.status;
  const status = SESSION_STATUSES.find((s) => s === rawStatus);
  if (status === undefined) {
    throw schemaError(`status must be one of: ${SESSION_STATUSES.join(', ')}`);
  }

  const currentStep = data.current_step;
  if (
    typeof currentStep !== 'number' ||
    !Number.isInteger(currentStep) ||
    currentStep < 1 ||
    currentStep > TOTAL_STEPS
  ) {
    throw schemaError(`current_step must be an integer between 1 and ${String(TOTAL_STEPS)}`);
  }

  const knowledge = data.accumulated_knowledge;
  if (!isRecord(knowledge)) {
    throw schemaError('accumulated_knowledge must be an object');
  }

  const rawSteps = data.steps;
  if (!Array.isArray(rawSteps) || rawSteps.length !== TOTAL_STEPS) {
    throw schemaError(`steps must be an array of ${String(TOTAL_STEPS)} entries`);
  }

  const session: GuidedSession = {
    sessionId,
    problem,
    status,
    currentStep,
    steps: rawSteps.map((raw: unknown, index) => parseStep(raw, index)),
    accumulatedKnowledge: knowledge,
    createdAt: readString(data, 'created_at', ''),
    updatedAt: readString(data, 'updated_at', ''),
  };

  const completedAt = readOptionalString(data, 'completed_at', '');
  return completedAt === undefined ? session : { ...session, completedAt };
}

/**
 * Stores each session as `<sessionId>.json` in a directory.
 */
export class FileSessionStore implements SessionStore {
  /** Absolute directory holding the session documents. */
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  /**
   * Path of a session's document.
   *
   * @throws PathValidationError if the id cannot name a file.
   */
  sessionPath(sessionId: string): string {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new PathValidationError('Invalid session id', sessionId);
    }
    return resolveWithin(this.directory, `${sessionId}.json`);
  }

  /**
   * Writes a new session document. The document is written to a temporary
   * file and linked into place, so the id is claimed only by a complete file.
   */
  async create(session: GuidedSession): Promise<void> {
    const filePath = this.sessionPath(session.sessionId);
    const json = serializeSession(session);
    const tempPath = this.tempPath();

    await safeMkdir(this.directory);

    let failure: unknown;
    try {
      await safeWriteFile(tempPath, json);
      await safeLink(tempPath, filePath);
    } catch (error) {
      failure = error;
    }
    const cleanupNote = await this.removeTemp(tempPath);

    if (failure === undefined) {
      return;
    }
    if (isErrnoCode(failure, 'EEXIST')) {
      throw new SessionPersistenceError(
        `Session "${session.sessionId}" already exists`,
        'already_exists',
        { details: filePath }
      );
    }
    const fileError = failure instanceof Error ? failure : new Error(String(failure));
    throw new SessionPersistenceError(
      `Failed to create session file "${filePath}": ${fileError.message}`,
      'file_error',
      {
        cause: fileError,
        details: `Check that the directory exists and is writable.${cleanupNote}`,
      }
    );
  }

  async save(session: GuidedSession): Promise<void> {
    const filePath = this.sessionPath(session.sessionId);
    const json = serializeSession(session);
    const tempPath = this.tempPath();

    await safeMkdir(this.directory);

    try {
      await safeWriteFile(tempPath, json);
      await safeRename(tempPath, filePath);
    } catch (error) {
      const fileError = error instanceof Error ? error : new Error(String(error));
      const cleanupNote = await this.removeTemp(tempPath);
      throw new SessionPersistenceError(
        `Failed to save session to "${filePath}": ${fileError.message}`,
        'file_error',
        {
          cause: fileError,
          details: `Check that the directory exists and is writable.${cleanupNote}`,
        }
      );
    }
  }

  private tempPath(): string {
    return join(this.directory, `.session-${randomUUID()}.tmp`);
  }

  /**
   * Deletes a temporary file.
   *
   * @returns A note for error details when the file could not be removed.
   */
  private removeTemp(tempPath: string): Promise<string> {
    return safeUnlink(tempPath).then(
      () => '',
      (cleanupError: unknown) =>
        isErrnoCode(cleanupError, 'ENOENT')
          ? ''
          : ` Temporary file ${tempPath} could not be removed.`
    );
  }

  async load(sessionId: string): Promise<GuidedSession | undefined> {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      return undefined;
    }
    const filePath = this.sessionPath(sessionId);

    let content: string;
    try {
      content = await safeReadFile(filePath);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return undefined;
      }
      const fileError = error instanceof Error ? error : new Error(String(error));
      throw new SessionPersistenceError(
        `Failed to read session file "${filePath}": ${fileError.message}`,
        'file_error',
        { cause: fileError }
      );
    }

    if (content.trim() === '') {
      throw new SessionPersistenceError(
        `Session file for "${sessionId}" is empty`,
        'corruption_error',
        { details: 'The file exists but contains no data.' }
      );
    }

    let session: GuidedSession;
    try {
      session = deserializeSession(content);
    } catch (error) {
      if (error instanceof SessionPersistenceError) {
        throw new SessionPersistenceError(
          `Error loading session "${sessionId}": ${error.message}`,
          error.errorType,
          { cause: error.cause, details: error.details }
        );
      }
      throw error;
    }

    if (session.sessionId !== sessionId) {
      throw new SessionPersistenceError(
        `Session file "${filePath}" holds session "${session.sessionId}"`,
        'corruption_error'
      );
    }
    return session;
  }

  /**
   * Lists stored sessions, most recently updated first.
   *
   * Unreadable documents are skipped and reported in `failures`.
   */
  async list(): Promise<{ sessions: SessionListing[]; failures: string[] }> {
    let names: string[];
    try {
      names = await safeReaddir(this.directory);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return { sessions: [], failures: [] };
      }
      throw error;
    }

    const sessions: SessionListing[] = [];
    const failures: string[] = [];
    for (const name of names.filter((n) => n.endsWith('.json')).sort()) {
      const sessionId = name.slice(0, -'.json'.length);
      try {
        const session = await this.load(sessionId);
        if (session !== undefined) {
          sessions.push({
            sessionId: session.sessionId,
            problem: session.problem,
            status: session.status,
            currentStep: session.currentStep,
            updatedAt: session.updatedAt,
          });
        }
      } catch (error) {
        if (!(error instanceof SessionPersistenceError)) {
          throw error;
        }
        failures.push(`${sessionId}: ${error.message}`);
      }
    }

    sessions.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
    return { sessions, failures };
  }
}

/**
 * In-process store keeping serialized documents in a map.
 *
 * Documents pass through the same serializer as the file store, so loaded
 * sessions never share references with saved ones.
 */
export class MemorySessionStore implements SessionStore {
  private readonly documents = new Map<string, string>();

  create(session: GuidedSession): Promise<void> {
    if (this.documents.has(session.sessionId)) {
      return Promise.reject(
        new SessionPersistenceError(
          `Session "${session.sessionId}" already exists`,
          'already_exists'
        )
      );
    }
    this.documents.set(session.sessionId, serializeSession(session));
    return Promise.resolve();
  }

  save(session: GuidedSession): Promise<void> {
    this.documents.set(session.sessionId, serializeSession(session));
    return Promise.resolve();
  }

  load(sessionId: string): Promise<GuidedSession | undefined> {
    const document = this.documents.get(sessionId);
    return Promise.resolve(document === undefined ? undefined : deserializeSession(document));
  }

  /** Raw stored document, for inspection. */
  getDocument(sessionId: string): string | undefined {
    return this.documents.get(sessionId);
  }

  /** Number of stored sessions. */
  get size(): number {
    return this.documents.size;
  }
}
