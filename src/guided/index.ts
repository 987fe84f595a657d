/**
 * Guided TRIZ research protocol.
 *
 * @packageDocumentation
 */

export {
  GuidedResearchEngine,
  GuidedEngineError,
  isSessionNotFound,
  describePhaseProgress,
  type GuidedEngineErrorCode,
  type GuidedEngineOptions,
  type PhasePosition,
  type StartResult,
  type SubmitResult,
  type RejectedResult,
  type ProgressedResult,
  type CompletedResult,
  type CurrentStepView,
  type ActiveStepView,
  type CompletedStepView,
} from './engine.js';
export {
  FileSessionStore,
  MemorySessionStore,
  SessionPersistenceError,
  SESSION_FORMAT_VERSION,
  serializeSession,
  deserializeSession,
  type SessionStore,
  type SessionListing,
  type SessionPersistenceErrorType,
} from './persistence.js';
export {
  FileResearchTrace,
  MemoryResearchTrace,
  TraceReadError,
  type ResearchTrace,
  type TraceEntry,
  type TraceEventType,
} from './trace.js';
export {
  synthesizeFinalDeliverable,
  buildSessionSummary,
  renderFindingText,
  type FinalDeliverable,
  type PhaseTrace,
  type RecommendedSolution,
  type SessionSummary,
  type PhaseSummary,
} from './synthesizer.js';
export {
  validateFindings,
  findFieldKey,
  normalizeFieldKey,
  DEFAULT_VALIDATION_OPTIONS,
  type ValidationOptions,
  type FindingsValidation,
} from './validator.js';
export { recordFindings, lookupKnowledge, KnowledgeConflictError } from './knowledge.js';
export {
  TOTAL_STEPS,
  RESEARCH_PHASES,
  PHASE_DEFINITIONS,
  getPhaseDefinition,
  getPhaseForStep,
  type ResearchPhase,
  type PhaseDefinition,
  type StepStatus,
  type SessionStatus,
  type StepInstruction,
  type StepRecord,
  type GuidedSession,
  type Findings,
  type AccumulatedKnowledge,
} from './types.js';
export type { InstructionProvider } from './instructions/provider.js';
export {
  CatalogInstructionProvider,
  type CatalogInstructionProviderOptions,
} from './instructions/catalog-provider.js';
export {
  loadStepCatalog,
  parseStepCatalog,
  isCatalogError,
  DEFAULT_CATALOG_PATH,
  type StepCatalog,
  type StepDefinition,
  type CatalogParseError,
} from './instructions/catalog.js';
export { renderTemplate, checkTemplate } from './instructions/template.js';
export { createGuidedRuntime, type GuidedRuntime } from './setup.js';
