/**
 * Error suggestion system for the triz CLI.
 *
 * Maps failures raised by the engine, the session store and the config
 * loader to suggestions that help users resolve them.
 *
 * @packageDocumentation
 */

import { ConfigValidationError } from '../config/validator.js';
import { ConfigParseError } from '../config/parser.js';
import { EnvCoercionError } from '../config/env.js';
import { GuidedEngineError } from '../guided/engine.js';
import { SessionPersistenceError } from '../guided/persistence.js';
import { CliUsageError } from './types.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Categories of CLI failures.
 */
export type ErrorType =
  | 'usage'
  | 'invalid_problem'
  | 'session_not_found'
  | 'session_completed'
  | 'knowledge_conflict'
  | 'session_corruption'
  | 'config_error'
  | 'catalog_error'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage: [
    {
      text: 'Show the usage of every command',
      action: 'triz help',
    },
  ],

  invalid_problem: [
    {
      text: 'Describe the problem in one non-empty sentence',
      action: 'triz start "Reduce vibration without increasing mass"',
    },
  ],

  session_not_found: [
    {
      text: 'List known sessions and copy the id',
      action: 'triz list',
    },
    {
      text: 'Point at the directory the session was created in',
      action: 'triz --sessions-dir <dir> status <session-id>',
    },
  ],

  session_completed: [
    {
      text: 'Show the final deliverable of the session',
      action: 'triz show <session-id>',
    },
    {
      text: 'Start a new session for a follow-up iteration',
      action: 'triz start <problem>',
    },
  ],

  knowledge_conflict: [
    {
      text: 'Rename the finding that reuses an earlier field name and resubmit',
    },
    {
      text: 'Review what earlier steps recorded',
      action: 'triz status <session-id>',
    },
  ],

  session_corruption: [
    {
      text: 'Inspect the session document named in the error',
    },
    {
      text: 'Check which sessions still load',
      action: 'triz list',
    },
  ],

  config_error: [
    {
      text: 'Check triz.toml and TRIZ_* environment variables',
    },
    {
      text: 'Run with an explicit config file',
      action: 'triz --config <path> <command>',
    },
  ],

  catalog_error: [
    {
      text: 'Fix the step catalog named in the error, or clear paths.catalog to use the bundled one',
    },
  ],

  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'triz --debug <command>',
    },
  ],
};

/**
 * Classifies a thrown value.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof CliUsageError) {
    return 'usage';
  }
  if (error instanceof GuidedEngineError) {
    switch (error.code) {
      case 'INVALID_PROBLEM':
        return 'invalid_problem';
      case 'SESSION_NOT_FOUND':
        return 'session_not_found';
      case 'SESSION_COMPLETED':
        return 'session_completed';
      case 'KNOWLEDGE_CONFLICT':
        return 'knowledge_conflict';
      case 'STATE_INCONSISTENT':
        return 'session_corruption';
      case 'INVALID_INSTRUCTION':
        return 'catalog_error';
      default: {
        const exhaustiveCheck: never = error.code;
        return exhaustiveCheck;
      }
    }
  }
  if (error instanceof SessionPersistenceError) {
    return 'session_corruption';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'config_error';
  }
  if (error instanceof Error && error.message.startsWith('Failed to load catalog')) {
    return 'catalog_error';
  }
  return 'unknown';
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText = suggestion.action ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats an error message followed by numbered suggestions.
 */
export function formatErrorWithSuggestions(
  error: unknown,
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const errorType = classifyError(error);
  const message = error instanceof Error ? error.message : String(error);

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${message}`;

  if (error instanceof GuidedEngineError || error instanceof SessionPersistenceError) {
    if (error.details !== undefined) {
      result += `\n  ${yellowCode}Details:${resetCode} ${error.details}`;
    }
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  ERROR_SUGGESTIONS[errorType].forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}
