/**
 * Append-only accumulated knowledge.
 *
 * Validated findings are recorded under `step_<n>` and under any aliases the
 * step's instruction declares. Existing keys are never overwritten.
 *
 * @packageDocumentation
 */

import { findFieldKey } from './validator.js';
import {
  stepKey,
  type AccumulatedKnowledge,
  type Findings,
  type StepInstruction,
} from './types.js';

/**
 * Thrown when recording would overwrite an existing knowledge entry.
 */
export class KnowledgeConflictError extends Error {
  /** The key that already exists. */
  public readonly key: string;

  constructor(key: string) {
    super(`Accumulated knowledge already contains '${key}'`);
    this.name = 'KnowledgeConflictError';
    this.key = key;
  }
}

/**
 * Returns a new knowledge mapping with a step's findings recorded.
 *
 * Aliases whose source field cannot be found in the findings are skipped.
 *
 * @param knowledge - Current knowledge; not modified.
 * @param instruction - The instruction of the validated step.
 * @param findings - The validated findings.
 * @param prefixLength - Prefix length for normalized field lookup.
 * @throws KnowledgeConflictError if the step key or an alias is already present.
 */
export function recordFindings(
  knowledge: AccumulatedKnowledge,
  instruction: StepInstruction,
  findings: Findings,
  prefixLength?: number
): AccumulatedKnowledge {
  const key = stepKey(instruction.stepNumber);
  if (Object.prototype.hasOwnProperty.call(knowledge, key)) {
    throw new KnowledgeConflictError(key);
  }

  const next: Record<string, unknown> = { ...knowledge, [key]: findings };

  for (const [alias, field] of Object.entries(instruction.aliases)) {
    if (Object.prototype.hasOwnProperty.call(next, alias)) {
      throw new KnowledgeConflictError(alias);
    }
    const sourceKey = findFieldKey(findings, field, prefixLength);
    if (sourceKey !== undefined) {
      next[alias] = findings[sourceKey];
    }
  }

  return next;
}

/**
 * Looks up a dotted path in knowledge.
 *
 * The first segment is a knowledge key. For object values, later segments
 * match keys exactly or by normalized form; for arrays they are indices.
 *
 * @example
 * ```typescript
 * lookupKnowledge(knowledge, 'step_21.harmful_functions.0');
 * lookupKnowledge(knowledge, 'recommended_principles.1');
 * ```
 * @returns The value, or undefined if any segment is absent.
 */
export function lookupKnowledge(
  knowledge: AccumulatedKnowledge,
  path: string,
  prefixLength?: number
): unknown {
  const [head, ...rest] = path.split('.');
  if (head === undefined || !Object.prototype.hasOwnProperty.call(knowledge, head)) {
    return undefined;
  }

  let current: unknown = knowledge[head];
  for (const segment of rest) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) {
        return undefined;
      }
      current = current[Number(segment)];
    } else if (typeof current === 'object' && current !== null) {
      const record: Readonly<Record<string, unknown>> = { ...current };
      const key = findFieldKey(record, segment, prefixLength);
      current = key === undefined ? undefined : record[key];
    } else {
      return undefined;
    }
  }
  return current;
}

