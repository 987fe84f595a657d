/**
 * Placeholder rendering for step catalog text.
 *
 * Placeholders are written `{{...}}`:
 *
 * - `{{problem}}` inserts the problem statement, cut to 50 characters.
 * - `{{step_21.harmful_functions.0 | "primary harm"}}` tries each
 *   alternative in turn. Paths look up accumulated knowledge; a quoted
 *   alternative is literal text.
 *
 * Rendering depends only on the template, the problem and the knowledge.
 *
 * @packageDocumentation
 */

import { lookupKnowledge } from '../knowledge.js';
import { findFieldKey } from '../validator.js';
import type { AccumulatedKnowledge } from '../types.js';

/** Characters of the problem statement inserted by `{{problem}}`. */
export const PROBLEM_EXCERPT_LENGTH = 50;

/** Maximum characters inserted for a knowledge reference. */
export const REFERENCE_EXCERPT_LENGTH = 60;

/**
 * Keys tried, in order, when a referenced value is an object.
 */
const LABEL_KEYS: readonly string[] = [
  'name',
  'title',
  'principle_name',
  'solution',
  'function',
  'description',
];

const PLACEHOLDER_PATTERN = /\{\{([^{}]*)\}\}/g;
const PATH_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z0-9_]+)*$/;
const LITERAL_PATTERN = /^"([^"]*)"$/;

/**
 * One alternative inside a placeholder.
 */
export type TemplateAlternative =
  | { readonly kind: 'problem' }
  | { readonly kind: 'path'; readonly path: string }
  | { readonly kind: 'literal'; readonly text: string };

/**
 * Inputs to {@link renderTemplate}.
 */
export interface TemplateContext {
  readonly problem: string;
  readonly knowledge: AccumulatedKnowledge;
  readonly fieldKeyPrefixLength?: number;
}

/**
 * Parses the body of a placeholder.
 *
 * @returns The alternatives, or an error message.
 */
export function parsePlaceholder(body: string): TemplateAlternative[] | string {
  const alternatives: TemplateAlternative[] = [];
  for (const raw of body.split('|')) {
    const part = raw.trim();
    const literal = LITERAL_PATTERN.exec(part);
    if (literal !== null) {
      alternatives.push({ kind: 'literal', text: literal[1] ?? '' });
    } else if (part === 'problem') {
      alternatives.push({ kind: 'problem' });
    } else if (PATH_PATTERN.test(part)) {
      alternatives.push({ kind: 'path', path: part });
    } else {
      return `Invalid placeholder alternative "${part}" in "{{${body}}}"`;
    }
  }
  return alternatives;
}

/**
 * Checks every placeholder of a template.
 *
 * @returns Error messages; empty when the template is valid.
 */
export function checkTemplate(template: string): string[] {
  const errors: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const parsed = parsePlaceholder(match[1] ?? '');
    if (typeof parsed === 'string') {
      errors.push(parsed);
    }
  }
  return errors;
}

function excerpt(text: string, length: number): string {
  return text.length <= length ? text : text.slice(0, length).trimEnd();
}

/**
 * Renders a knowledge value as a short label.
 *
 * Arrays use their first element; objects use their first label key.
 */
export function renderReference(value: unknown, prefixLength?: number): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : excerpt(trimmed, REFERENCE_EXCERPT_LENGTH);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.length === 0 ? undefined : renderReference(value[0], prefixLength);
  }
  if (typeof value === 'object' && value !== null) {
    const record: Readonly<Record<string, unknown>> = { ...value };
    for (const label of LABEL_KEYS) {
      const key = findFieldKey(record, label, prefixLength);
      if (key !== undefined) {
        const text = renderReference(record[key], prefixLength);
        if (text !== undefined) {
          return text;
        }
      }
    }
  }
  return undefined;
}

function resolveAlternative(
  alternative: TemplateAlternative,
  context: TemplateContext
): string | undefined {
  switch (alternative.kind) {
    case 'problem':
      return excerpt(context.problem, PROBLEM_EXCERPT_LENGTH);
    case 'literal':
      return alternative.text;
    case 'path':
      return renderReference(
        lookupKnowledge(context.knowledge, alternative.path, context.fieldKeyPrefixLength),
        context.fieldKeyPrefixLength
      );
  }
}

/**
 * Replaces every placeholder in a template.
 *
 * A placeholder with no resolvable alternative renders as an empty string.
 *
 * @example
 * ```typescript
 * renderTemplate('Deep research Principle #{{primary_principle | "1"}}', {
 *   problem: 'Reduce vibration',
 *   knowledge: { primary_principle: 15 },
 * }); // "Deep research Principle #15"
 * ```
 */
export function renderTemplate(template: string, context: TemplateContext): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, body: string) => {
    const parsed = parsePlaceholder(body);
    if (typeof parsed === 'string') {
      return '';
    }
    for (const alternative of parsed) {
      const text = resolveAlternative(alternative, context);
      if (text !== undefined) {
        return text;
      }
    }
    return '';
  });
}
