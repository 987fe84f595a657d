/**
 * Shared display utilities for CLI commands.
 *
 * Formats instructions, progress, summaries and deliverables, plus the
 * box-drawing borders used around headers.
 */

import type { FinalDeliverable, SessionSummary } from '../../guided/synthesizer.js';
import { TOTAL_STEPS, type StepInstruction } from '../../guided/types.js';

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

const PROGRESS_BAR_WIDTH = 20;

export function formatRelativeTime(timestamp: string, now: Date = new Date()): string {
  const then = new Date(timestamp);
  const diffMs = now.getTime() - then.getTime();

  const seconds = Math.floor(diffMs / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${String(days)}d ago`;
  }
  if (hours > 0) {
    return `${String(hours)}h ago`;
  }
  if (minutes > 0) {
    return `${String(minutes)}m ago`;
  }
  return 'just now';
}

export function getBorderChars(options: DisplayOptions): BorderChars {
  if (options.unicode) {
    return {
      topLeft: '┌',
      topRight: '┐',
      bottomLeft: '└',
      bottomRight: '┘',
      horizontal: '─',
      vertical: '│',
    };
  }
  return {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
  };
}

/**
 * Strips ANSI escape sequences from a string to get visible length.
 */
function stripAnsi(str: string): string {
  return str.replace(ANSI_ESCAPE_PATTERN, '');
}

export function wrapInBox(text: string, options: DisplayOptions): string {
  const border = getBorderChars(options);
  const lines = text.split('\n');
  const maxLength = Math.max(...lines.map((line) => stripAnsi(line).length));
  const horizontalBorder = border.horizontal.repeat(maxLength + 2);

  let result = border.topLeft + horizontalBorder + border.topRight + '\n';
  for (const line of lines) {
    const visibleLength = stripAnsi(line).length;
    const padding = ' '.repeat(maxLength - visibleLength);
    result += border.vertical + ' ' + line + padding + ' ' + border.vertical + '\n';
  }
  result += border.bottomLeft + horizontalBorder + border.bottomRight;

  return result;
}

/**
 * Renders a fraction as a fixed-width bar with a percentage.
 *
 * @example
 * ```typescript
 * formatProgressBar(0.25, { colors: false, unicode: false });
 * // "[#####---------------] 25%"
 * ```
 */
export function formatProgressBar(fraction: number, options: DisplayOptions): string {
  const clamped = Math.min(1, Math.max(0, fraction));
  const filled = Math.round(clamped * PROGRESS_BAR_WIDTH);
  const full = options.unicode ? '█' : '#';
  const empty = options.unicode ? '░' : '-';
  const bar = full.repeat(filled) + empty.repeat(PROGRESS_BAR_WIDTH - filled);
  return `[${bar}] ${String(Math.round(clamped * 100))}%`;
}

function bold(text: string, options: DisplayOptions): string {
  return options.colors ? `\x1b[1m${text}\x1b[0m` : text;
}

function bullets(items: readonly string[]): string[] {
  return items.map((item) => `  - ${item}`);
}

/**
 * Formats a step instruction for the terminal.
 */
export function formatInstruction(instruction: StepInstruction, options: DisplayOptions): string {
  const lines = [
    bold(
      `Step ${String(instruction.stepNumber)}/${String(TOTAL_STEPS)}: ${instruction.title}`,
      options
    ),
    `Tool: ${instruction.relatedTool}`,
    '',
    'Task:',
    `  ${instruction.task}`,
    '',
    'Search queries:',
    ...bullets(instruction.searchQueries),
    '',
    'Required fields:',
    ...bullets(instruction.requiredFields),
    '',
    `Validation: ${instruction.validationCriteria}`,
    `Rationale: ${instruction.rationale}`,
    '',
    'Expected output:',
    instruction.expectedOutputShape,
  ];
  return lines.join('\n');
}

/**
 * Formats per-phase progress of a session.
 */
export function formatSummary(summary: SessionSummary, options: DisplayOptions): string {
  const fraction = summary.validatedSteps / summary.totalSteps;
  const lines = [
    bold(`Session ${summary.sessionId} (${summary.status})`, options),
    `Problem: ${summary.problem}`,
    `Validated: ${String(summary.validatedSteps)}/${String(summary.totalSteps)} ${formatProgressBar(fraction, options)}`,
    '',
    ...summary.phases.map(
      (p, i) =>
        `  Phase ${String(i + 1)} ${p.name}: ${String(p.validated)}/${String(p.total)} (${p.tools})`
    ),
  ];
  return lines.join('\n');
}

/**
 * Formats the final report of a completed session.
 */
export function formatDeliverable(deliverable: FinalDeliverable, options: DisplayOptions): string {
  const lines = [
    wrapInBox(`Final deliverable: ${deliverable.problem}`, options),
    '',
    `Methodology: ${deliverable.methodology}`,
    '',
    'Executive summary:',
    `  ${deliverable.executiveSummary}`,
    '',
    'Recommended solution:',
    `  ${deliverable.recommendedSolution.summary}`,
    `  Rationale: ${deliverable.recommendedSolution.rationale}`,
    '',
    'Implementation roadmap:',
    `  ${deliverable.implementationRoadmap}`,
    '',
    'Methodology trace:',
    ...deliverable.methodologyTrace.map(
      (t) => `  ${t.stepRange} ${t.name}: ${String(t.evidence.length)} validated`
    ),
    '',
    `Supporting evidence: ${deliverable.supportingEvidence}`,
    '',
    'Future iterations:',
    ...bullets(deliverable.futureIterations),
    '',
    deliverable.conclusion,
  ];
  return lines.join('\n');
}
