/**
 * Start command handler: opens a new guided research session.
 */

import { formatInstruction, formatProgressBar, wrapInBox } from '../utils/displayUtils.js';
import { CliUsageError, type CliCommandResult, type CliContext } from '../types.js';

/**
 * Handles `triz start <problem...>`.
 *
 * Positional arguments are joined with spaces, so the problem may be passed
 * unquoted.
 */
export async function handleStartCommand(context: CliContext): Promise<CliCommandResult> {
  const problem = context.args.join(' ');
  if (problem.trim() === '') {
    throw new CliUsageError('Usage: triz start <problem>');
  }

  const { engine } = await context.loadRuntime();
  const result = await engine.start(problem);

  if (context.options.json) {
    context.output.log(JSON.stringify(result, null, 2));
    return { exitCode: 0 };
  }

  context.output.log(wrapInBox(`Session ${result.sessionId}`, context.display));
  context.output.log(`Phase 1 (${result.phaseName}): ${result.phaseDescription}`);
  context.output.log(formatProgressBar(result.progressFraction, context.display));
  context.output.log('');
  context.output.log(formatInstruction(result.instruction, context.display));
  context.output.log('');
  context.output.log(`Submit findings with: triz submit ${result.sessionId} <findings.json>`);
  return { exitCode: 0 };
}
