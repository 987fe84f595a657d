/**
 * Show command handler: prints the pending instruction or the final report.
 */

import { formatDeliverable, formatInstruction } from '../utils/displayUtils.js';
import { CliUsageError, type CliCommandResult, type CliContext } from '../types.js';

/**
 * Handles `triz show <session-id>`.
 */
export async function handleShowCommand(context: CliContext): Promise<CliCommandResult> {
  const [sessionId] = context.args;
  if (sessionId === undefined || context.args.length > 1) {
    throw new CliUsageError('Usage: triz show <session-id>');
  }

  const { engine } = await context.loadRuntime();
  const view = await engine.getCurrentStep(sessionId);

  if (context.options.json) {
    context.output.log(JSON.stringify(view, null, 2));
  } else if (view.kind === 'active') {
    context.output.log(view.phaseProgress);
    context.output.log('');
    context.output.log(formatInstruction(view.instruction, context.display));
  } else {
    context.output.log(formatDeliverable(view.finalDeliverable, context.display));
  }
  return { exitCode: 0 };
}
