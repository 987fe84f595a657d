/**
 * Status command handler: per-phase progress of a session.
 */

import { formatSummary } from '../utils/displayUtils.js';
import { CliUsageError, type CliCommandResult, type CliContext } from '../types.js';

/**
 * Handles `triz status <session-id>`.
 */
export async function handleStatusCommand(context: CliContext): Promise<CliCommandResult> {
  const [sessionId] = context.args;
  if (sessionId === undefined || context.args.length > 1) {
    throw new CliUsageError('Usage: triz status <session-id>');
  }

  const { engine } = await context.loadRuntime();
  const summary = await engine.getSummary(sessionId);

  if (context.options.json) {
    context.output.log(JSON.stringify(summary, null, 2));
    return { exitCode: 0 };
  }

  context.output.log(formatSummary(summary, context.display));
  if (summary.status === 'ACTIVE') {
    const view = await engine.getCurrentStep(sessionId);
    if (view.kind === 'active') {
      context.output.log('');
      context.output.log(`Current: ${view.phaseProgress}: ${view.instruction.title}`);
    }
  }
  return { exitCode: 0 };
}
