/**
 * List command handler: stored sessions, most recently updated first.
 */

import { TOTAL_STEPS } from '../../guided/types.js';
import { formatRelativeTime } from '../utils/displayUtils.js';
import { CliUsageError, type CliCommandResult, type CliContext } from '../types.js';

/**
 * Handles `triz list`.
 *
 * Documents that fail to load are reported on stderr and do not change the
 * exit code.
 */
export async function handleListCommand(
  context: CliContext,
  now: Date = new Date()
): Promise<CliCommandResult> {
  if (context.args.length > 0) {
    throw new CliUsageError('Usage: triz list');
  }

  const { store } = await context.loadRuntime();
  const { sessions, failures } = await store.list();

  for (const failure of failures) {
    context.output.error(`Warning: skipped ${failure}`);
  }

  if (context.options.json) {
    context.output.log(JSON.stringify(sessions, null, 2));
    return { exitCode: 0 };
  }

  if (sessions.length === 0) {
    context.output.log('No sessions found.');
    return { exitCode: 0 };
  }

  for (const session of sessions) {
    const step =
      session.status === 'COMPLETED'
        ? 'done'
        : `step ${String(session.currentStep)}/${String(TOTAL_STEPS)}`;
    context.output.log(
      `${session.sessionId}  ${session.status}  ${step}  ${formatRelativeTime(session.updatedAt, now)}  ${session.problem}`
    );
  }
  return { exitCode: 0 };
}
