/**
 * Submit command handler: validates findings for the current step.
 */

import { safeReadFile } from '../../utils/safe-fs.js';
import { formatDeliverable, formatInstruction, formatProgressBar } from '../utils/displayUtils.js';
import { CliUsageError, type CliCommandResult, type CliContext } from '../types.js';

/** Exit code when findings fail validation. */
export const REJECTED_EXIT_CODE = 2;

/**
 * Reads a findings file. `-` reads standard input.
 *
 * @throws CliUsageError if the content is not JSON.
 */
async function readFindings(source: string): Promise<unknown> {
  const content = source === '-' ? await readStdin() : await safeReadFile(source);
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const origin = source === '-' ? 'stdin' : source;
    throw new CliUsageError(`Findings in ${origin} are not valid JSON: ${message}`);
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Handles `triz submit <session-id> <findings.json>`.
 *
 * Exits 0 when the step validates and {@link REJECTED_EXIT_CODE} when the
 * findings are rejected; the rejected step's instruction is printed again.
 */
export async function handleSubmitCommand(context: CliContext): Promise<CliCommandResult> {
  const [sessionId, source] = context.args;
  if (sessionId === undefined || source === undefined || context.args.length > 2) {
    throw new CliUsageError('Usage: triz submit <session-id> <findings.json|->');
  }

  const findings = await readFindings(source);
  const { engine } = await context.loadRuntime();
  const result = await engine.submit(sessionId, findings);

  if (context.options.json) {
    context.output.log(JSON.stringify(result, null, 2));
    return { exitCode: result.kind === 'rejected' ? REJECTED_EXIT_CODE : 0 };
  }

  switch (result.kind) {
    case 'rejected':
      context.output.error(`Step ${String(result.step)} rejected: ${result.error}`);
      context.output.error(`Hint: ${result.hint}`);
      context.output.log('');
      context.output.log(formatInstruction(result.instruction, context.display));
      return { exitCode: REJECTED_EXIT_CODE };
    case 'progressed':
      context.output.log(result.validation);
      context.output.log(
        `${result.phaseProgress} ${formatProgressBar(result.completedFraction, context.display)}`
      );
      context.output.log('');
      context.output.log(formatInstruction(result.instruction, context.display));
      return { exitCode: 0 };
    case 'completed':
      context.output.log(result.validation);
      context.output.log('');
      context.output.log(formatDeliverable(result.finalDeliverable, context.display));
      return { exitCode: 0 };
    default: {
      const exhaustiveCheck: never = result;
      return exhaustiveCheck;
    }
  }
}
