/**
 * Version command handler for the triz CLI.
 */

import { VERSION } from '../../version.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Handles the version command.
 */
export function handleVersionCommand(context: CliContext): Promise<CliCommandResult> {
  if (context.options.json) {
    context.output.log(JSON.stringify({ version: VERSION }));
  } else {
    context.output.log(`triz v${VERSION}`);
  }
  return Promise.resolve({ exitCode: 0 });
}
