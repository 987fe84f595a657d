/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper that standardizes error handling across command
 * handlers.
 */

import { formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Runs a command handler and converts its outcome into an exit code.
 *
 * Errors are printed with suggestions and yield exit code 1.
 */
export async function runCommand(
  context: CliContext,
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  try {
    const result = await fn();
    if (result.message !== undefined) {
      if (result.exitCode === 0) {
        context.output.log(result.message);
      } else {
        context.output.error(result.message);
      }
    }
    return result.exitCode;
  } catch (error) {
    context.output.error(formatErrorWithSuggestions(error, context.display));
    return 1;
  }
}

