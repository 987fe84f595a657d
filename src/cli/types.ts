/**
 * CLI types and interfaces for the triz CLI.
 */

import type { GuidedRuntime } from '../guided/setup.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Global options accepted before or after the command name.
 */
export interface CliOptions {
  /** Explicit triz.toml path. */
  configPath?: string;

  /** Overrides `paths.sessions`. */
  sessionsDir?: string;

  /** Enables debug logging on stderr. */
  debug: boolean;

  /** Print results as JSON instead of formatted text. */
  json: boolean;

  /** Use ANSI colors in formatted output. */
  colors: boolean;
}

/**
 * Destination of command output.
 */
export interface CliOutput {
  /** Writes one line of regular output. */
  log(line: string): void;

  /** Writes one line of diagnostic output. */
  error(line: string): void;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Positional arguments following the command name.
   */
  args: string[];

  /**
   * Parsed global options.
   */
  options: CliOptions;

  /**
   * Formatting settings derived from the options and the terminal.
   */
  display: DisplayOptions;

  /**
   * Output sink.
   */
  output: CliOutput;

  /**
   * Loads configuration and builds the engine. Memoized per context.
   */
  loadRuntime(): Promise<GuidedRuntime>;
}

/**
 * CLI command result.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * Signature shared by every command handler.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;

/**
 * Raised for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}
