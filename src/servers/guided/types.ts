/**
 * Types for the guided research MCP server.
 *
 * @packageDocumentation
 */

import type { GuidedResearchEngine } from '../../guided/engine.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Names of the tools the server provides.
 */
export const GUIDED_TOOL_NAMES = [
  'start_guided_research',
  'submit_research_findings',
  'get_research_status',
] as const;

export type GuidedToolName = (typeof GUIDED_TOOL_NAMES)[number];

/**
 * Configuration for {@link createGuidedServer}.
 */
export interface GuidedServerConfig {
  /** Engine serving all tool calls. */
  readonly engine: GuidedResearchEngine;
  /** Defaults to a stderr logger without debug output. */
  readonly logger?: Logger;
}

/**
 * Options for starting the server over stdio.
 */
export interface GuidedServerStartOptions {
  /** Explicit triz.toml path. */
  readonly configPath?: string;
  /** Overrides `paths.sessions` from configuration. */
  readonly sessionsDir?: string;
  readonly debug?: boolean;
}

/**
 * Error codes returned in `{ error, code }` tool error payloads besides the
 * engine's own codes.
 */
export type ToolErrorCode = 'INVALID_ARGUMENTS' | 'UNKNOWN_TOOL' | 'STORAGE_ERROR' | 'INTERNAL_ERROR';

/**
 * Error thrown when tool arguments are missing or of the wrong type.
 */
export class ToolArgumentError extends Error {
  /** The offending argument. */
  public readonly argument: string;

  constructor(argument: string, expected: string) {
    super(`Argument '${argument}' must be ${expected}`);
    this.name = 'ToolArgumentError';
    this.argument = argument;
  }
}
