/**
 * Guided research MCP server package.
 *
 * @packageDocumentation
 */

export { createGuidedServer, startGuidedServer } from './server.js';
export {
  GUIDED_TOOL_NAMES,
  ToolArgumentError,
  type GuidedToolName,
  type GuidedServerConfig,
  type GuidedServerStartOptions,
  type ToolErrorCode,
} from './types.js';
