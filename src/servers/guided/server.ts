/**
 * Guided research MCP server.
 *
 * Exposes the research engine as three tools: start a session, submit
 * findings for its current step, and read where a session stands.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import {
  ToolArgumentError,
  type GuidedServerConfig,
  type GuidedServerStartOptions,
  type ToolErrorCode,
} from './types.js';
import { loadConfig } from '../../config/loader.js';
import { GuidedEngineError, type GuidedEngineErrorCode } from '../../guided/engine.js';
import { SessionPersistenceError } from '../../guided/persistence.js';
import { createGuidedRuntime } from '../../guided/setup.js';
import { Logger } from '../../utils/logger.js';
import { VERSION } from '../../version.js';

type ToolArguments = Readonly<Record<string, unknown>> | undefined;

function readStringArgument(args: ToolArguments, name: string): string {
  const value = args?.[name];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ToolArgumentError(name, 'a non-empty string');
  }
  return value;
}

/**
 * Findings may arrive as an object or as JSON text. Text that does not parse
 * is passed on unchanged and rejected by validation.
 */
function readFindingsArgument(args: ToolArguments): unknown {
  const value = args?.findings;
  if (value === undefined) {
    throw new ToolArgumentError('findings', 'an object of research findings');
  }
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

function errorCode(error: unknown): GuidedEngineErrorCode | ToolErrorCode {
  if (error instanceof GuidedEngineError) {
    return error.code;
  }
  if (error instanceof ToolArgumentError) {
    return 'INVALID_ARGUMENTS';
  }
  if (error instanceof SessionPersistenceError) {
    return 'STORAGE_ERROR';
  }
  return 'INTERNAL_ERROR';
}

function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
}

/**
 * Creates and configures the guided research server.
 */
export function createGuidedServer(config: GuidedServerConfig): Server {
  const { engine } = config;
  const logger = config.logger ?? new Logger({ component: 'guided-server' });

  const server = new Server(
    { name: 'triz-guide', version: VERSION },
    { capabilities: { tools: { listChanged: true } } }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => {
    return Promise.resolve({
      tools: [
        {
          name: 'start_guided_research',
          description:
            'Starts a 60-step guided TRIZ research session for a problem statement. ' +
            'Returns the session id and the research instruction for step 1.',
          inputSchema: {
            type: 'object',
            properties: {
              problem: {
                type: 'string',
                description: 'The problem to research (e.g., "Reduce vibration without increasing mass")',
              },
            },
            required: ['problem'],
          },
        },
        {
          name: 'submit_research_findings',
          description:
            'Submits findings for the current step of a session. ' +
            'Valid findings advance the session and return the next instruction; ' +
            'invalid findings return the missing or empty fields and the same instruction.',
          inputSchema: {
            type: 'object',
            properties: {
              session_id: {
                type: 'string',
                description: 'Session id returned by start_guided_research',
              },
              findings: {
                type: 'object',
                description: 'Mapping of every required field of the current step to its findings',
              },
            },
            required: ['session_id', 'findings'],
          },
        },
        {
          name: 'get_research_status',
          description:
            'Returns the current step and instruction of a session, or its final deliverable ' +
            'once all 60 steps are validated, with per-phase progress.',
          inputSchema: {
            type: 'object',
            properties: {
              session_id: {
                type: 'string',
                description: 'Session id returned by start_guided_research',
              },
            },
            required: ['session_id'],
          },
        },
      ],
    });
  });

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;

    logger.debug('tool_call', { name, args });

    try {
      switch (name) {
        case 'start_guided_research': {
          const result = await engine.start(readStringArgument(args, 'problem'));
          return jsonResult(result);
        }

        case 'submit_research_findings': {
          const sessionId = readStringArgument(args, 'session_id');
          const result = await engine.submit(sessionId, readFindingsArgument(args));
          return jsonResult(result);
        }

        case 'get_research_status': {
          const sessionId = readStringArgument(args, 'session_id');
          const view = await engine.getCurrentStep(sessionId);
          if (view.kind === 'completed') {
            return jsonResult(view);
          }
          return jsonResult({ ...view, summary: await engine.getSummary(sessionId) });
        }

        default:
          return {
            content: [
              {
                type: 'text',
                text: JSON.stringify({ error: `Unknown tool: ${name}`, code: 'UNKNOWN_TOOL' }),
              },
            ],
            isError: true,
          };
      }
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      const code = errorCode(error);
      logger.warn('tool_failed', { name, code, error: errorMessage });
      return {
        content: [{ type: 'text', text: JSON.stringify({ error: errorMessage, code }) }],
        isError: true,
      };
    }
  });

  return server;
}

/**
 * Starts the guided research server with stdio transport.
 * This is the main entry point when running as a standalone MCP server.
 */
export async function startGuidedServer(options: GuidedServerStartOptions = {}): Promise<void> {
  const loaded = await loadConfig(
    options.configPath === undefined ? {} : { configPath: options.configPath }
  );
  const config =
    options.sessionsDir === undefined
      ? loaded
      : { ...loaded, paths: { ...loaded.paths, sessions: options.sessionsDir } };
  const logger = new Logger({
    component: 'guided-server',
    debugMode: options.debug === true || config.logging.debug,
  });

  const { engine } = await createGuidedRuntime(config, logger);
  const server = createGuidedServer({ engine, logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('server_start', { sessions: config.paths.sessions });
}
