#!/usr/bin/env node
/**
 * CLI entry point for the triz-guide MCP server.
 *
 * Usage:
 *   triz-guide-mcp [--config <path>] [--sessions-dir <path>] [--debug]
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { startGuidedServer } from './server.js';
import type { GuidedServerStartOptions } from './types.js';
import { Logger } from '../../utils/logger.js';

const HELP_TEXT = `
triz-guide-mcp - MCP server for guided TRIZ research

Usage:
  triz-guide-mcp [options]

Options:
  --config, -c <path>        Configuration file (default: ./triz.toml if present)
  --sessions-dir, -s <path>  Directory for session documents
  --debug, -d                Enable debug logging
  --help, -h                 Show this help message

Tools provided:
  - start_guided_research: Starts a 60-step session for a problem
  - submit_research_findings: Validates findings and advances the session
  - get_research_status: Returns the current instruction or the final deliverable
`;

function parseArgs(): GuidedServerStartOptions {
  const args = process.argv.slice(2);
  let configPath: string | undefined;
  let sessionsDir: string | undefined;
  let debug = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if ((arg === '--config' || arg === '-c') && next !== undefined) {
      configPath = path.resolve(next);
      i++;
    } else if ((arg === '--sessions-dir' || arg === '-s') && next !== undefined) {
      sessionsDir = path.resolve(next);
      i++;
    } else if (arg === '--debug' || arg === '-d') {
      debug = true;
    } else if (arg === '--help' || arg === '-h') {
      process.stdout.write(HELP_TEXT);
      process.exit(0);
    }
  }

  return {
    debug,
    ...(configPath === undefined ? {} : { configPath }),
    ...(sessionsDir === undefined ? {} : { sessionsDir }),
  };
}

const options = parseArgs();
const logger = new Logger({ component: 'guided-server', debugMode: options.debug === true });

startGuidedServer(options).catch((err: unknown) => {
  const errorMessage = err instanceof Error ? err.message : String(err);
  logger.error('startup_failed', { error: errorMessage });
  process.exit(1);
});
