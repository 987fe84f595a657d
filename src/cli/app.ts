/**
 * Application context for the triz CLI.
 */

import * as path from 'node:path';
import { loadConfig, type LoadConfigOptions } from '../config/loader.js';
import type { EnvRecord } from '../config/env.js';
import { createGuidedRuntime, type GuidedRuntime } from '../guided/setup.js';
import { Logger } from '../utils/logger.js';
import { CliUsageError, type CliContext, type CliOptions, type CliOutput } from './types.js';

/**
 * A command line split into command, positional arguments and options.
 */
export interface ParsedCommandLine {
  command: string | undefined;
  args: string[];
  options: CliOptions;
}

/**
 * Splits argv (without the node and script entries) into its parts.
 *
 * Options may appear anywhere; `--` ends option parsing.
 *
 * @throws CliUsageError for unknown options or a missing option value.
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommandLine {
  const options: CliOptions = { debug: false, json: false, colors: true };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }

    switch (arg) {
      case '--config':
      case '-c':
      case '--sessions-dir':
      case '-s': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
          throw new CliUsageError(`Option ${arg} requires a value`);
        }
        if (arg === '--config' || arg === '-c') {
          options.configPath = value;
        } else {
          options.sessionsDir = value;
        }
        i++;
        break;
      }
      case '--debug':
      case '-d':
        options.debug = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--no-color':
        options.colors = false;
        break;
      case '--help':
      case '-h':
        positional.unshift('help');
        break;
      case '--version':
      case '-v':
        positional.unshift('version');
        break;
      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [command, ...args] = positional;
  return { command, args, options };
}

/**
 * Environment of a CLI invocation; tests replace the process defaults.
 */
export interface CliEnvironment {
  readonly cwd?: string;
  readonly env?: EnvRecord;
  readonly output?: CliOutput;
  readonly logger?: Logger;
  readonly isTTY?: boolean;
}

const consoleOutput: CliOutput = {
  log: (line) => {
    console.log(line);
  },
  error: (line) => {
    console.error(line);
  },
};

/**
 * Creates the CLI context for one invocation.
 *
 * Configuration is read lazily, the first time a command needs the engine.
 */
export function createCliApp(
  args: string[],
  options: CliOptions,
  environment: CliEnvironment = {}
): CliContext {
  const cwd = environment.cwd ?? process.cwd();
  const isTTY = environment.isTTY ?? process.stdout.isTTY;
  let runtime: Promise<GuidedRuntime> | undefined;

  const load = async (): Promise<GuidedRuntime> => {
    const loadOptions: LoadConfigOptions = {
      cwd,
      ...(environment.env === undefined ? {} : { env: environment.env }),
      ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
    };
    const loaded = await loadConfig(loadOptions);
    const config =
      options.sessionsDir === undefined
        ? loaded
        : {
            ...loaded,
            paths: { ...loaded.paths, sessions: path.resolve(cwd, options.sessionsDir) },
          };
    const logger =
      environment.logger ??
      new Logger({ component: 'triz-cli', debugMode: options.debug || config.logging.debug });
    return createGuidedRuntime(config, logger);
  };

  return {
    args,
    options,
    display: { colors: options.colors && isTTY, unicode: true },
    output: environment.output ?? consoleOutput,
    loadRuntime: () => {
      runtime ??= load();
      return runtime;
    },
  };
}
