/**
 * Command dispatch and help text for the triz CLI.
 */

import {
  createCliApp,
  parseCommandLine,
  type CliEnvironment,
  type ParsedCommandLine,
} from './app.js';
import { handleListCommand } from './commands/list.js';
import { handleShowCommand } from './commands/show.js';
import { handleStartCommand } from './commands/start.js';
import { handleStatusCommand } from './commands/status.js';
import { handleSubmitCommand } from './commands/submit.js';
import { handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler, CliOptions } from './types.js';
import { runCommand } from './utils/errorHandling.js';
import { getEnvVarDocumentation } from '../config/index.js';
import { VERSION } from '../version.js';

const COMMANDS: Readonly<Record<string, CliCommandHandler>> = {
  start: handleStartCommand,
  submit: handleSubmitCommand,
  status: handleStatusCommand,
  show: handleShowCommand,
  list: handleListCommand,
  version: handleVersionCommand,
};

const COMMAND_HELP: Readonly<Record<string, string>> = {
  start: `
USAGE: triz start <problem>

Starts a guided research session for a problem statement and prints the
instruction for step 1. Words are joined, so quoting is optional.

EXAMPLES:
  triz start "Reduce vibration without increasing mass"
  triz --json start Reduce vibration without increasing mass
`,
  submit: `
USAGE: triz submit <session-id> <findings.json|->

Submits a JSON object of findings for the session's current step. On
success the next instruction is printed; after step 60 the final
deliverable is printed. Rejected findings exit with code 2 and the same
instruction is printed again. Use - to read the findings from stdin.

EXAMPLES:
  triz submit 3f2a... step1.json
  cat step1.json | triz submit 3f2a... -
`,
  status: `
USAGE: triz status <session-id>

Shows validated steps per phase and the step the session is waiting on.

EXAMPLES:
  triz status 3f2a...
`,
  show: `
USAGE: triz show <session-id>

Prints the pending instruction of an active session, or the final
deliverable of a completed one.

EXAMPLES:
  triz show 3f2a...
`,
  list: `
USAGE: triz list

Lists stored sessions, most recently updated first.

EXAMPLES:
  triz list
  triz --sessions-dir ./research list
`,
  version: `
USAGE: triz version

Shows version information.
`,
};

/**
 * General usage text.
 */
function formatEnvironmentVariables(): string {
  const docs = Object.entries(getEnvVarDocumentation());
  const width = Math.max(...docs.map(([name]) => name.length)) + 2;
  return docs
    .map(([name, doc]) => `  ${name.padEnd(width)}${doc.description} (${doc.type})`)
    .join('\n');
}

export function getHelpText(): string {
  return `
triz v${VERSION}

Guided TRIZ research: 60 steps in 6 phases, one validated step at a time.

USAGE:
  triz [options] <command> [arguments]

COMMANDS:
  start       Start a session for a problem statement
  submit      Submit findings for the current step
  status      Show validated steps per phase
  show        Show the pending instruction or the final deliverable
  list        List stored sessions
  help        Show this help message
  version     Show version information

OPTIONS:
  --config, -c <path>        Use this config file instead of ./triz.toml
  --sessions-dir, -s <dir>   Store sessions in this directory
  --json                     Print results as JSON
  --no-color                 Disable colored output
  --debug, -d                Log debug events to stderr
  --help, -h                 Show help for a command
  --version, -v              Show version information

ENVIRONMENT:
${formatEnvironmentVariables()}

EXAMPLES:
  triz start "Reduce vibration without increasing mass"
  triz submit <session-id> findings.json
  triz status <session-id>
`;
}

/**
 * Usage text of one command, or undefined for unknown commands.
 */
export function getCommandHelp(commandName: string): string | undefined {
  return Object.hasOwn(COMMAND_HELP, commandName) ? COMMAND_HELP[commandName] : undefined;
}

const DEFAULT_OPTIONS: CliOptions = { debug: false, json: false, colors: true };

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments after the node and script entries.
 * @returns The process exit code.
 */
export async function runCli(
  argv: readonly string[],
  environment: CliEnvironment = {}
): Promise<number> {
  let parsed: ParsedCommandLine;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    const context = createCliApp([], DEFAULT_OPTIONS, environment);
    return runCommand(context, () => {
      throw error;
    });
  }

  const { command, args, options } = parsed;
  const context = createCliApp(args, options, environment);

  if (command === undefined || command === 'help') {
    const topic = args[0];
    if (topic === undefined) {
      context.output.log(getHelpText());
      return 0;
    }
    const help = getCommandHelp(topic);
    if (help === undefined) {
      context.output.error(`Unknown command: ${topic}`);
      context.output.error('\nRun "triz help" to see all available commands.');
      return 1;
    }
    context.output.log(help);
    return 0;
  }

  const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (handler === undefined) {
    context.output.error(`Error: Unknown command: ${command}`);
    context.output.error('\nRun "triz help" for usage information.');
    return 1;
  }

  return runCommand(context, () => handler(context));
}
