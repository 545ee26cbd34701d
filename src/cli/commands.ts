// src/cli/commands.ts

import { config } from '../config.js';
import { IterationLoopManager, formatLoopStatus } from '../features/iteration-loop/index.js';
import { startServer } from '../server.js';
import { LoopInputError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CliIo, CliOptions, ParsedCliArgs } from './types.js';

export const HELP_TEXT = `
iteration-loop - re-issue a task prompt to an agent until it is done

Usage: iteration-loop <command> [options] [args]

Commands:
  start <text>  Start a loop: PROMPT... [--max-iterations N] [--completion-promise TEXT]
  cancel        Cancel the active loop
  status        Show the active loop
  context       Print the loop facts kept across history compaction
  serve         Run the MCP server over stdio
  help          Show this help message

Options:
  --dir PATH            Workspace root (default: current directory)
  --state-file PATH     State document relative to the workspace

Examples:
  iteration-loop start Build a todo API --max-iterations 5 --completion-promise SHIPPED
  iteration-loop status --dir ./my-project
  iteration-loop cancel
`;

const consoleIo: CliIo = {
  out: (message) => console.log(message),
  err: (message) => console.error(message)
};

/**
 * Parses command line arguments. Only --dir and --state-file are consumed;
 * every other token is left for the command.
 */
export function parseArgs(args: string[]): ParsedCliArgs {
  const command = args[0] || 'help';
  const options: CliOptions = {};
  const rest: string[] = [];

  for (let i = 1; i < args.length; i++) {
    const arg = args[i] ?? '';
    const next = args[i + 1];

    switch (arg) {
      case '--dir':
        if (next !== undefined) {
          options.dir = next;
          i++;
        }
        break;
      case '--state-file':
        if (next !== undefined) {
          options.stateFile = next;
          i++;
        }
        break;
      default:
        rest.push(arg);
    }
  }

  return { command, options, rest };
}

/**
 * Re-quotes an argv token that the shell already unquoted, so the start
 * command parser sees one token again.
 */
function quoteArg(arg: string): string {
  if (!/\s/.test(arg)) {
    return arg;
  }
  return arg.includes('"') ? `'${arg}'` : `"${arg}"`;
}

/**
 * Runs a CLI command and returns the process exit code.
 */
export async function runCli(args: string[], io: CliIo = consoleIo): Promise<number> {
  const { command, options, rest } = parseArgs(args);
  const manager = new IterationLoopManager(options.dir ?? config.rootDirectory, {
    stateFile: options.stateFile ?? config.stateFile
  });

  switch (command) {
    case 'start':
      try {
        io.out(manager.startLoop(rest.map(quoteArg).join(' ')).message);
        return 0;
      } catch (error) {
        if (error instanceof LoopInputError) {
          io.err(`Error: ${error.message}`);
          return 1;
        }
        logger.error({ error: describeError(error) }, 'start command failed');
        io.err(`Error: failed to start iteration loop: ${describeError(error)}`);
        return 1;
      }

    case 'cancel':
      io.out(manager.cancel().message);
      return 0;

    case 'status':
      io.out(formatLoopStatus(manager.getStatus()));
      return 0;

    case 'context':
      io.out(manager.getCompactionContext() ?? 'No active iteration loop.');
      return 0;

    case 'serve':
      await startServer();
      return 0;

    case 'help':
    case '--help':
    case '-h':
      io.out(HELP_TEXT);
      return 0;

    default:
      io.err(`Unknown command: ${command}`);
      io.err(HELP_TEXT);
      return 1;
  }
}
