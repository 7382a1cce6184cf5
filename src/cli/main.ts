/**
 * Command dispatch for the groupconf CLI.
 *
 * Kept apart from the executable entry point so commands can be driven
 * in-process.
 */

import type { EnvRecord } from '../config/env.js';
import { createCliContext, parseCliArgs } from './app.js';
import { handleCheckCommand } from './commands/check.js';
import { handleGetCommand } from './commands/get.js';
import { handleVersionCommand } from './commands/version.js';
import { displayErrorWithSuggestions } from './errors.js';
import type { CliCommandHandler, CliCommandResult, DisplayOptions } from './types.js';

const HELP_TEXT = `
groupconf - read grouped config files with overrides

USAGE:
  groupconf <command> [options]

COMMANDS:
  check <file>                    Parse a file and report whether it is valid
  get <file> <group> [setting]    Print a group or a single setting as JSON
  help                            Show this help message
  version                         Show version information

OPTIONS:
  --override, -o <name>   Enable an override (repeatable, or comma-separated)
  --no-color              Disable colored error output
  --help, -h              Show this help message

ENVIRONMENT:
  GROUPCONF_OVERRIDES     Comma-separated overrides, added after --override
  GROUPCONF_DEBUG         Set to 1 to log parser decisions to stderr

EXAMPLES:
  groupconf check app.conf
  groupconf get app.conf ftp path --override production
`;

const COMMANDS: Readonly<Record<string, CliCommandHandler>> = {
  check: handleCheckCommand,
  get: handleGetCommand,
};

/**
 * Displays usage information.
 */
export function showHelp(): void {
  console.log(HELP_TEXT);
}

/**
 * Runs one CLI invocation.
 *
 * Errors are printed with suggestions and turned into exit code 1; this
 * function only rejects on failures while printing.
 *
 * @param argv - Arguments after the executable name.
 * @param env - Environment record. Defaults to process.env.
 * @returns The command result.
 */
export async function runCli(
  argv: readonly string[],
  env: EnvRecord = process.env
): Promise<CliCommandResult> {
  const [command, ...commandArgs] = argv;
  let display: DisplayOptions = { colors: false };

  try {
    if (command === undefined) {
      showHelp();
      return { exitCode: 0 };
    }

    switch (command) {
      case 'help':
      case '--help':
      case '-h':
        showHelp();
        return { exitCode: 0 };

      case 'version':
      case '--version':
      case '-v':
        return handleVersionCommand();
    }

    const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
    if (handler === undefined) {
      console.error(`Error: Unknown command: ${command}`);
      console.error('\nRun "groupconf help" for usage information.');
      return { exitCode: 1 };
    }

    const parsed = parseCliArgs(commandArgs);
    if (parsed.help) {
      showHelp();
      return { exitCode: 0 };
    }

    const context = createCliContext(parsed, env);
    display = context.display;
    return await handler(context);
  } catch (error) {
    displayErrorWithSuggestions(error, display);
    return { exitCode: 1 };
  }
}
