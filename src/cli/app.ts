/**
 * Builds the CLI context from command-line arguments and the environment.
 */

import { readEnvSettings, splitOverrideList, type EnvRecord } from '../config/env.js';
import { Logger } from '../utils/logger.js';
import type { CliContext } from './types.js';

/**
 * Error for malformed command-line arguments.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Options and positionals split out of a raw argument list.
 */
export interface ParsedArgs {
  /** Arguments that are not options, in order. */
  positionals: string[];
  /** Override names from `--override` / `-o`, in order. */
  overrides: string[];
  /** Whether `--help` or `-h` was given. */
  help: boolean;
  /** Whether `--no-color` was given. */
  noColor: boolean;
}

/**
 * Splits arguments into positionals and options.
 *
 * Accepts `--override <name>`, `--override=<name>` and `-o <name>`; each
 * value may itself be a comma-separated list. `--` ends option parsing.
 *
 * @param args - Arguments after the command name.
 * @returns The parsed arguments.
 * @throws CliUsageError for an unknown option or a missing option value.
 */
export function parseCliArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], overrides: [], help: false, noColor: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--') {
      parsed.positionals.push(...args.slice(i + 1));
      break;
    }

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--no-color') {
      parsed.noColor = true;
    } else if (arg === '--override' || arg === '-o') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new CliUsageError(`Option ${arg} requires an override name`);
      }
      parsed.overrides.push(...splitOverrideList(value));
      i++;
    } else if (arg.startsWith('--override=')) {
      parsed.overrides.push(...splitOverrideList(arg.slice('--override='.length)));
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      parsed.positionals.push(arg);
    }
  }

  return parsed;
}

/**
 * Creates the CLI context for one command invocation.
 *
 * Override names from flags come first, then those from GROUPCONF_OVERRIDES.
 *
 * @param parsed - Parsed command arguments.
 * @param env - Environment record. Defaults to process.env.
 * @returns The CLI context.
 * @throws EnvCoercionError if GROUPCONF_DEBUG is malformed.
 */
export function createCliContext(parsed: ParsedArgs, env: EnvRecord = process.env): CliContext {
  const settings = readEnvSettings(env);
  const overrides = [...new Set([...parsed.overrides, ...settings.overrides])];
  const colors = !parsed.noColor && env.NO_COLOR === undefined && process.stderr.isTTY === true;

  return {
    args: parsed.positionals,
    overrides,
    display: { colors },
    logger: new Logger({ component: 'groupconf-cli', debugMode: settings.debug }),
  };
}
