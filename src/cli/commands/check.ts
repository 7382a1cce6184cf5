/**
 * Check command handler for the groupconf CLI.
 *
 * Loads a config file and reports whether it parses.
 */

import { loadConfig } from '../../config/load.js';
import { CliUsageError } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Handles the check command.
 *
 * Usage: `groupconf check <file> [--override <name>]...`
 *
 * @param context - The CLI context.
 * @returns Exit code 0 when the file parses.
 * @throws CliUsageError if the file argument is missing.
 * @throws The load error when the file does not parse.
 */
export async function handleCheckCommand(context: CliContext): Promise<CliCommandResult> {
  const [filePath, ...rest] = context.args;
  if (filePath === undefined || rest.length > 0) {
    throw new CliUsageError('Usage: groupconf check <file> [--override <name>]...');
  }

  const tree = await loadConfig(filePath, context.overrides, { logger: context.logger });
  const groupWord = tree.size === 1 ? 'group' : 'groups';
  console.log(`OK: ${String(tree.size)} ${groupWord} in ${filePath}`);
  return { exitCode: 0 };
}
