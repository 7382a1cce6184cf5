/**
 * Get command handler for the groupconf CLI.
 *
 * Prints one setting, or a whole group, as JSON.
 */

import { loadConfig } from '../../config/load.js';
import type { ConfigGroup } from '../../config/tree.js';
import type { CoercedValue } from '../../config/types.js';
import { CliUsageError } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';

/** Exit code when the requested group or setting does not exist. */
export const NOT_FOUND_EXIT_CODE = 2;

/**
 * Renders a value as JSON on one line.
 *
 * `JSON.stringify` rejects `bigint`, so large integers are written as their
 * exact digits.
 *
 * @param value - A coerced setting value.
 */
export function formatValue(value: CoercedValue): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatValue).join(',')}]`;
  }
  return JSON.stringify(value);
}

/**
 * Renders a group as a JSON object, one setting per line.
 *
 * @param group - The group to print.
 */
export function formatGroup(group: ConfigGroup): string {
  if (group.size === 0) {
    return '{}';
  }
  const lines = [...group].map(
    ([setting, value]) => `  ${JSON.stringify(setting)}: ${formatValue(value)}`
  );
  return `{\n${lines.join(',\n')}\n}`;
}

/**
 * Handles the get command.
 *
 * Usage: `groupconf get <file> <group> [setting] [--override <name>]...`
 *
 * @param context - The CLI context.
 * @returns Exit code 0 when found, {@link NOT_FOUND_EXIT_CODE} when absent.
 * @throws CliUsageError if the arguments are wrong.
 * @throws The load error when the file does not parse.
 */
export async function handleGetCommand(context: CliContext): Promise<CliCommandResult> {
  const [filePath, groupName, settingName, ...rest] = context.args;
  if (filePath === undefined || groupName === undefined || rest.length > 0) {
    throw new CliUsageError(
      'Usage: groupconf get <file> <group> [setting] [--override <name>]...'
    );
  }

  const tree = await loadConfig(filePath, context.overrides, { logger: context.logger });
  const group = tree.group(groupName);

  if (settingName === undefined) {
    if (group === undefined) {
      console.error(`Not found: ${groupName}`);
      return { exitCode: NOT_FOUND_EXIT_CODE };
    }
    console.log(formatGroup(group));
    return { exitCode: 0 };
  }

  const value = group?.get(settingName);
  if (value === undefined) {
    console.error(`Not found: ${groupName}.${settingName}`);
    return { exitCode: NOT_FOUND_EXIT_CODE };
  }
  console.log(formatValue(value));
  return { exitCode: 0 };
}
