/**
 * Version command handler for the groupconf CLI.
 */

import { VERSION } from '../../utils/package-info.js';
import type { CliCommandResult } from '../types.js';

/**
 * Handles the version command.
 *
 * Usage: `groupconf version`
 */
export function handleVersionCommand(): CliCommandResult {
  console.log(`groupconf v${VERSION}`);
  return { exitCode: 0 };
}
