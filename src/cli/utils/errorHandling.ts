/**
 * Process-level error handling for the CLI entry point.
 */

import { displayErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult } from '../types.js';

/**
 * Runs a CLI invocation and sets the process exit code from its result.
 *
 * A rejection that escapes the command (a failure while printing, a thrown
 * non-Error value) is shown with the same suggestions as a failed load and
 * sets exit code 1. The process is never exited forcibly; it ends once
 * pending output is written.
 *
 * @param fn - The invocation to run.
 */
export async function withErrorHandling(fn: () => Promise<CliCommandResult>): Promise<void> {
  try {
    const result = await fn();
    process.exitCode = result.exitCode;
  } catch (error) {
    displayErrorWithSuggestions(error);
    process.exitCode = 1;
  }
}
