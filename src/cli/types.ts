/**
 * CLI types and interfaces for the groupconf CLI.
 */

import type { Logger } from '../utils/logger.js';

/**
 * Output formatting options.
 */
export interface DisplayOptions {
  /** Whether to use ANSI colors in output. */
  colors: boolean;
}

/**
 * CLI command context, built once per invocation.
 */
export interface CliContext {
  /**
   * Positional arguments after the command name, with options removed.
   */
  args: string[];

  /**
   * Override names enabled by flags and by GROUPCONF_OVERRIDES, deduplicated.
   */
  overrides: string[];

  /**
   * Output formatting options.
   */
  display: DisplayOptions;

  /**
   * Logger handed to the loader.
   */
  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
