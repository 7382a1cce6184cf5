/**
 * Error suggestion system for the groupconf CLI.
 *
 * Maps a failed load to a short list of things to check, with the file and
 * line where the parser stopped.
 *
 * @packageDocumentation
 */

import { ConfigParseError, DuplicateGroupError } from '../config/errors.js';
import { EnvCoercionError } from '../config/env.js';
import { PathValidationError } from '../utils/safe-fs.js';
import { CliUsageError } from './app.js';
import type { DisplayOptions } from './types.js';

/**
 * Error types the CLI reports.
 */
export type ErrorType =
  | 'duplicate_group'
  | 'missing_group'
  | 'invalid_line'
  | 'file_not_found'
  | 'permission_denied'
  | 'invalid_path'
  | 'invalid_environment'
  | 'usage'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or example to try (optional). */
  action?: string;
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  duplicate_group: [
    { text: 'Merge the settings of both sections under the first header' },
    { text: 'Or rename the second header if it is a different group' },
  ],

  missing_group: [
    { text: 'Add a group header above the first setting', action: '[general]' },
  ],

  invalid_line: [
    { text: 'Settings take the form key = value', action: 'path = /tmp/' },
    { text: 'Overrides take the form key<name> = value', action: 'path<production> = /srv/' },
    { text: 'Comments start with ;', action: '; a comment' },
  ],

  file_not_found: [
    { text: 'Check the path is spelled correctly' },
    { text: 'Relative paths resolve against the current directory', action: 'pwd' },
  ],

  permission_denied: [{ text: 'Check the file is readable by the current user', action: 'ls -l' }],

  invalid_path: [{ text: 'Pass a non-empty file path' }],

  invalid_environment: [
    { text: 'GROUPCONF_DEBUG accepts true/false, 1/0, yes/no, on/off' },
    { text: 'Unset it to use the default', action: 'unset GROUPCONF_DEBUG' },
  ],

  usage: [{ text: 'Show usage information', action: 'groupconf help' }],

  unknown: [{ text: 'Re-run with debug logging enabled', action: 'GROUPCONF_DEBUG=1 groupconf ...' }],
};

/**
 * Reads the `code` property Node sets on system errors.
 *
 * @param error - Any caught value.
 */
function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Identifies the type of a caught error.
 *
 * @param error - Any caught value.
 * @returns The identified error type.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof ConfigParseError) {
    return error.kind;
  }
  if (error instanceof PathValidationError) {
    return 'invalid_path';
  }
  if (error instanceof EnvCoercionError) {
    return 'invalid_environment';
  }
  if (error instanceof CliUsageError) {
    return 'usage';
  }

  switch (getErrorCode(error)) {
    case 'ENOENT':
      return 'file_not_found';
    case 'EACCES':
    case 'EPERM':
      return 'permission_denied';
    default:
      return 'unknown';
  }
}

/**
 * Gets suggestions for a given error type.
 *
 * @param errorType - The type of error.
 * @returns Array of suggestions.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats an error message with its location and suggestions.
 *
 * @param error - Any caught value.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  error: unknown,
  options: DisplayOptions = { colors: false }
): string {
  const errorType = classifyError(error);
  const message = error instanceof Error ? error.message : String(error);

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${message}`;

  if (error instanceof ConfigParseError) {
    result += `\n  ${yellowCode}File:${resetCode} ${error.source}:${String(error.line)}`;
  }
  if (error instanceof DuplicateGroupError) {
    result += `\n  ${yellowCode}Group:${resetCode} ${error.group}`;
  }

  const suggestions = getSuggestions(errorType);
  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Writes an error with suggestions to stderr.
 *
 * @param error - Any caught value.
 * @param options - Display options.
 */
export function displayErrorWithSuggestions(
  error: unknown,
  options: DisplayOptions = { colors: false }
): void {
  console.error(formatErrorWithSuggestions(error, options));
}
