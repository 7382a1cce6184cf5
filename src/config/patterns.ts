/**
 * Line patterns for the config file format and the matchers built on them.
 *
 * Every pattern is compiled once at module load and never mutated. Each
 * matcher is a pure function from a line to its captures, or undefined.
 *
 * Lines arrive already split, so `.` runs in dotAll mode and matches any
 * character, including `\u2028` and `\u2029`.
 *
 * @packageDocumentation
 */

import type { SettingMatch, SettingOverrideMatch } from './types.js';

/** `[group]` at the start of a line. The name is captured greedily. */
export const GROUP_PATTERN = /^\[(.+)\]/s;

/** `key = value`, with at most one space on each side of `=`. */
export const SETTING_PATTERN = /^(.+)\s?=\s?(.+)$/s;

/** `key<override> = value`. */
export const SETTING_OVERRIDE_PATTERN = /^(.+)<(.+)>\s?=\s?(.+)$/s;

/** A run of `;` and everything after it. */
export const COMMENT_PATTERN = /;+[\s\S]*$/;

/**
 * Removes a trailing `;` comment and surrounding whitespace.
 *
 * @param line - A raw line.
 * @returns The line without its comment, trimmed.
 *
 * @example
 * ```typescript
 * trimComment('path = /tmp/; comment'); // 'path = /tmp/'
 * trimComment('   ; comment line');     // ''
 * ```
 */
export function trimComment(line: string): string {
  return line.replace(COMMENT_PATTERN, '').trim();
}

/**
 * Checks whether a line is empty or whitespace only.
 *
 * @param line - A line, usually after {@link trimComment}.
 */
export function isEmptyLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Extracts the group name from a `[group]` line.
 *
 * @param line - A line with its comment removed.
 * @returns The trimmed group name, or undefined when the line is not a
 * header or the brackets hold only whitespace.
 */
export function parseGroupName(line: string): string | undefined {
  const match = GROUP_PATTERN.exec(line);
  const name = match?.[1]?.trim();
  if (name === undefined || name.length === 0) {
    return undefined;
  }
  return name;
}

/**
 * Matches a `key = value` line.
 *
 * The key capture is greedy, so for `path<staging> = /srv/` the key is
 * `path<staging>`; {@link parseSettingOverrideValue} splits it.
 *
 * @param line - A line with its comment removed.
 * @returns The trimmed key and raw value, or undefined if the line does not match.
 */
export function parseSettingValue(line: string): SettingMatch | undefined {
  const match = SETTING_PATTERN.exec(line);
  const key = match?.[1]?.trim();
  const rawValue = match?.[2]?.trim();
  if (key === undefined || rawValue === undefined || key.length === 0) {
    return undefined;
  }
  return { key, rawValue };
}

/**
 * Matches a `key<override> = value` line.
 *
 * @param line - A line with its comment removed.
 * @returns The base key, override name and raw value, or undefined if the
 * line carries no override.
 */
export function parseSettingOverrideValue(line: string): SettingOverrideMatch | undefined {
  const match = SETTING_OVERRIDE_PATTERN.exec(line);
  if (match === null) {
    return undefined;
  }
  const [, key, override, rawValue] = match;
  if (key === undefined || override === undefined || rawValue === undefined) {
    return undefined;
  }
  return { key: key.trim(), override: override.trim(), rawValue: rawValue.trim() };
}
