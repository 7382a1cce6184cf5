/**
 * Line classifier and stream parser for grouped config files.
 *
 * The format:
 *
 * ```
 * [group_name]
 * key = value
 * key<override_name> = value
 * ; full-line comment
 * key = value ; inline comment
 * ```
 *
 * Lines are consumed in one forward pass. A setting with an `<override>`
 * suffix is stored under its base key only when that override is enabled for
 * the parse. Within a group, a value from an enabled override takes
 * precedence over the unconditional line for the same key wherever the two
 * appear; among several enabled overrides of one key the last one wins.
 *
 * @packageDocumentation
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { coerceValue } from './coerce.js';
import {
  DuplicateGroupError,
  InvalidLineError,
  MissingGroupError,
  type ConfigParseError,
} from './errors.js';
import {
  isEmptyLine,
  parseGroupName,
  parseSettingOverrideValue,
  parseSettingValue,
  trimComment,
} from './patterns.js';
import { ConfigTree, type ConfigGroup } from './tree.js';
import type { ParseOptions } from './types.js';

/** Line terminators, matching how `node:readline` splits a stream. */
const LINE_BREAK_PATTERN = /\r\n|\r|\n/;

/** Source name reported for input that did not come from a file. */
export const DEFAULT_SOURCE = '<string>';

/**
 * Incremental parser: feed it lines in order, then call {@link finish}.
 *
 * The parser starts with no open group. A group header opens a group; a
 * setting line is only valid once a group is open. The first failure is
 * thrown and remembered, and any later call throws it again.
 *
 * @example
 * ```typescript
 * const parser = new ConfigParser({ overrides: ['production'], source: 'app.conf' });
 * parser.feed('[ftp]');
 * parser.feed('path<production> = /srv/var/tmp/');
 * parser.feed('path = /tmp/');
 * const tree = parser.finish();
 * tree.get('ftp', 'path'); // '/srv/var/tmp/'
 * ```
 */
export class ConfigParser {
  private readonly tree: ConfigTree;
  private readonly enabledOverrides: ReadonlySet<string>;
  private readonly source: string;
  private readonly logger: Logger;
  private currentGroup: ConfigGroup | undefined;
  /** Keys of the current group whose value came from an enabled override. */
  private overriddenKeys: Set<string>;
  private lineNumber: number;
  private failure: ConfigParseError | undefined;

  /**
   * Creates a parser with its own empty parse state.
   *
   * @param options - Enabled overrides, source name and logger.
   */
  constructor(options: ParseOptions = {}) {
    this.tree = new ConfigTree();
    this.enabledOverrides = new Set(options.overrides ?? []);
    this.source = options.source ?? DEFAULT_SOURCE;
    this.logger = options.logger ?? defaultLogger;
    this.currentGroup = undefined;
    this.overriddenKeys = new Set<string>();
    this.lineNumber = 0;
    this.failure = undefined;
  }

  /** Number of lines consumed so far. */
  get linesRead(): number {
    return this.lineNumber;
  }

  /**
   * Consumes the next line of input.
   *
   * @param rawLine - The line, without its line terminator.
   * @throws DuplicateGroupError if the line reopens a group.
   * @throws MissingGroupError if the line is a setting and no group is open.
   * @throws InvalidLineError if the line matches no known shape.
   */
  feed(rawLine: string): void {
    this.throwIfFailed();
    this.lineNumber += 1;

    const line = trimComment(rawLine);
    if (isEmptyLine(line)) {
      return;
    }

    const groupName = parseGroupName(line);
    if (groupName !== undefined) {
      this.openGroup(groupName);
      return;
    }

    const setting = parseSettingValue(line);
    if (setting !== undefined) {
      this.applySetting(line, setting.key, setting.rawValue);
      return;
    }

    this.fail(new InvalidLineError(this.source, this.lineNumber));
  }

  /**
   * Ends the parse and returns the tree.
   *
   * @returns The parsed configuration.
   * @throws The earlier parse failure, if one occurred.
   */
  finish(): ConfigTree {
    this.throwIfFailed();
    return this.tree;
  }

  private openGroup(name: string): void {
    if (this.tree.has(name)) {
      this.fail(new DuplicateGroupError(name, this.source, this.lineNumber));
    }
    this.currentGroup = this.tree.openGroup(name);
    this.overriddenKeys = new Set<string>();
    this.logger.debug('group_opened', { group: name, line: this.lineNumber });
  }

  private applySetting(line: string, key: string, rawValue: string): void {
    const group = this.currentGroup;
    if (group === undefined) {
      this.fail(new MissingGroupError(this.source, this.lineNumber));
    }

    const override = parseSettingOverrideValue(line);
    if (override === undefined) {
      if (this.overriddenKeys.has(key)) {
        this.logger.debug('setting_shadowed', {
          group: group.name,
          setting: key,
          line: this.lineNumber,
        });
        return;
      }
      group.set(key, coerceValue(rawValue));
      return;
    }

    if (this.enabledOverrides.has(override.override)) {
      group.set(override.key, coerceValue(rawValue));
      this.overriddenKeys.add(override.key);
      this.logger.debug('override_applied', {
        group: group.name,
        setting: override.key,
        override: override.override,
        line: this.lineNumber,
      });
      return;
    }

    this.logger.debug('override_skipped', {
      group: group.name,
      setting: override.key,
      override: override.override,
      line: this.lineNumber,
    });
  }

  private fail(error: ConfigParseError): never {
    this.failure = error;
    throw error;
  }

  private throwIfFailed(): void {
    if (this.failure !== undefined) {
      throw this.failure;
    }
  }
}

/**
 * Parses a sequence of lines into a config tree.
 *
 * Lines are pulled one at a time, so a lazy iterable is never buffered.
 *
 * @param lines - The input lines, without line terminators.
 * @param options - Enabled overrides, source name and logger.
 * @returns The parsed configuration.
 * @throws ConfigParseError subclasses on the first malformed line.
 */
export function parseLines(lines: Iterable<string>, options: ParseOptions = {}): ConfigTree {
  const parser = new ConfigParser(options);
  for (const line of lines) {
    parser.feed(line);
  }
  return parser.finish();
}

/**
 * Parses config file content held in a string.
 *
 * @param content - The whole file content. `\n`, `\r\n` and a lone `\r` each end a line.
 * @param options - Enabled overrides, source name and logger.
 * @returns The parsed configuration.
 * @throws ConfigParseError subclasses on the first malformed line.
 *
 * @example
 * ```typescript
 * const tree = parseConfig('[http]\npath = /tmp/\nenabled = no\n');
 * tree.toObject(); // { http: { path: '/tmp/', enabled: false } }
 * ```
 */
export function parseConfig(content: string, options: ParseOptions = {}): ConfigTree {
  return parseLines(content.split(LINE_BREAK_PATTERN), options);
}
