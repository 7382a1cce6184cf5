/**
 * Loads config files from disk.
 *
 * {@link loadConfig} streams the file through `node:readline`, holding one
 * line at a time. File system errors (missing file, permission denied) are
 * rethrown as they come from Node; parse errors name the path as the caller
 * gave it.
 *
 * @packageDocumentation
 */

import { once } from 'node:events';
import * as readline from 'node:readline';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { safeCreateReadStream, safeReadTextFileSync } from '../utils/safe-fs.js';
import { ConfigParser, parseConfig } from './parser.js';
import type { ConfigTree } from './tree.js';

/**
 * Options for loading a config file.
 */
export interface LoadOptions {
  /** Logger for load and parse events. Defaults to the shared package logger. */
  readonly logger?: Logger;
}

/**
 * Loads and parses a config file, reading it line by line.
 *
 * @param filePath - Path to the config file.
 * @param overrides - Names of the overrides to enable.
 * @param options - Load options.
 * @returns The parsed configuration.
 * @throws PathValidationError if the path is empty or contains NUL bytes.
 * @throws ConfigParseError subclasses on the first malformed line.
 * @throws The Node file system error if the file cannot be read.
 *
 * @example
 * ```typescript
 * const config = await loadConfig('./app.conf', ['production', 'ubuntu']);
 * config.get('ftp', 'path'); // '/etc/var/uploads'
 * ```
 */
export async function loadConfig(
  filePath: string,
  overrides?: Iterable<string>,
  options: LoadOptions = {}
): Promise<ConfigTree> {
  const log = options.logger ?? defaultLogger;
  const parser = new ConfigParser({
    overrides: overrides ?? [],
    source: filePath,
    logger: log,
  });

  const stream = safeCreateReadStream(filePath);
  await once(stream, 'open');

  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
  let streamError: Error | undefined;
  stream.on('error', (error: Error) => {
    streamError = error;
    lines.close();
  });

  try {
    for await (const line of lines) {
      parser.feed(line);
    }
  } finally {
    lines.close();
    stream.destroy();
  }

  if (streamError !== undefined) {
    throw streamError;
  }

  const tree = parser.finish();
  log.debug('config_loaded', {
    path: filePath,
    groups: tree.size,
    lines: parser.linesRead,
  });
  return tree;
}

/**
 * Loads and parses a config file synchronously.
 *
 * Reads the whole file at once; prefer {@link loadConfig} for large files.
 *
 * @param filePath - Path to the config file.
 * @param overrides - Names of the overrides to enable.
 * @param options - Load options.
 * @returns The parsed configuration.
 * @throws PathValidationError if the path is empty or contains NUL bytes.
 * @throws ConfigParseError subclasses on the first malformed line.
 * @throws The Node file system error if the file cannot be read.
 */
export function loadConfigSync(
  filePath: string,
  overrides?: Iterable<string>,
  options: LoadOptions = {}
): ConfigTree {
  const log = options.logger ?? defaultLogger;
  const content = safeReadTextFileSync(filePath);
  const tree = parseConfig(content, { overrides: overrides ?? [], source: filePath, logger: log });
  log.debug('config_loaded', { path: filePath, groups: tree.size });
  return tree;
}
