/**
 * groupconf
 *
 * Parser for INI-style config files with `[group]` sections, typed values
 * and `key<override> = value` lines selected at load time.
 *
 * @packageDocumentation
 */

export { VERSION } from './utils/package-info.js';
export * from './config/index.js';
export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
