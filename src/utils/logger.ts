/**
 * Structured logging for the config loader and parser.
 *
 * Writes one JSON object per line to stderr, keeping stdout free for the
 * CLI's own output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-line parser decisions, dropped unless debug mode is on
 * - `info`: normal operation
 * - `warn`: conditions worth attention that do not stop a load
 * - `error`: failed loads
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry as written to stderr.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that produced the entry.
   * @example "ConfigParser"
   */
  readonly component: string;

  /**
   * Short snake_case name of the event.
   * @example "group_opened"
   */
  readonly event: string;

  /**
   * Additional structured context.
   * @example { group: "ftp", line: 4 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level entries are written.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Leveled JSON logger writing to stderr.
 *
 * Data that cannot be serialized (cycles, BigInt) does not throw; the entry
 * is written with `originalData: "[unserializable]"` and a
 * `serializationError` describing the failure.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Loader', debugMode: true });
 * logger.debug('group_opened', { group: 'ftp', line: 3 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /** Whether debug entries are written. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, replacing data that JSON.stringify rejects.
 *
 * @param entry - The log entry.
 * @returns A single-line JSON string.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _data, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Shared logger for the package, debug output off.
 *
 * Pass a custom Logger through the parse or load options for debug output.
 */
export const logger = new Logger({ component: 'groupconf', debugMode: false });
