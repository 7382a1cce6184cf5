/**
 * Parse failures raised while reading a config file.
 *
 * Every failure aborts the whole parse. Each error carries the input's
 * identity and the 1-based line number where it was detected.
 *
 * @packageDocumentation
 */

/**
 * Machine-readable kind of a parse failure.
 */
export type ConfigErrorKind = 'duplicate_group' | 'missing_group' | 'invalid_line';

/**
 * Base class for config parse errors.
 */
export class ConfigParseError extends Error {
  /** Which rule the input broke. */
  public readonly kind: ConfigErrorKind;
  /** Identity of the input (usually the file path). */
  public readonly source: string;
  /** 1-based line number of the offending line. */
  public readonly line: number;

  /**
   * Creates a new ConfigParseError.
   *
   * @param kind - The failure kind.
   * @param message - Descriptive error message.
   * @param source - Identity of the input.
   * @param line - 1-based line number.
   */
  constructor(kind: ConfigErrorKind, message: string, source: string, line: number) {
    super(message);
    this.name = 'ConfigParseError';
    this.kind = kind;
    this.source = source;
    this.line = line;
  }
}

/**
 * A group header named a group that was already opened earlier in the input.
 */
export class DuplicateGroupError extends ConfigParseError {
  /** The repeated group name. */
  public readonly group: string;

  constructor(group: string, source: string, line: number) {
    super(
      'duplicate_group',
      `Duplicate group '${group}' found at line ${String(line)} while parsing file at ${source}`,
      source,
      line
    );
    this.name = 'DuplicateGroupError';
    this.group = group;
  }
}

/**
 * A setting line appeared before any group header.
 */
export class MissingGroupError extends ConfigParseError {
  constructor(source: string, line: number) {
    super(
      'missing_group',
      `Unable to find a group at line ${String(line)} while parsing file at ${source}`,
      source,
      line
    );
    this.name = 'MissingGroupError';
  }
}

/**
 * A non-blank line matched none of the known line shapes.
 */
export class InvalidLineError extends ConfigParseError {
  constructor(source: string, line: number) {
    super(
      'invalid_line',
      `Unable to parse line ${String(line)} while parsing file at ${source}`,
      source,
      line
    );
    this.name = 'InvalidLineError';
  }
}

/**
 * Type guard for config parse errors.
 *
 * @param error - Any caught value.
 */
export function isConfigParseError(error: unknown): error is ConfigParseError {
  return error instanceof ConfigParseError;
}
