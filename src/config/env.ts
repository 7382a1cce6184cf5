/**
 * Environment variables read by the groupconf CLI.
 *
 * - `GROUPCONF_OVERRIDES`: comma-separated override names to enable
 * - `GROUPCONF_DEBUG`: boolean, turns on debug logging
 *
 * The library entry points never read the environment; callers pass
 * overrides explicitly.
 *
 * @packageDocumentation
 */

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/** Environment variable holding comma-separated override names. */
export const OVERRIDES_ENV_VAR = 'GROUPCONF_OVERRIDES';

/** Environment variable enabling debug logging. */
export const DEBUG_ENV_VAR = 'GROUPCONF_DEBUG';

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Settings taken from the environment.
 */
export interface EnvSettings {
  /** Override names from `GROUPCONF_OVERRIDES`, in order, without blanks. */
  readonly overrides: string[];
  /** Whether `GROUPCONF_DEBUG` asks for debug logging. */
  readonly debug: boolean;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }

  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Splits a comma-separated list of override names.
 *
 * @param value - The raw variable value.
 * @returns Trimmed, non-empty names in order.
 */
export function splitOverrideList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Reads CLI settings from the environment.
 *
 * @param env - Environment record. Defaults to process.env.
 * @returns The settings; unset variables yield no overrides and debug off.
 * @throws EnvCoercionError if `GROUPCONF_DEBUG` is not a recognized boolean.
 */
export function readEnvSettings(env: EnvRecord = process.env): EnvSettings {
  const rawOverrides = env[OVERRIDES_ENV_VAR];
  const rawDebug = env[DEBUG_ENV_VAR];

  return {
    overrides: rawOverrides === undefined ? [] : splitOverrideList(rawOverrides),
    debug:
      rawDebug === undefined || rawDebug.trim() === ''
        ? false
        : coerceToBoolean(rawDebug, DEBUG_ENV_VAR),
  };
}
