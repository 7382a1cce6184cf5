/**
 * Value coercion for setting values.
 *
 * Converts the raw text on the right-hand side of `key = value` into a typed
 * value. Stages run in a fixed order and the first one that applies wins:
 *
 * 1. quoted string
 * 2. integer, then float
 * 3. boolean
 * 4. comma-separated list (elements coerced recursively)
 * 5. the trimmed raw string
 *
 * `"1"` and `"0"` are claimed by the numeric stage, so they decode as the
 * integers 1 and 0, never as booleans.
 *
 * @packageDocumentation
 */

import type { ClassifiedValue, CoercedValue } from './types.js';

/** Matches a value wrapped in a matching pair of single or double quotes. */
const QUOTED_STRING_PATTERN = /^(["'])([\s\S]*)\1$/;

/** ASCII digits only, at least one. */
const DIGITS_PATTERN = /^[0-9]+$/;

/**
 * Words accepted as booleans, keyed by their lower-case form.
 *
 * The `1` and `0` entries only apply when a caller uses {@link getBoolean}
 * directly; {@link coerceValue} resolves those as integers first.
 */
const PERMITTED_BOOLEAN_VALUES: ReadonlyMap<string, boolean> = new Map([
  ['yes', true],
  ['no', false],
  ['true', true],
  ['false', false],
  ['1', true],
  ['0', false],
]);

/**
 * Returns the content of a quoted string without its quotes.
 *
 * The content is returned verbatim: no trimming, no escape processing.
 *
 * @param value - The trimmed raw value.
 * @returns The inner string, or undefined if the value is not quoted.
 *
 * @example
 * ```typescript
 * getQuotedString('"hello, world"'); // 'hello, world'
 * getQuotedString('hello');          // undefined
 * ```
 */
export function getQuotedString(value: string): string | undefined {
  if (value.length < 2) {
    return undefined;
  }
  const match = QUOTED_STRING_PATTERN.exec(value);
  return match?.[2];
}

/**
 * Checks whether a value is made of digits with at most one decimal point.
 *
 * @param value - The trimmed raw value.
 * @returns True for values like `42`, `3.14`, `.5` or `7.`.
 */
export function isNumber(value: string): boolean {
  return DIGITS_PATTERN.test(value.replace('.', ''));
}

/**
 * Parses an integer literal.
 *
 * Values past the safe integer range come back as exact `bigint`s.
 *
 * @param value - The trimmed raw value.
 * @returns The integer, or undefined if the value is not a digits-only literal.
 *
 * @example
 * ```typescript
 * getInt('26214400');             // 26214400
 * getInt('12345678901234567891'); // 12345678901234567891n
 * ```
 */
export function getInt(value: string): number | bigint | undefined {
  if (!DIGITS_PATTERN.test(value)) {
    return undefined;
  }
  const num = Number.parseInt(value, 10);
  return Number.isSafeInteger(num) ? num : BigInt(value);
}

/**
 * Parses a float literal.
 *
 * Accepts anything {@link isNumber} accepts, so `"1"` parses as `1`.
 *
 * @param value - The trimmed raw value.
 * @returns The number, or undefined if the value is not numeric.
 */
export function getFloat(value: string): number | undefined {
  if (!isNumber(value)) {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

/**
 * Looks a value up in the boolean vocabulary, ignoring case.
 *
 * @param value - The trimmed raw value.
 * @returns The boolean, or undefined if the word is not recognized.
 */
export function getBoolean(value: string): boolean | undefined {
  return PERMITTED_BOOLEAN_VALUES.get(value.toLowerCase());
}

/**
 * Splits a comma-separated value and coerces every element.
 *
 * @param value - The trimmed raw value.
 * @returns The coerced elements, or undefined if the value has no comma.
 *
 * @example
 * ```typescript
 * getList('1.0, 2, yes'); // [1, 2, true]
 * getList('word');        // undefined
 * ```
 */
export function getList(value: string): CoercedValue[] | undefined {
  const segments = value.split(',');
  if (segments.length <= 1) {
    return undefined;
  }
  return segments.map((segment) => coerceValue(segment));
}

/**
 * Coerces a raw value and reports which stage produced the result.
 *
 * @param raw - The raw value text. Surrounding whitespace is ignored.
 * @returns The coerced value with its kind.
 */
export function classifyValue(raw: string): ClassifiedValue {
  const value = raw.trim();

  const quoted = getQuotedString(value);
  if (quoted !== undefined) {
    return { kind: 'quoted', value: quoted };
  }

  if (isNumber(value)) {
    const intValue = getInt(value);
    if (intValue !== undefined) {
      return { kind: 'integer', value: intValue };
    }
    const floatValue = getFloat(value);
    if (floatValue !== undefined) {
      return { kind: 'float', value: floatValue };
    }
  }

  const boolValue = getBoolean(value);
  if (boolValue !== undefined) {
    return { kind: 'boolean', value: boolValue };
  }

  const listValue = getList(value);
  if (listValue !== undefined) {
    return { kind: 'list', value: listValue };
  }

  return { kind: 'string', value };
}

/**
 * Coerces a raw setting value into its typed form.
 *
 * Never throws; anything that matches no typed stage comes back as the
 * trimmed string.
 *
 * @param raw - The raw value text.
 * @returns The coerced value.
 *
 * @example
 * ```typescript
 * coerceValue('26214400');          // 26214400
 * coerceValue('no');                // false
 * coerceValue('array, of, values'); // ['array', 'of', 'values']
 * coerceValue('"a, b"');            // 'a, b'
 * ```
 */
export function coerceValue(raw: string): CoercedValue {
  return classifyValue(raw).value;
}
