/**
 * Types shared by the value coercion engine, the line parser and the config tree.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';

/**
 * A setting value after coercion.
 *
 * Integers and floats are both represented as `number`; use
 * {@link ClassifiedValue} when the distinction matters. An integer literal
 * beyond `Number.MAX_SAFE_INTEGER` is kept exact as a `bigint`.
 */
export type CoercedValue = number | bigint | boolean | string | CoercedValue[];

/**
 * The coercion stage that produced a value.
 *
 * - `quoted`: a string wrapped in matching quotes, returned without them
 * - `integer` / `float`: a digits-only literal, with at most one `.`
 * - `boolean`: one of yes/no/true/false (case-insensitive)
 * - `list`: a comma-separated value, each element coerced on its own
 * - `string`: the fallback, the trimmed raw text
 */
export type ValueKind = 'quoted' | 'integer' | 'float' | 'boolean' | 'list' | 'string';

/**
 * A coerced value tagged with the stage that produced it.
 */
export type ClassifiedValue =
  | { readonly kind: 'quoted'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number | bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'list'; readonly value: CoercedValue[] }
  | { readonly kind: 'string'; readonly value: string };

/**
 * Plain-object view of a single group.
 */
export type GroupRecord = Record<string, CoercedValue>;

/**
 * Plain-object view of a whole config tree.
 */
export type ConfigRecord = Record<string, GroupRecord>;

/**
 * Options accepted by the line parser.
 */
export interface ParseOptions {
  /**
   * Names of the overrides enabled for this parse.
   * Copied into a fresh set when the parse starts.
   */
  readonly overrides?: Iterable<string>;

  /**
   * Identity of the input, reported in parse errors.
   * @defaultValue '<string>'
   */
  readonly source?: string;

  /**
   * Logger receiving debug events. Defaults to the shared package logger.
   */
  readonly logger?: Logger;
}

/**
 * Result of matching a `key = value` line.
 */
export interface SettingMatch {
  /** The trimmed key, possibly still carrying an `<override>` suffix. */
  readonly key: string;
  /** The trimmed raw value, before coercion. */
  readonly rawValue: string;
}

/**
 * Result of matching a `key<override> = value` line.
 */
export interface SettingOverrideMatch extends SettingMatch {
  /** The trimmed override name between the angle brackets. */
  readonly override: string;
}
