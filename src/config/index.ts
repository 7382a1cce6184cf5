/**
 * Config module: value coercion, line parsing and file loading for
 * grouped config files with overrides.
 *
 * @packageDocumentation
 */

export {
  classifyValue,
  coerceValue,
  getBoolean,
  getFloat,
  getInt,
  getList,
  getQuotedString,
  isNumber,
} from './coerce.js';
export {
  ConfigParseError,
  DuplicateGroupError,
  InvalidLineError,
  MissingGroupError,
  isConfigParseError,
} from './errors.js';
export type { ConfigErrorKind } from './errors.js';
export {
  COMMENT_PATTERN,
  GROUP_PATTERN,
  SETTING_OVERRIDE_PATTERN,
  SETTING_PATTERN,
  isEmptyLine,
  parseGroupName,
  parseSettingOverrideValue,
  parseSettingValue,
  trimComment,
} from './patterns.js';
export { ConfigParser, DEFAULT_SOURCE, parseConfig, parseLines } from './parser.js';
export { ConfigGroup, ConfigTree } from './tree.js';
export { loadConfig, loadConfigSync } from './load.js';
export type { LoadOptions } from './load.js';
export {
  DEBUG_ENV_VAR,
  EnvCoercionError,
  OVERRIDES_ENV_VAR,
  readEnvSettings,
  splitOverrideList,
} from './env.js';
export type { EnvRecord, EnvSettings } from './env.js';
export type {
  ClassifiedValue,
  CoercedValue,
  ConfigRecord,
  GroupRecord,
  ParseOptions,
  SettingMatch,
  SettingOverrideMatch,
  ValueKind,
} from './types.js';
