/**
 * The parsed configuration: groups of typed settings.
 *
 * Lookups never throw. An absent group or setting comes back as `undefined`
 * at every level, so chained access reads as
 * `tree.group('ftp')?.get('path')` or `tree.get('ftp', 'path')`.
 *
 * Both classes wrap a `Map` rather than a plain object, so setting names such
 * as `__proto__` or `constructor` are ordinary keys.
 *
 * @packageDocumentation
 */

import type { CoercedValue, ConfigRecord, GroupRecord } from './types.js';

/**
 * The settings of one `[group]` section, in the order they were first set.
 */
export class ConfigGroup implements Iterable<[string, CoercedValue]> {
  /** The group's name as written between the brackets. */
  public readonly name: string;
  private readonly settings: Map<string, CoercedValue>;

  /**
   * Creates an empty group.
   *
   * @param name - The group name.
   */
  constructor(name: string) {
    this.name = name;
    this.settings = new Map<string, CoercedValue>();
  }

  /**
   * Returns a setting's value.
   *
   * @param setting - The setting name.
   * @returns The value, or undefined if the group has no such setting.
   */
  get(setting: string): CoercedValue | undefined {
    return this.settings.get(setting);
  }

  /**
   * Checks whether the group has a setting.
   *
   * @param setting - The setting name.
   */
  has(setting: string): boolean {
    return this.settings.has(setting);
  }

  /**
   * Stores a value, replacing any earlier one for the same setting.
   *
   * A replaced setting keeps its original position.
   *
   * @param setting - The setting name.
   * @param value - The coerced value.
   * @returns This group for chaining.
   */
  set(setting: string, value: CoercedValue): this {
    this.settings.set(setting, value);
    return this;
  }

  /** Setting names in insertion order. */
  keys(): IterableIterator<string> {
    return this.settings.keys();
  }

  /** `[setting, value]` pairs in insertion order. */
  entries(): IterableIterator<[string, CoercedValue]> {
    return this.settings.entries();
  }

  /** Number of settings in the group. */
  get size(): number {
    return this.settings.size;
  }

  /**
   * Converts the group to a plain object.
   *
   * Keys are defined as own properties, so a `__proto__` setting does not
   * touch the prototype.
   */
  toObject(): GroupRecord {
    const obj: GroupRecord = {};
    for (const [key, value] of this.settings) {
      Object.defineProperty(obj, key, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return obj;
  }

  [Symbol.iterator](): IterableIterator<[string, CoercedValue]> {
    return this.settings[Symbol.iterator]();
  }
}

/**
 * A whole parsed config file: group names mapped to their settings.
 *
 * @example
 * ```typescript
 * const tree = parseConfig('[http]\npath = /tmp/\n');
 * tree.get('http', 'path');       // '/tmp/'
 * tree.group('http')?.get('path'); // '/tmp/'
 * tree.get('smtp', 'path');       // undefined
 * ```
 */
export class ConfigTree implements Iterable<[string, ConfigGroup]> {
  private readonly groups: Map<string, ConfigGroup>;

  constructor() {
    this.groups = new Map<string, ConfigGroup>();
  }

  /**
   * Returns a group by name.
   *
   * @param name - The group name.
   * @returns The group, or undefined if the file had no such group.
   */
  group(name: string): ConfigGroup | undefined {
    return this.groups.get(name);
  }

  /**
   * Returns a setting's value from a group.
   *
   * @param group - The group name.
   * @param setting - The setting name.
   * @returns The value, or undefined if either the group or the setting is absent.
   */
  setting(group: string, setting: string): CoercedValue | undefined {
    return this.groups.get(group)?.get(setting);
  }

  /**
   * Keyed lookup of a group, or of a setting within a group.
   *
   * @param group - The group name.
   * @param setting - The setting name; omit it to get the whole group.
   * @returns The group or value, or undefined if absent.
   */
  get(group: string): ConfigGroup | undefined;
  get(group: string, setting: string): CoercedValue | undefined;
  get(group: string, setting?: string): ConfigGroup | CoercedValue | undefined {
    if (setting === undefined) {
      return this.group(group);
    }
    return this.setting(group, setting);
  }

  /**
   * Checks whether a group exists.
   *
   * @param name - The group name.
   */
  has(name: string): boolean {
    return this.groups.has(name);
  }

  /**
   * Creates a new empty group.
   *
   * The caller checks for duplicates; an existing group of the same name is
   * replaced.
   *
   * @param name - The group name.
   * @returns The new group.
   */
  openGroup(name: string): ConfigGroup {
    const group = new ConfigGroup(name);
    this.groups.set(name, group);
    return group;
  }

  /** Group names in the order they appeared. */
  groupNames(): string[] {
    return [...this.groups.keys()];
  }

  /** Number of groups. */
  get size(): number {
    return this.groups.size;
  }

  /** Converts the tree to nested plain objects. */
  toObject(): ConfigRecord {
    const obj: ConfigRecord = {};
    for (const [name, group] of this.groups) {
      Object.defineProperty(obj, name, {
        value: group.toObject(),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return obj;
  }

  [Symbol.iterator](): IterableIterator<[string, ConfigGroup]> {
    return this.groups[Symbol.iterator]();
  }
}
