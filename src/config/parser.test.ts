import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fc from 'fast-check';
import { Logger } from '../utils/logger.js';
import {
  ConfigParseError,
  ConfigParser,
  DuplicateGroupError,
  InvalidLineError,
  MissingGroupError,
  parseConfig,
  parseLines,
} from './index.js';

/**
 * Runs a parse expected to fail and returns the error.
 */
function parseError(content: string, overrides: string[] = []): ConfigParseError {
  try {
    parseConfig(content, { overrides, source: 'test.conf' });
  } catch (error) {
    if (error instanceof ConfigParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected parse to fail');
}

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid input', () => {
      it('should parse groups and typed settings', () => {
        const tree = parseConfig('[http]\npath = /tmp/\nenabled = no\n');
        expect(tree.toObject()).toEqual({ http: { path: '/tmp/', enabled: false } });
      });

      it('should parse an empty input to an empty tree', () => {
        expect(parseConfig('').toObject()).toEqual({});
      });

      it('should skip comments and blank lines', () => {
        const content = `
; leading comment

[common]   ; header comment
   ; indented comment
limit = 10 ; trailing comment
`;
        expect(parseConfig(content).toObject()).toEqual({ common: { limit: 10 } });
      });

      it('should store lists', () => {
        const tree = parseConfig('[http]\nparams = array,of,values\n');
        expect(tree.get('http', 'params')).toEqual(['array', 'of', 'values']);
      });

      it('should keep quoted strings with commas intact', () => {
        const tree = parseConfig('[ftp]\nname = "hello there, ftp uploading"\n');
        expect(tree.get('ftp', 'name')).toBe('hello there, ftp uploading');
      });

      it('should accept CRLF line endings', () => {
        const tree = parseConfig('[a]\r\nk = v\r\n');
        expect(tree.toObject()).toEqual({ a: { k: 'v' } });
      });

      it('should accept lone carriage returns as line endings', () => {
        const tree = parseConfig('[a]\rb = 1\rc = 2\r');
        expect(tree.toObject()).toEqual({ a: { b: 1, c: 2 } });
      });

      it('should count lines split by mixed terminators', () => {
        const error = parseError('[a]\r\nk = v\r???\n');
        expect(error).toBeInstanceOf(InvalidLineError);
        expect(error.line).toBe(3);
      });

      it('should keep Unicode line separators inside a value', () => {
        const tree = parseConfig('[a]\nb = x\u2028y\n');
        expect(tree.get('a', 'b')).toBe('x\u2028y');
      });

      it('should keep every digit of a large integer', () => {
        const tree = parseConfig('[a]\nquota = 12345678901234567891\n');
        expect(tree.get('a', 'quota')).toBe(12345678901234567891n);
      });

      it('should keep empty groups', () => {
        const tree = parseConfig('[a]\n[b]\nk = 1\n');
        expect(tree.toObject()).toEqual({ a: {}, b: { k: 1 } });
        expect(tree.groupNames()).toEqual(['a', 'b']);
      });

      it('should let a later unconditional line replace an earlier one', () => {
        const tree = parseConfig('[a]\nk = 1\nk = 2\n');
        expect(tree.get('a', 'k')).toBe(2);
      });

      it('should treat a line with empty brackets as a setting when it has a value', () => {
        const tree = parseConfig('[a]\n[] = x\n');
        expect(tree.toObject()).toEqual({ a: { '[]': 'x' } });
      });

      it('should store the value captured by the setting pattern on override lines', () => {
        const tree = parseConfig('[a]\nk<x> = b=c\n', { overrides: ['x'] });
        expect(tree.toObject()).toEqual({ a: { k: 'c' } });
      });
    });

    describe('overrides', () => {
      it('should apply an enabled override declared before the base setting', () => {
        const tree = parseConfig('[ftp]\npath<production> = /srv/var/tmp/\npath = /tmp/\n', {
          overrides: ['production'],
        });
        expect(tree.toObject()).toEqual({ ftp: { path: '/srv/var/tmp/' } });
      });

      it('should apply an enabled override declared after the base setting', () => {
        const tree = parseConfig('[ftp]\npath = /tmp/\npath<production> = /srv/var/tmp/\n', {
          overrides: ['production'],
        });
        expect(tree.get('ftp', 'path')).toBe('/srv/var/tmp/');
      });

      it('should drop a disabled override without storing anything', () => {
        const tree = parseConfig('[ftp]\npath<production> = /srv/var/tmp/\n', { overrides: [] });
        expect(tree.toObject()).toEqual({ ftp: {} });
      });

      it('should keep the base value when the override is disabled', () => {
        const tree = parseConfig('[ftp]\npath = /tmp/\npath<staging> = /srv/uploads/\n', {
          overrides: ['production'],
        });
        expect(tree.get('ftp', 'path')).toBe('/tmp/');
      });

      it('should let the last enabled override win', () => {
        const content = [
          '[ftp]',
          'path = /tmp/',
          'path<production> = /srv/var/tmp/',
          'path<staging> = /srv/uploads/',
          'path<ubuntu> = /etc/var/uploads',
        ].join('\n');
        const tree = parseConfig(content, { overrides: ['ubuntu', 'production'] });
        expect(tree.get('ftp', 'path')).toBe('/etc/var/uploads');
      });

      it('should scope override precedence to its group', () => {
        const content = '[a]\nk<p> = 1\n[b]\nk = 2\n';
        const tree = parseConfig(content, { overrides: ['p'] });
        expect(tree.toObject()).toEqual({ a: { k: 1 }, b: { k: 2 } });
      });

      it('should accept any iterable of override names', () => {
        const tree = parseConfig('[a]\nk<p> = on\n', { overrides: new Set(['p']) });
        expect(tree.get('a', 'k')).toBe('on');
      });

      it('should coerce override values', () => {
        const tree = parseConfig('[a]\nlimit<big> = 2147483648\n', { overrides: ['big'] });
        expect(tree.get('a', 'limit')).toBe(2147483648);
      });
    });

    describe('errors', () => {
      it('should raise MissingGroupError for a setting before any group', () => {
        const error = parseError('path = /tmp/\n[a]\n');
        expect(error).toBeInstanceOf(MissingGroupError);
        expect(error.kind).toBe('missing_group');
        expect(error.line).toBe(1);
        expect(error.source).toBe('test.conf');
        expect(error.message).toBe(
          'Unable to find a group at line 1 while parsing file at test.conf'
        );
      });

      it('should count comment and blank lines in the line number', () => {
        const error = parseError('; comment\n\nk = v\n');
        expect(error).toBeInstanceOf(MissingGroupError);
        expect(error.line).toBe(3);
      });

      it('should raise MissingGroupError for a disabled override before any group', () => {
        const error = parseError('k<p> = v\n[a]\n');
        expect(error).toBeInstanceOf(MissingGroupError);
      });

      it('should raise DuplicateGroupError naming the group', () => {
        const error = parseError('[a]\n[a]\n');
        expect(error).toBeInstanceOf(DuplicateGroupError);
        expect(error.line).toBe(2);
        expect(error instanceof DuplicateGroupError ? error.group : undefined).toBe('a');
        expect(error.message).toBe(
          "Duplicate group 'a' found at line 2 while parsing file at test.conf"
        );
      });

      it('should compare trimmed group names for duplicates', () => {
        const error = parseError('[a]\n[ a ]\n');
        expect(error).toBeInstanceOf(DuplicateGroupError);
      });

      it('should raise InvalidLineError for an unrecognized line', () => {
        const error = parseError('[a]\nthis is not a setting\n');
        expect(error).toBeInstanceOf(InvalidLineError);
        expect(error.kind).toBe('invalid_line');
        expect(error.line).toBe(2);
        expect(error.message).toBe('Unable to parse line 2 while parsing file at test.conf');
      });

      it('should treat empty brackets on their own as an invalid line', () => {
        const error = parseError('[a]\n[]\n');
        expect(error).toBeInstanceOf(InvalidLineError);
      });

      it('should report the default source for string input', () => {
        expect(() => parseConfig('[a]\n???\n')).toThrow(
          'Unable to parse line 2 while parsing file at <string>'
        );
      });
    });

    describe('Property-based tests', () => {
      const name = fc.constantFrom('alpha', 'beta', 'gamma', 'delta');
      const value = fc.constantFrom('/tmp/', '/srv/', 'word', 'other');

      it('duplicate groups always fail regardless of distance', () => {
        fc.assert(
          fc.property(name, fc.nat({ max: 20 }), (group, gap) => {
            const lines = [`[${group}]`, ...Array<string>(gap).fill('k = v'), `[${group}]`];
            expect(() => parseLines(lines)).toThrow(DuplicateGroupError);
            try {
              parseLines(lines);
            } catch (error) {
              expect(error instanceof ConfigParseError ? error.line : undefined).toBe(gap + 2);
            }
          })
        );
      });

      it('settings before the first group always fail', () => {
        fc.assert(
          fc.property(fc.nat({ max: 5 }), name, (blankLines, group) => {
            const lines = [...Array<string>(blankLines).fill(''), 'k = v', `[${group}]`];
            expect(() => parseLines(lines)).toThrow(MissingGroupError);
          })
        );
      });

      it('an enabled override always wins over the base value', () => {
        fc.assert(
          fc.property(
            value,
            value,
            fc.boolean(),
            fc.boolean(),
            (baseValue, overrideValue, overrideFirst, enabled) => {
              const base = `key = ${baseValue}`;
              const override = `key<env> = ${overrideValue}`;
              const lines = overrideFirst ? ['[g]', override, base] : ['[g]', base, override];
              const tree = parseLines(lines, { overrides: enabled ? ['env'] : [] });
              expect(tree.get('g', 'key')).toBe(enabled ? overrideValue : baseValue);
            }
          )
        );
      });

      it('a lone disabled override leaves the setting absent', () => {
        fc.assert(
          fc.property(value, (overrideValue) => {
            const tree = parseLines(['[g]', `key<env> = ${overrideValue}`], {
              overrides: ['other'],
            });
            expect(tree.get('g', 'key')).toBeUndefined();
          })
        );
      });
    });
  });

  describe('ConfigParser', () => {
    it('should build a tree incrementally', () => {
      const parser = new ConfigParser({ overrides: ['production'], source: 'app.conf' });
      parser.feed('[ftp]');
      parser.feed('path<production> = /srv/var/tmp/');
      parser.feed('path = /tmp/');
      expect(parser.linesRead).toBe(3);
      expect(parser.finish().get('ftp', 'path')).toBe('/srv/var/tmp/');
    });

    it('should rethrow the first failure on later calls', () => {
      const parser = new ConfigParser({ source: 'app.conf' });
      let first: unknown;
      try {
        parser.feed('k = v');
      } catch (error) {
        first = error;
      }
      expect(first).toBeInstanceOf(MissingGroupError);
      expect(() => parser.feed('[a]')).toThrow(MissingGroupError);
      expect(() => parser.finish()).toThrow(MissingGroupError);
      expect(parser.linesRead).toBe(1);
    });

    it('should copy the override set at construction', () => {
      const overrides = new Set(['p']);
      const parser = new ConfigParser({ overrides });
      overrides.delete('p');
      parser.feed('[a]');
      parser.feed('k<p> = 1');
      expect(parser.finish().get('a', 'k')).toBe(1);
    });

    it('should pull lines lazily from an iterable', () => {
      const consumed: string[] = [];
      function* source(): Generator<string> {
        for (const line of ['[a]', 'k = 1', 'bad line', 'never = read']) {
          consumed.push(line);
          yield line;
        }
      }
      expect(() => parseLines(source())).toThrow(InvalidLineError);
      expect(consumed).toEqual(['[a]', 'k = 1', 'bad line']);
    });
  });

  describe('debug logging', () => {
    let captured: string[];

    beforeEach(() => {
      captured = [];
      vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
        captured.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
        return true;
      });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    function events(): unknown[] {
      return captured.map((line) => (JSON.parse(line) as { event: unknown }).event);
    }

    it('should log parser decisions when debug mode is on', () => {
      const logger = new Logger({ component: 'ConfigParser', debugMode: true });
      parseConfig('[a]\nk<p> = 1\nk<q> = 2\nk = 3\n', { overrides: ['p'], logger });
      expect(events()).toEqual([
        'group_opened',
        'override_applied',
        'override_skipped',
        'setting_shadowed',
      ]);
    });

    it('should stay silent when debug mode is off', () => {
      const logger = new Logger({ component: 'ConfigParser' });
      parseConfig('[a]\nk<p> = 1\n', { overrides: ['p'], logger });
      expect(captured).toEqual([]);
    });
  });
});
