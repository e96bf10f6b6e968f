import { describe, expect, it } from 'vitest';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import { DEFAULT_RENDER_OPTIONS } from './defaults.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    it('should return defaults for an empty document', () => {
      expect(parseConfig('')).toEqual({ render: DEFAULT_RENDER_OPTIONS });
    });

    it('should read every render field', () => {
      const config = parseConfig(`
[render]
line_ending = "lf"
indent_width = 2
min_key_width = 24
final_newline = false
`);

      expect(config.render).toEqual({
        lineEnding: 'lf',
        indentWidth: 2,
        minKeyWidth: 24,
        finalNewline: false,
      });
    });

    it('should merge partial tables with defaults', () => {
      const config = parseConfig('[render]\nmin_key_width = 8\n');

      expect(config.render.minKeyWidth).toBe(8);
      expect(config.render.lineEnding).toBe('crlf');
      expect(config.render.indentWidth).toBe(1);
    });

    it('should accept line endings in any case', () => {
      expect(parseConfig('[render]\nline_ending = "CRLF"\n').render.lineEnding).toBe('crlf');
    });

    it('should ignore unknown keys and tables', () => {
      const config = parseConfig('[render]\ncolour = "blue"\n[other]\nx = 1\n');

      expect(config.render).toEqual(DEFAULT_RENDER_OPTIONS);
    });

    it('should throw ConfigParseError for invalid TOML syntax', () => {
      expect(() => parseConfig('[render\n')).toThrow(ConfigParseError);
      expect(() => parseConfig('[render\n')).toThrow(/^Invalid TOML syntax: /);
    });

    it('should keep the TOML error as the cause', () => {
      try {
        parseConfig('= 1');
        expect.fail('expected ConfigParseError');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigParseError);
        if (error instanceof ConfigParseError) {
          expect(error.cause).toBeInstanceOf(Error);
        }
      }
    });

    it('should reject wrongly typed fields', () => {
      expect(() => parseConfig('[render]\nindent_width = "two"\n')).toThrow(
        "Invalid type for 'render.indent_width': expected number, got string"
      );
      expect(() => parseConfig('[render]\nfinal_newline = 1\n')).toThrow(
        "Invalid type for 'render.final_newline': expected boolean, got number"
      );
      expect(() => parseConfig('[render]\nline_ending = ["lf"]\n')).toThrow(
        "Invalid type for 'render.line_ending': expected string, got array"
      );
    });

    it('should reject an unknown line ending', () => {
      expect(() => parseConfig('[render]\nline_ending = "cr"\n')).toThrow(
        "Invalid value for 'render.line_ending': expected one of crlf, lf, got 'cr'"
      );
    });

    it('should reject a render key that is not a table', () => {
      expect(() => parseConfig('render = 3\n')).toThrow(
        "Invalid type for 'render': expected table, got number"
      );
    });
  });

  describe('getDefaultConfig', () => {
    it('should return a fresh copy each time', () => {
      const first = getDefaultConfig();
      first.render.indentWidth = 9;

      expect(getDefaultConfig().render.indentWidth).toBe(1);
    });
  });
});
