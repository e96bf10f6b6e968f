import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
import { DEFAULT_RENDER_OPTIONS, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read PDS_LABEL_LINE_ENDING case-insensitively', () => {
      const result = readEnvOverrides({ PDS_LABEL_LINE_ENDING: 'LF' });

      expect(result.overrides.lineEnding).toBe('lf');
      expect(result.appliedVars).toEqual(['PDS_LABEL_LINE_ENDING']);
    });

    it('should coerce widths to numbers', () => {
      const result = readEnvOverrides({
        PDS_LABEL_INDENT_WIDTH: '4',
        PDS_LABEL_MIN_KEY_WIDTH: ' 20 ',
      });

      expect(result.overrides).toEqual({ indentWidth: 4, minKeyWidth: 20 });
    });

    it('should coerce boolean spellings', () => {
      expect(readEnvOverrides({ PDS_LABEL_FINAL_NEWLINE: 'off' }).overrides.finalNewline).toBe(
        false
      );
      expect(readEnvOverrides({ PDS_LABEL_FINAL_NEWLINE: 'Yes' }).overrides.finalNewline).toBe(
        true
      );
    });

    it('should skip unset and empty variables', () => {
      const result = readEnvOverrides({ PDS_LABEL_INDENT_WIDTH: '', OTHER: 'x' });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should throw EnvCoercionError for a non-numeric width', () => {
      expect(() => readEnvOverrides({ PDS_LABEL_INDENT_WIDTH: 'wide' })).toThrow(EnvCoercionError);
    });

    it('should report the variable, raw value and expected type', () => {
      try {
        readEnvOverrides({ PDS_LABEL_LINE_ENDING: 'cr' });
        expect.fail('expected EnvCoercionError');
      } catch (error) {
        expect(error).toBeInstanceOf(EnvCoercionError);
        if (error instanceof EnvCoercionError) {
          expect(error.envVar).toBe('PDS_LABEL_LINE_ENDING');
          expect(error.rawValue).toBe('cr');
          expect(error.expectedType).toBe('line ending');
        }
      }
    });

    it('should collect errors when asked to', () => {
      const result = readEnvOverrides(
        {
          PDS_LABEL_FINAL_NEWLINE: 'maybe',
          PDS_LABEL_MIN_KEY_WIDTH: 'NaN',
          PDS_LABEL_INDENT_WIDTH: '2',
        },
        { collectErrors: true }
      );

      expect(result.overrides).toEqual({ indentWidth: 2 });
      expect(result.errors.map((e) => e.envVar).sort()).toEqual([
        'PDS_LABEL_FINAL_NEWLINE',
        'PDS_LABEL_MIN_KEY_WIDTH',
      ]);
    });

    it('should round-trip any integer width', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 1000 }), (width) => {
          const result = readEnvOverrides({ PDS_LABEL_INDENT_WIDTH: String(width) });
          return result.overrides.indentWidth === width;
        })
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should let env values win over file values', () => {
      const config = parseConfig(`
[render]
line_ending = "lf"
indent_width = 3
`);
      const result = applyEnvOverrides(config, { PDS_LABEL_INDENT_WIDTH: '5' });

      expect(result.render).toEqual({
        lineEnding: 'lf',
        indentWidth: 5,
        minKeyWidth: 0,
        finalNewline: true,
      });
    });

    it('should not modify the base configuration', () => {
      const config = parseConfig('');
      applyEnvOverrides(config, { PDS_LABEL_FINAL_NEWLINE: 'false' });

      expect(config.render).toEqual(DEFAULT_RENDER_OPTIONS);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs).sort()).toEqual([
        'PDS_LABEL_FINAL_NEWLINE',
        'PDS_LABEL_INDENT_WIDTH',
        'PDS_LABEL_LINE_ENDING',
        'PDS_LABEL_MIN_KEY_WIDTH',
      ]);
      expect(docs.PDS_LABEL_FINAL_NEWLINE?.type).toBe('boolean');
    });
  });
});
