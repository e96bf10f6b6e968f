import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { ConfigValidationError } from '../config/index.js';
import { SerializationError } from '../errors/index.js';
import { Attribute, Group, ObjectStatement, Statements } from '../statements/index.js';
import type { Label } from '../statements/index.js';
import { Logger } from '../utils/logger.js';
import {
  DateValue,
  IdentifierValue,
  IntegerValue,
  RealValue,
  Sequence1D,
  Sequence2D,
  TextValue,
  Units,
} from '../values/index.js';
import { render, renderToString } from './serializer.js';

function imageLabel(): Label {
  return Statements.label([
    new Attribute('PDS_VERSION_ID', new IdentifierValue('PDS3')),
    new Attribute('RECORD_BYTES', new IntegerValue(512)),
    new ObjectStatement(
      'IMAGE',
      Statements.object([
        new Attribute('LINES', new IntegerValue(100)),
        new Attribute('SAMPLE_BITS', new IntegerValue(8)),
      ])
    ),
  ]);
}

describe('renderToString', () => {
  describe('layout', () => {
    it('should align keys per container and indent nested blocks', () => {
      expect(renderToString(imageLabel(), { lineEnding: 'lf' })).toBe(
        [
          'PDS_VERSION_ID = PDS3',
          'RECORD_BYTES   = 512',
          'OBJECT         = IMAGE',
          ' LINES       = 100',
          ' SAMPLE_BITS = 8',
          'END_OBJECT     = IMAGE',
          'END',
          '',
        ].join('\n')
      );
    });

    it('should count block terminators when aligning', () => {
      const label = Statements.label([
        new Group('G', Statements.group([new Attribute('X', new IntegerValue(1))])),
      ]);

      expect(renderToString(label, { lineEnding: 'lf' })).toBe(
        'GROUP     = G\n X = 1\nEND_GROUP = G\nEND\n'
      );
    });

    it('should indent by the configured width per level', () => {
      const label = Statements.label([
        new ObjectStatement(
          'OUTER',
          Statements.object([
            new ObjectStatement(
              'INNER',
              Statements.object([new Attribute('DEPTH', new IntegerValue(2))])
            ),
          ])
        ),
      ]);

      expect(renderToString(label, { lineEnding: 'lf', indentWidth: 2 })).toBe(
        [
          'OBJECT     = OUTER',
          '  OBJECT     = INNER',
          '    DEPTH = 2',
          '  END_OBJECT = INNER',
          'END_OBJECT = OUTER',
          'END',
          '',
        ].join('\n')
      );
    });

    it('should pad keys to the minimum width', () => {
      const label = Statements.label([new Attribute('A', new IntegerValue(1))]);

      expect(renderToString(label, { lineEnding: 'lf', minKeyWidth: 4 })).toBe(
        'A    = 1\nEND\n'
      );
    });

    it('should render an empty label as END', () => {
      expect(renderToString(Statements.label())).toBe('END\r\n');
    });
  });

  describe('line endings', () => {
    it('should use CRLF by default', () => {
      const label = Statements.label([new Attribute('A', new IntegerValue(1))]);

      expect(renderToString(label)).toBe('A = 1\r\nEND\r\n');
    });

    it('should omit the final line ending when asked', () => {
      const label = Statements.label([new Attribute('A', new IntegerValue(1))]);

      expect(renderToString(label, { finalNewline: false })).toBe('A = 1\r\nEND');
    });
  });

  describe('values', () => {
    it('should render values in canonical form', () => {
      const label = Statements.label([
        new Attribute('^IMAGE', new Sequence1D([new TextValue('F.IMG'), new IntegerValue(12)])),
        new Attribute('SCALE', new RealValue(1, new Units('m/pixel'))),
        new Attribute('START', new DateValue(2020, undefined, 60)),
        new Attribute(
          'GRID',
          new Sequence2D([
            new Sequence1D([new IntegerValue(1)]),
            new Sequence1D([new IntegerValue(2)]),
          ])
        ),
      ]);

      expect(renderToString(label, { lineEnding: 'lf' })).toBe(
        [
          '^IMAGE = ("F.IMG", 12)',
          'SCALE  = 1.0 <M/PIXEL>',
          'START  = 2020-060',
          'GRID   = ((1), (2))',
          'END',
          '',
        ].join('\n')
      );
    });
  });

  describe('failures', () => {
    it('should name the attribute holding an empty sequence', () => {
      const label = Statements.label();
      label.set('EMPTY_SEQ', new Sequence1D());

      expect(() => renderToString(label)).toThrow(SerializationError);
      expect(() => renderToString(label)).toThrow(
        "Cannot render a sequence with no elements in 'EMPTY_SEQ'"
      );
    });

    it('should fail on an empty row inside an object', () => {
      const body = Statements.object([
        new Attribute('ROWS', new Sequence2D([new Sequence1D()])),
      ]);
      const label = Statements.label([new ObjectStatement('TABLE', body)]);

      let caught: unknown;
      try {
        renderToString(label);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SerializationError);
      expect(caught instanceof SerializationError && caught.identifier).toBe('ROWS');
    });
  });

  describe('options', () => {
    it('should reject a negative indent width before rendering', () => {
      let caught: unknown;
      try {
        renderToString(imageLabel(), { indentWidth: -1 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      expect(caught instanceof ConfigValidationError && caught.errors).toEqual([
        {
          field: 'render.indent_width',
          value: -1,
          message: "'render.indent_width' must be a non-negative integer, got -1",
        },
      ]);
    });

    it('should reject a fractional key width', () => {
      const label = Statements.label([new Attribute('A', new IntegerValue(1))]);

      expect(() => render(label, { minKeyWidth: 2.5 })).toThrow(
        "'render.min_key_width' must be a non-negative integer, got 2.5"
      );
    });
  });

  describe('logging', () => {
    let writeSpy: MockInstance;

    beforeEach(() => {
      writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      writeSpy.mockRestore();
    });

    function entries(): unknown[] {
      return writeSpy.mock.calls.map((call: unknown[]) => JSON.parse(String(call[0])));
    }

    it('should log the rendered size', () => {
      const label = Statements.label([new Attribute('A', new IntegerValue(1))]);

      renderToString(label, {
        lineEnding: 'lf',
        logger: new Logger({ component: 'test', debugMode: true }),
      });

      expect(entries()).toEqual([
        expect.objectContaining({
          event: 'label_rendered',
          data: { statements: 1, characters: 10 },
        }),
      ]);
    });

    it('should log a render failure', () => {
      const label = Statements.label([new Attribute('S', new Sequence1D())]);

      expect(() =>
        renderToString(label, { logger: new Logger({ component: 'test', debugMode: true }) })
      ).toThrow(SerializationError);
      expect(entries()).toEqual([
        expect.objectContaining({
          event: 'label_render_failed',
          data: {
            message: "Cannot render a sequence with no elements in 'S'",
            identifier: 'S',
          },
        }),
      ]);
    });

    it('should not log when the options are rejected', () => {
      const label = Statements.label([new Attribute('A', new IntegerValue(1))]);

      expect(() =>
        renderToString(label, {
          indentWidth: -1,
          logger: new Logger({ component: 'test', debugMode: true }),
        })
      ).toThrow(ConfigValidationError);
      expect(writeSpy).not.toHaveBeenCalled();
    });
  });
});

describe('render', () => {
  it('should encode the text as bytes', () => {
    const label = Statements.label([new Attribute('A', new IntegerValue(1))]);
    const bytes = render(label, { lineEnding: 'lf' });

    expect(bytes).toBeInstanceOf(Uint8Array);
    expect(Array.from(bytes)).toEqual([0x41, 0x20, 0x3d, 0x20, 0x31, 0x0a, 0x45, 0x4e, 0x44, 0x0a]);
  });
});
