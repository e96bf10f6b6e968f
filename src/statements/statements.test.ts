import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { IntegerValue, Sequence1D, SetValue, SymbolValue, TextValue } from '../values/index.js';
import {
  Attribute,
  Group,
  ObjectStatement,
  Statements,
  cloneStatement,
  statementsEqual,
} from './statements.js';
import type { Statement } from './statements.js';

function identifiers(statements: Iterable<Statement>): string[] {
  return Array.from(statements, (statement) => statement.identifier.text);
}

function sampleLabel(): Statements {
  return Statements.label([
    new Attribute('PDS_VERSION_ID', new SymbolValue('PDS3')),
    new Attribute('RECORD_BYTES', new IntegerValue(512)),
    new ObjectStatement(
      'IMAGE',
      Statements.object([new Attribute('LINES', new IntegerValue(100))])
    ),
  ]);
}

describe('Statements', () => {
  describe('index operations', () => {
    it('should get statements by positive and negative index', () => {
      const label = sampleLabel();

      expect(label.get(0).identifier.text).toBe('PDS_VERSION_ID');
      expect(label.get(-1).identifier.text).toBe('IMAGE');
      expect(label.length).toBe(3);
    });

    it('should insert before the indexed statement', () => {
      const label = sampleLabel();
      label.insert(1, new Attribute('FILE_RECORDS', new IntegerValue(10)));
      label.insert(-1, new Attribute('LABEL_RECORDS', new IntegerValue(1)));
      label.insert(label.length, new Attribute('LAST', new IntegerValue(0)));

      expect(identifiers(label)).toEqual([
        'PDS_VERSION_ID',
        'FILE_RECORDS',
        'RECORD_BYTES',
        'LABEL_RECORDS',
        'IMAGE',
        'LAST',
      ]);
    });

    it('should pop the last statement by default', () => {
      const label = sampleLabel();

      expect(label.pop().identifier.text).toBe('IMAGE');
      expect(label.pop(0).identifier.text).toBe('PDS_VERSION_ID');
      expect(identifiers(label)).toEqual(['RECORD_BYTES']);
    });

    it('should replace a statement and return the previous one', () => {
      const label = sampleLabel();
      const previous = label.replace(1, new Attribute('RECORD_BYTES', new IntegerValue(1024)));

      expect(previous.kind).toBe('attribute');
      expect(label.getValue('RECORD_BYTES')?.toString()).toBe('1024');
    });

    it('should raise RangeError out of range', () => {
      const label = sampleLabel();

      expect(() => label.get(3)).toThrow(RangeError);
      expect(() => label.get(-4)).toThrow(RangeError);
      expect(() => label.pop(5)).toThrow(RangeError);
      expect(() => label.insert(4, new Attribute('X', new IntegerValue(1)))).toThrow(RangeError);
      expect(() => Statements.label().pop()).toThrow(RangeError);
    });
  });

  describe('identifier operations', () => {
    it('should look up case-insensitively', () => {
      const label = Statements.label();
      label.set('inserted_attr', new TextValue('x'));

      expect(label.find('inserted_attr')).toBe(label.find('InSeRtEd_AtTr'));
      expect(label.has('INSERTED_ATTR')).toBe(true);
      expect(label.indexOf('inserted_ATTR')).toBe(0);
    });

    it('should replace an existing statement in place without changing length', () => {
      const label = sampleLabel();
      label.set('record_bytes', new IntegerValue(2048));

      expect(label.length).toBe(3);
      expect(label.indexOf('RECORD_BYTES')).toBe(1);
      expect(label.getValue('RECORD_BYTES')?.toString()).toBe('2048');
    });

    it('should append a new attribute for a new identifier', () => {
      const label = sampleLabel();
      label.set('target_name', new SymbolValue('mars'));

      expect(label.length).toBe(4);
      expect(label.get(-1).identifier.text).toBe('TARGET_NAME');
    });

    it('should decrease length by one on delete', () => {
      const label = sampleLabel();

      expect(label.delete('image')).toBe(true);
      expect(label.length).toBe(2);
      expect(label.delete('image')).toBe(false);
      expect(label.length).toBe(2);
    });

    it('should resolve duplicates to the first match', () => {
      const label = Statements.label([
        new Attribute('A', new IntegerValue(1)),
        new Attribute('A', new IntegerValue(2)),
      ]);

      expect(label.getValue('a')?.toString()).toBe('1');
      label.delete('a');
      expect(label.getValue('a')?.toString()).toBe('2');
    });

    it('should build groups and objects from container values', () => {
      const label = Statements.label();
      label.set('shape', Statements.group([new Attribute('SIDES', new IntegerValue(4))]));
      label.set('table', Statements.object());

      expect(label.get(0).kind).toBe('group');
      expect(label.get(1).kind).toBe('object');
    });

    it('should refuse to nest a label', () => {
      expect(() => {
        Statements.label().set('inner', Statements.label());
      }).toThrow('Invalid statement value: a label cannot be nested in another container');
    });

    it('should return block bodies from getValue', () => {
      const label = sampleLabel();
      const body = label.getValue('image');

      expect(body instanceof Statements && body.kind === 'object').toBe(true);
    });
  });

  describe('membership', () => {
    it('should reject non-attributes in a group body with the statement kind', () => {
      const group = Statements.group();

      expect(() => {
        group.append(new ObjectStatement('INNER'));
      }).toThrow(
        "Invalid statement: GroupStatements does not accept object statements ('INNER')"
      );
      expect(() => {
        group.set('inner', Statements.group());
      }).toThrow(ValidationError);
    });

    it('should accept every kind in an object body', () => {
      const body = Statements.object([
        new Attribute('A', new IntegerValue(1)),
        new Group('B'),
        new ObjectStatement('C', Statements.object([new ObjectStatement('D')])),
      ]);

      expect(body.length).toBe(3);
    });

    it('should reject a mismatched body for a block', () => {
      expect(() => new Group('G', Statements.object())).toThrow(ValidationError);
      expect(() => new ObjectStatement('O', Statements.group())).toThrow(
        'Invalid object statements: expected ObjectStatements, got GroupStatements'
      );
    });

    it('should reject pointer or namespaced block names', () => {
      expect(() => new Group('^G')).toThrow(ValidationError);
      expect(() => new ObjectStatement('NS:O')).toThrow(ValidationError);
    });

    it('should allow pointers and namespaces on attributes', () => {
      const attribute = new Attribute('^image', new IntegerValue(12));

      expect(attribute.identifier.pointer).toBe(true);
      expect(new Attribute('ctx:name', new IntegerValue(1)).identifier.text).toBe('CTX:NAME');
    });
  });

  describe('iteration', () => {
    it('should iterate forwards and backwards, restarting each time', () => {
      const label = sampleLabel();

      expect(identifiers(label)).toEqual(['PDS_VERSION_ID', 'RECORD_BYTES', 'IMAGE']);
      expect(identifiers(label.reversed())).toEqual(['IMAGE', 'RECORD_BYTES', 'PDS_VERSION_ID']);
      expect(identifiers(label)).toHaveLength(3);
    });
  });

  describe('clone and equals', () => {
    it('should deep-copy nested bodies and values', () => {
      const label = Statements.label([
        new Attribute('SEQ', new Sequence1D([new IntegerValue(1)])),
        new ObjectStatement('O', Statements.object([new Attribute('X', new IntegerValue(1))])),
      ]);
      const copy = label.clone();

      expect(copy.equals(label)).toBe(true);

      const sequence = copy.getValue('SEQ');
      if (sequence instanceof Sequence1D) {
        sequence.append(new IntegerValue(2));
      }
      const body = copy.getValue('O');
      if (body instanceof Statements) {
        body.set('Y', new IntegerValue(2));
      }

      expect(label.getValue('SEQ')?.toString()).toBe('(1)');
      expect(label.equals(copy)).toBe(false);
    });

    it('should not share an assigned set between attributes', () => {
      const phases = new SetValue([new SymbolValue('cruise')]);
      const label = Statements.label();
      label.set('FIRST', phases);
      label.set('SECOND', phases);

      const first = label.getValue('FIRST');
      if (first instanceof SetValue) {
        first.add(new SymbolValue('primary'));
      }
      phases.clear();

      expect(label.getValue('FIRST')?.toString()).toBe("{'CRUISE', 'PRIMARY'}");
      expect(label.getValue('SECOND')?.toString()).toBe("{'CRUISE'}");
    });

    it('should copy a sequence reassigned to an attribute', () => {
      const attribute = new Attribute('SEQ', new IntegerValue(1));
      const sequence = new Sequence1D([new IntegerValue(1)]);
      attribute.value = sequence;
      sequence.append(new IntegerValue(2));

      expect(attribute.value.toString()).toBe('(1)');
    });

    it('should distinguish container kinds', () => {
      expect(Statements.label().equals(Statements.object())).toBe(false);
      expect(Statements.group().equals(Statements.group())).toBe(true);
    });

    it('should compare statements by identifier, kind and content', () => {
      const a = new Attribute('A', new IntegerValue(1));

      expect(statementsEqual(a, cloneStatement(a))).toBe(true);
      expect(statementsEqual(a, new Attribute('a', new IntegerValue(2)))).toBe(false);
      expect(statementsEqual(new Group('A'), new ObjectStatement('A'))).toBe(false);
    });
  });
});
