/**
 * Composite values: sets and one- and two-dimensional sequences.
 *
 * Unlike scalars these are mutable. Members are checked on the way in, so a
 * set only ever holds integers and symbols and a sequence never nests deeper
 * than two levels. Rows added to a two-dimensional sequence are copied, so
 * no row is shared. A sequence may be emptied by mutation; rendering it then
 * fails with a SerializationError.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors/index.js';
import { resolveIndex, resolveInsertIndex } from '../utils/indices.js';
import { valuesEqual } from './equality.js';
import { formatValue } from './format.js';
import { isScalar, isSetMember } from './types.js';
import type { Scalar, SetMember, Value } from './types.js';

/**
 * An unordered collection of distinct integers and symbols.
 *
 * Members are kept, iterated and rendered in insertion order. Adding a value
 * equal to an existing member is a no-op.
 */
export class SetValue implements Iterable<SetMember> {
  readonly kind = 'set';
  private readonly members: SetMember[] = [];

  /**
   * @param values - Initial members; duplicates are dropped.
   * @throws ValidationError if a value is neither an integer nor a symbol.
   */
  constructor(values: Iterable<Value> = []) {
    for (const value of values) {
      this.add(value);
    }
  }

  get size(): number {
    return this.members.length;
  }

  /**
   * Adds `value` unless an equal member is already present.
   *
   * @returns Whether the set changed.
   * @throws ValidationError if `value` is neither an integer nor a symbol.
   */
  add(value: Value): boolean {
    if (!isSetMember(value)) {
      throw new ValidationError(
        'set member',
        value.kind,
        `Invalid set member: a set holds integers and symbols, not ${value.kind}`
      );
    }
    if (this.has(value)) {
      return false;
    }
    this.members.push(value);
    return true;
  }

  has(value: Value): boolean {
    return this.members.some((member) => valuesEqual(member, value));
  }

  /**
   * Removes the member equal to `value`.
   *
   * @returns Whether a member was removed.
   */
  delete(value: Value): boolean {
    const index = this.members.findIndex((member) => valuesEqual(member, value));
    if (index === -1) {
      return false;
    }
    this.members.splice(index, 1);
    return true;
  }

  clear(): void {
    this.members.length = 0;
  }

  clone(): SetValue {
    return new SetValue(this.members);
  }

  [Symbol.iterator](): Iterator<SetMember> {
    return this.members[Symbol.iterator]();
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * Shared index-addressed storage for the two sequence variants.
 */
abstract class SequenceBase<T extends Value> implements Iterable<T> {
  protected readonly items: T[] = [];

  /** Checks that `value` may be stored, returning it narrowed. */
  protected abstract accept(value: Value): T;

  get length(): number {
    return this.items.length;
  }

  /**
   * @throws RangeError if `index` is out of range.
   */
  get(index: number): T {
    const item = this.items[resolveIndex(index, this.items.length)];
    if (item === undefined) {
      throw new RangeError(`Index ${String(index)} out of range`);
    }
    return item;
  }

  /**
   * Replaces the element at `index`.
   *
   * @throws RangeError if `index` is out of range.
   * @throws ValidationError if `value` is not allowed in this sequence.
   */
  set(index: number, value: Value): void {
    const resolved = resolveIndex(index, this.items.length);
    this.items[resolved] = this.accept(value);
  }

  /**
   * Inserts `value` before the element at `index`; `length` appends.
   */
  insert(index: number, value: Value): void {
    const resolved = resolveInsertIndex(index, this.items.length);
    this.items.splice(resolved, 0, this.accept(value));
  }

  append(value: Value): void {
    this.items.push(this.accept(value));
  }

  /**
   * Removes and returns the element at `index`, the last one by default.
   */
  pop(index = -1): T {
    const resolved = resolveIndex(index, this.items.length);
    const [removed] = this.items.splice(resolved, 1);
    if (removed === undefined) {
      throw new RangeError(`Index ${String(index)} out of range`);
    }
    return removed;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

/**
 * An ordered sequence of scalars, written `(a, b, c)`.
 */
export class Sequence1D extends SequenceBase<Scalar> {
  readonly kind = 'sequence_1d';

  /**
   * @param values - Initial elements.
   * @throws ValidationError if an element is a set or a sequence.
   */
  constructor(values: Iterable<Value> = []) {
    super();
    for (const value of values) {
      this.append(value);
    }
  }

  protected accept(value: Value): Scalar {
    if (!isScalar(value)) {
      throw new ValidationError(
        'sequence element',
        value.kind,
        `Invalid sequence element: a one-dimensional sequence holds scalars, not ${value.kind}`
      );
    }
    return value;
  }

  /** Deep copy; scalars are immutable and shared. */
  clone(): Sequence1D {
    return new Sequence1D(this.items);
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * An ordered sequence of one-dimensional sequences, written `((a, b), (c))`.
 */
export class Sequence2D extends SequenceBase<Sequence1D> {
  readonly kind = 'sequence_2d';

  /**
   * @param values - Initial rows.
   * @throws ValidationError if a row is not a one-dimensional sequence.
   */
  constructor(values: Iterable<Value> = []) {
    super();
    for (const value of values) {
      this.append(value);
    }
  }

  protected accept(value: Value): Sequence1D {
    if (value.kind !== 'sequence_1d') {
      throw new ValidationError(
        'sequence element',
        value.kind,
        `Invalid sequence element: a two-dimensional sequence holds one-dimensional sequences, not ${value.kind}`
      );
    }
    return value.clone();
  }

  /** Deep copy of every row. */
  clone(): Sequence2D {
    return new Sequence2D(this.items);
  }

  toString(): string {
    return formatValue(this);
  }
}
