/**
 * Statement model: attributes, groups, objects and the ordered containers
 * that hold them.
 *
 * A label, the body of a group and the body of an object are all the same
 * {@link Statements} container, configured with a {@link ContainerPolicy}
 * that decides which statement kinds it accepts. The tree has no back
 * references: each container owns its statements, each block owns its body,
 * each attribute owns its value.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors/index.js';
import { resolveIndex, resolveInsertIndex } from '../utils/indices.js';
import { Identifier, cloneValue, valuesEqual } from '../values/index.js';
import type { Value } from '../values/index.js';

/** Discriminant of the statement variants. */
export type StatementKind = 'attribute' | 'group' | 'object';

/** Which of the three container configurations a container is. */
export type ContainerKind = 'label' | 'group' | 'object';

/**
 * Membership rule of a container.
 */
export interface ContainerPolicy<S extends Statement> {
  readonly kind: ContainerKind;
  /** Name used in validation messages. */
  readonly name: string;
  /** Whether `statement` may be stored in the container. */
  accepts(statement: Statement): statement is S;
}

function acceptsAny(statement: Statement): statement is Statement {
  return statement.kind === 'attribute' || statement.kind === 'group' || statement.kind === 'object';
}

/** A label accepts every statement kind. */
export const LABEL_POLICY: ContainerPolicy<Statement> = {
  kind: 'label',
  name: 'Label',
  accepts: acceptsAny,
};

/** A group body accepts attributes only. */
export const GROUP_POLICY: ContainerPolicy<Attribute> = {
  kind: 'group',
  name: 'GroupStatements',
  accepts: (statement: Statement): statement is Attribute => statement.kind === 'attribute',
};

/** An object body accepts attributes, groups and objects, nested to any depth. */
export const OBJECT_POLICY: ContainerPolicy<Statement> = {
  kind: 'object',
  name: 'ObjectStatements',
  accepts: acceptsAny,
};

function requireBlockIdentifier(identifier: Identifier | string, kind: 'group' | 'object'): Identifier {
  const id = Identifier.from(identifier);
  if (!id.isPlain) {
    throw new ValidationError(
      `${kind} identifier`,
      id.text,
      `Invalid ${kind} identifier: '${id.text}' may not carry a namespace or pointer marker`
    );
  }
  return id;
}

/**
 * An assignment statement, `IDENTIFIER = value`.
 *
 * Sets and sequences are copied when assigned, so no two attributes hold
 * the same mutable value.
 */
export class Attribute {
  readonly kind = 'attribute';
  readonly identifier: Identifier;
  private assigned: Value;

  /**
   * @param identifier - Identifier, optionally namespaced or a pointer (`^NAME`).
   * @param value - The assigned value.
   * @throws ValidationError if the identifier is invalid.
   */
  constructor(identifier: Identifier | string, value: Value) {
    this.identifier = Identifier.from(identifier);
    this.assigned = cloneValue(value);
  }

  /** The assigned value; may be replaced. */
  get value(): Value {
    return this.assigned;
  }

  set value(value: Value) {
    this.assigned = cloneValue(value);
  }
}

/**
 * A named block of attributes, `GROUP = NAME ... END_GROUP = NAME`.
 */
export class Group {
  readonly kind = 'group';
  readonly identifier: Identifier;
  readonly statements: GroupStatements;

  /**
   * @param identifier - Plain identifier naming the group.
   * @param statements - The group body; an empty one is created when omitted.
   * @throws ValidationError if the identifier is not plain or `statements`
   * is not a group body.
   */
  constructor(identifier: Identifier | string, statements: GroupStatements = Statements.group()) {
    this.identifier = requireBlockIdentifier(identifier, 'group');
    if (statements.kind !== 'group') {
      throw new ValidationError(
        'group statements',
        statements.kind,
        `Invalid group statements: expected GroupStatements, got ${statements.policyName}`
      );
    }
    this.statements = statements;
  }

  /** The group body. */
  get value(): GroupStatements {
    return this.statements;
  }
}

/**
 * A named block of statements, `OBJECT = NAME ... END_OBJECT = NAME`.
 */
export class ObjectStatement {
  readonly kind = 'object';
  readonly identifier: Identifier;
  readonly statements: ObjectStatements;

  /**
   * @param identifier - Plain identifier naming the object.
   * @param statements - The object body; an empty one is created when omitted.
   * @throws ValidationError if the identifier is not plain or `statements`
   * is not an object body.
   */
  constructor(identifier: Identifier | string, statements: ObjectStatements = Statements.object()) {
    this.identifier = requireBlockIdentifier(identifier, 'object');
    if (statements.kind !== 'object') {
      throw new ValidationError(
        'object statements',
        statements.kind,
        `Invalid object statements: expected ObjectStatements, got ${statements.policyName}`
      );
    }
    this.statements = statements;
  }

  /** The object body. */
  get value(): ObjectStatements {
    return this.statements;
  }
}

/** Any statement. */
export type Statement = Attribute | Group | ObjectStatement;

/** What can be assigned through {@link Statements.set}. */
export type StatementValue = Value | Statements<Statement> | Statements<Attribute>;

/**
 * An ordered, identifier-addressable sequence of statements.
 *
 * Order is insertion order unless changed through the index operations.
 * Identifier lookups are case-insensitive and resolve to the first matching
 * statement; duplicates may be stored but only the first is reachable by
 * identifier.
 *
 * Iterators read the live container. Mutating a container while iterating
 * over it is not supported.
 *
 * @example
 * ```typescript
 * const label = Statements.label();
 * label.set('record_type', new SymbolValue('fixed_length'));
 * label.find('RECORD_TYPE')?.kind; // 'attribute'
 * ```
 */
export class Statements<S extends Statement = Statement> implements Iterable<S> {
  private readonly policy: ContainerPolicy<S>;
  private readonly items: S[] = [];

  /**
   * @param policy - Which statement kinds the container accepts.
   * @param statements - Initial statements, in order.
   * @throws ValidationError if an initial statement is not accepted.
   */
  constructor(policy: ContainerPolicy<S>, statements: Iterable<Statement> = []) {
    this.policy = policy;
    for (const statement of statements) {
      this.append(statement);
    }
  }

  /** Creates a label. */
  static label(statements: Iterable<Statement> = []): Label {
    return new Statements(LABEL_POLICY, statements);
  }

  /** Creates a group body. */
  static group(statements: Iterable<Statement> = []): GroupStatements {
    return new Statements(GROUP_POLICY, statements);
  }

  /** Creates an object body. */
  static object(statements: Iterable<Statement> = []): ObjectStatements {
    return new Statements(OBJECT_POLICY, statements);
  }

  get kind(): ContainerKind {
    return this.policy.kind;
  }

  /** Name of the container configuration, e.g. `GroupStatements`. */
  get policyName(): string {
    return this.policy.name;
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Statement at `index`; negative indices count from the end.
   *
   * @throws RangeError if `index` is out of range.
   */
  get(index: number): S {
    const statement = this.items[resolveIndex(index, this.items.length)];
    if (statement === undefined) {
      throw new RangeError(`Index ${String(index)} out of range`);
    }
    return statement;
  }

  /**
   * Inserts `statement` before the one at `index`; `length` appends.
   *
   * @throws RangeError if `index` is out of range.
   * @throws ValidationError if the container does not accept the statement's kind.
   */
  insert(index: number, statement: Statement): void {
    const resolved = resolveInsertIndex(index, this.items.length);
    this.items.splice(resolved, 0, this.accept(statement));
  }

  /**
   * @throws ValidationError if the container does not accept the statement's kind.
   */
  append(statement: Statement): void {
    this.items.push(this.accept(statement));
  }

  /**
   * Replaces the statement at `index`.
   *
   * @returns The statement that was replaced.
   * @throws RangeError if `index` is out of range.
   * @throws ValidationError if the container does not accept the statement's kind.
   */
  replace(index: number, statement: Statement): S {
    const resolved = resolveIndex(index, this.items.length);
    const accepted = this.accept(statement);
    const [previous] = this.items.splice(resolved, 1, accepted);
    if (previous === undefined) {
      throw new RangeError(`Index ${String(index)} out of range`);
    }
    return previous;
  }

  /**
   * Removes and returns the statement at `index`, the last one by default.
   *
   * @throws RangeError if `index` is out of range.
   */
  pop(index = -1): S {
    const resolved = resolveIndex(index, this.items.length);
    const [removed] = this.items.splice(resolved, 1);
    if (removed === undefined) {
      throw new RangeError(`Index ${String(index)} out of range`);
    }
    return removed;
  }

  /**
   * Position of the first statement whose identifier matches `key`, or -1.
   */
  indexOf(key: Identifier | string): number {
    return this.items.findIndex((statement) => statement.identifier.equals(key));
  }

  /**
   * First statement whose identifier matches `key`, case-insensitively.
   */
  find(key: Identifier | string): S | undefined {
    const index = this.indexOf(key);
    return index === -1 ? undefined : this.items[index];
  }

  /**
   * Value of the first statement matching `key`: the assigned value of an
   * attribute, the body of a group or object.
   */
  getValue(key: Identifier | string): StatementValue | undefined {
    return this.find(key)?.value;
  }

  has(key: Identifier | string): boolean {
    return this.indexOf(key) !== -1;
  }

  /**
   * Assigns `value` to `key`.
   *
   * The statement built is an attribute for a value, a group for a group
   * body and an object for an object body. If a statement matching `key`
   * exists it is replaced where it stands; otherwise the new statement is
   * appended.
   *
   * @throws ValidationError if `key` is invalid for the statement built, or
   * the container does not accept it.
   */
  set(key: Identifier | string, value: StatementValue): void {
    const statement = buildStatement(key, value);
    const index = this.indexOf(statement.identifier);
    if (index === -1) {
      this.append(statement);
    } else {
      this.replace(index, statement);
    }
  }

  /**
   * Removes the first statement matching `key`.
   *
   * @returns Whether a statement was removed.
   */
  delete(key: Identifier | string): boolean {
    const index = this.indexOf(key);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  *[Symbol.iterator](): Iterator<S> {
    for (let i = 0; i < this.items.length; i++) {
      const statement = this.items[i];
      if (statement !== undefined) {
        yield statement;
      }
    }
  }

  /**
   * Iterates from the last statement to the first.
   */
  *reversed(): IterableIterator<S> {
    for (let i = this.items.length - 1; i >= 0; i--) {
      const statement = this.items[i];
      if (statement !== undefined) {
        yield statement;
      }
    }
  }

  /**
   * Deep copy with the same configuration.
   */
  clone(): Statements<S> {
    return new Statements(this.policy, this.items.map(cloneStatement));
  }

  /**
   * Structural equality: same configuration and pairwise equal statements.
   */
  equals(other: Statements<Statement> | GroupStatements): boolean {
    if (other.kind !== this.kind || other.length !== this.length) {
      return false;
    }
    const theirs: Statement[] = Array.from<Statement>(other);
    return this.items.every((statement, i) => {
      const counterpart = theirs[i];
      return counterpart !== undefined && statementsEqual(statement, counterpart);
    });
  }

  private accept(statement: Statement): S {
    if (!this.policy.accepts(statement)) {
      throw new ValidationError(
        'statement',
        statement.kind,
        `Invalid statement: ${this.policy.name} does not accept ${statement.kind} statements ('${statement.identifier.text}')`
      );
    }
    return statement;
  }
}

/** A top-level document. */
export type Label = Statements<Statement>;

/** The body of a group: attributes only. */
export type GroupStatements = Statements<Attribute>;

/** The body of an object: any statement. */
export type ObjectStatements = Statements<Statement>;

function isGroupBody(body: Statements<Statement> | GroupStatements): body is GroupStatements {
  return body.kind === 'group';
}

function buildStatement(key: Identifier | string, value: StatementValue): Statement {
  if (!(value instanceof Statements)) {
    return new Attribute(key, value);
  }
  if (isGroupBody(value)) {
    return new Group(key, value);
  }
  if (value.kind === 'object') {
    return new ObjectStatement(key, value);
  }
  throw new ValidationError(
    'statement value',
    value.kind,
    'Invalid statement value: a label cannot be nested in another container'
  );
}

/**
 * Deep copy of a statement.
 */
export function cloneStatement(statement: Statement): Statement {
  switch (statement.kind) {
    case 'attribute':
      return new Attribute(statement.identifier, statement.value);
    case 'group':
      return new Group(statement.identifier, statement.statements.clone());
    case 'object':
      return new ObjectStatement(statement.identifier, statement.statements.clone());
  }
}

/**
 * Structural equality of two statements, recursing into block bodies.
 */
export function statementsEqual(a: Statement, b: Statement): boolean {
  if (!a.identifier.equals(b.identifier)) {
    return false;
  }
  switch (a.kind) {
    case 'attribute':
      return b.kind === 'attribute' && valuesEqual(a.value, b.value);
    case 'group':
      return b.kind === 'group' && a.statements.equals(b.statements);
    case 'object':
      return b.kind === 'object' && a.statements.equals(b.statements);
  }
}
