/**
 * The closed set of label value variants.
 *
 * Every variant carries a `kind` discriminant; code that handles values
 * switches on it exhaustively.
 *
 * @packageDocumentation
 */

import type { Sequence1D, Sequence2D, SetValue } from './collections.js';
import type {
  BasedIntegerValue,
  DateTimeValue,
  DateValue,
  IdentifierValue,
  IntegerValue,
  RealValue,
  SymbolValue,
  TextValue,
  TimeValue,
} from './scalars.js';

/** Numeric scalars; these may carry units. */
export type NumericValue = IntegerValue | BasedIntegerValue | RealValue;

/** Calendar and clock scalars. */
export type TemporalValue = DateValue | TimeValue | DateTimeValue;

/** Any single, non-composite value. */
export type Scalar = NumericValue | TemporalValue | TextValue | SymbolValue | IdentifierValue;

/** Values a set may hold. */
export type SetMember = IntegerValue | SymbolValue;

/** Any value an attribute can be assigned. */
export type Value = Scalar | SetValue | Sequence1D | Sequence2D;

/** Discriminant of every value variant. */
export type ValueKind = Value['kind'];

/** Discriminant of the scalar variants. */
export type ScalarKind = Scalar['kind'];

const SCALAR_KINDS: ReadonlySet<string> = new Set<ScalarKind>([
  'integer',
  'based_integer',
  'real',
  'date',
  'time',
  'date_time',
  'text',
  'symbol',
  'identifier',
]);

export function isScalar(value: Value): value is Scalar {
  return SCALAR_KINDS.has(value.kind);
}

export function isSetMember(value: Value): value is SetMember {
  return value.kind === 'integer' || value.kind === 'symbol';
}

/**
 * Fails compilation when a switch over a discriminant is not exhaustive.
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${String(value)}`);
}
