/**
 * Value model: identifiers, units, scalars and composite values.
 *
 * @packageDocumentation
 */

export { Identifier, RESERVED_WORDS, isIdentifierWord } from './identifier.js';
export type { IdentifierParts } from './identifier.js';
export { Units, unitsEqual } from './units.js';
export {
  BasedIntegerValue,
  DateTimeValue,
  DateValue,
  IdentifierValue,
  IntegerValue,
  RealValue,
  SymbolValue,
  TextValue,
  TimeValue,
  daysInMonth,
  isLeapYear,
} from './scalars.js';
export type { TimeFields, TimeZoneKind } from './scalars.js';
export { Sequence1D, Sequence2D, SetValue } from './collections.js';
export { cloneValue, valuesEqual } from './equality.js';
export { formatDate, formatReal, formatTime, formatValue } from './format.js';
export { assertNever, isScalar, isSetMember } from './types.js';
export type {
  NumericValue,
  Scalar,
  ScalarKind,
  SetMember,
  TemporalValue,
  Value,
  ValueKind,
} from './types.js';
