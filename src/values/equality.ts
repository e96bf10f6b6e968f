/**
 * Structural equality and copying of values.
 *
 * @packageDocumentation
 */

import type { DateValue, TimeValue } from './scalars.js';
import { assertNever } from './types.js';
import type { Value } from './types.js';
import { unitsEqual } from './units.js';

function datesEqual(a: DateValue, b: DateValue): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

function timesEqual(a: TimeValue, b: TimeValue): boolean {
  return (
    a.hour === b.hour &&
    a.minute === b.minute &&
    a.second === b.second &&
    a.utc === b.utc &&
    a.zoneHour === b.zoneHour &&
    a.zoneMinute === b.zoneMinute
  );
}

/**
 * Whether two values are the same variant with the same contents.
 *
 * Sets compare as sets, ignoring member order; sequences compare element by
 * element. Based integers compare by radix and digit text, so `16#ff#` and
 * `16#FF#` differ even though their values agree.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'integer':
      return b.kind === 'integer' && a.value === b.value && unitsEqual(a.units, b.units);
    case 'based_integer':
      return (
        b.kind === 'based_integer' &&
        a.radix === b.radix &&
        a.digits === b.digits &&
        unitsEqual(a.units, b.units)
      );
    case 'real':
      return b.kind === 'real' && a.value === b.value && unitsEqual(a.units, b.units);
    case 'date':
      return b.kind === 'date' && datesEqual(a, b);
    case 'time':
      return b.kind === 'time' && timesEqual(a, b);
    case 'date_time':
      return b.kind === 'date_time' && datesEqual(a.date, b.date) && timesEqual(a.time, b.time);
    case 'text':
      return b.kind === 'text' && a.value === b.value;
    case 'symbol':
      return b.kind === 'symbol' && a.value === b.value;
    case 'identifier':
      return b.kind === 'identifier' && a.identifier.equals(b.identifier);
    case 'set': {
      if (b.kind !== 'set' || a.size !== b.size) {
        return false;
      }
      const other = b;
      return Array.from(a).every((member) => other.has(member));
    }
    case 'sequence_1d':
    case 'sequence_2d': {
      if (
        (b.kind !== 'sequence_1d' && b.kind !== 'sequence_2d') ||
        b.kind !== a.kind ||
        a.length !== b.length
      ) {
        return false;
      }
      const left: Value[] = Array.from<Value>(a);
      const right: Value[] = Array.from<Value>(b);
      return left.every((item, i) => {
        const other = right[i];
        return other !== undefined && valuesEqual(item, other);
      });
    }
    default:
      return assertNever(a, 'value kind');
  }
}

/**
 * Copies `value` so that the copy can be mutated independently. Scalars are
 * immutable and returned as is.
 */
export function cloneValue(value: Value): Value {
  switch (value.kind) {
    case 'set':
    case 'sequence_1d':
    case 'sequence_2d':
      return value.clone();
    default:
      return value;
  }
}
