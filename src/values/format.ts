/**
 * Canonical label text for every value variant.
 *
 * @packageDocumentation
 */

import { SerializationError } from '../errors/index.js';
import type { DateValue, TimeValue } from './scalars.js';
import { assertNever } from './types.js';
import type { Value } from './types.js';
import type { Units } from './units.js';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function withUnits(text: string, units: Units | undefined): string {
  return units === undefined ? text : `${text} <${units.expression}>`;
}

/**
 * Renders a real so that it always reads back as a real: `1` becomes `1.0`
 * and `1e+21` becomes `1.0e+21`.
 */
export function formatReal(value: number): string {
  const text = String(value);
  if (text.includes('.')) {
    return text;
  }
  const exponent = text.indexOf('e');
  return exponent === -1 ? `${text}.0` : `${text.slice(0, exponent)}.0${text.slice(exponent)}`;
}

/**
 * Plain decimal digits for a non-negative number, expanding the exponent
 * form `String()` uses below 1e-6.
 */
function plainDecimal(value: number): string {
  const text = String(value);
  const exponent = text.indexOf('e');
  if (exponent === -1) {
    return text;
  }
  const digits = text.slice(0, exponent).replace('.', '');
  const shift = -Number(text.slice(exponent + 1));
  return `0.${'0'.repeat(shift - 1)}${digits}`;
}

/**
 * Seconds in their shortest exact form with two integer digits:
 * `5` renders `05`, `7.25` renders `07.25`.
 */
function formatSecond(second: number): string {
  const [whole = '0', fraction] = plainDecimal(second).split('.');
  const padded = whole.padStart(2, '0');
  return fraction === undefined ? padded : `${padded}.${fraction}`;
}

export function formatDate(date: DateValue): string {
  const year = pad(date.year, 4);
  return date.month === undefined
    ? `${year}-${pad(date.day, 3)}`
    : `${year}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

export function formatTime(time: TimeValue): string {
  let text = `${pad(time.hour, 2)}:${pad(time.minute, 2)}`;
  if (time.second !== undefined) {
    text += `:${formatSecond(time.second)}`;
  }
  if (time.utc) {
    return `${text}Z`;
  }
  if (time.zoneHour !== undefined) {
    const negative = time.zoneHour < 0 || Object.is(time.zoneHour, -0);
    text += `${negative ? '-' : '+'}${pad(Math.abs(time.zoneHour), 2)}`;
    if (time.zoneMinute !== undefined) {
      text += `:${pad(time.zoneMinute, 2)}`;
    }
  }
  return text;
}

/**
 * Renders `value` as it appears to the right of `=` in a label.
 *
 * @throws SerializationError if a sequence, at any depth, has no elements.
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'integer':
      return withUnits(value.value.toString(), value.units);
    case 'based_integer':
      return withUnits(`${String(value.radix)}#${value.digits}#`, value.units);
    case 'real':
      return withUnits(formatReal(value.value), value.units);
    case 'date':
      return formatDate(value);
    case 'time':
      return formatTime(value);
    case 'date_time':
      return `${formatDate(value.date)}T${formatTime(value.time)}`;
    case 'text':
      return `"${value.value}"`;
    case 'symbol':
      return `'${value.value}'`;
    case 'identifier':
      return value.identifier.text;
    case 'set':
      return `{${Array.from(value, formatValue).join(', ')}}`;
    case 'sequence_1d':
    case 'sequence_2d':
      if (value.length === 0) {
        throw new SerializationError('Cannot render a sequence with no elements');
      }
      return `(${Array.from<Value, string>(value, formatValue).join(', ')})`;
    default:
      return assertNever(value, 'value kind');
  }
}
