/**
 * Scalar value variants.
 *
 * Each constructor validates its input and is the only way a scalar comes
 * into existence, so a scalar held by the model is always valid. Scalars are
 * immutable.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors/index.js';
import { formatValue } from './format.js';
import { Identifier } from './identifier.js';
import type { Units } from './units.js';

const INTEGER_PATTERN = /^[+-]?[0-9]+$/;
const BASED_DIGITS_PATTERN = /^([+-]?)([0-9A-Za-z]+)$/;
const REAL_PATTERN = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;
const TEXT_PATTERN = /^[\x00-\x21\x23-\x7f]*$/;
const SYMBOL_PATTERN = /^[\x20-\x26\x28-\x7e]+$/;

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

function requireInteger(value: number, subject: string, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(
      subject,
      String(value),
      `Invalid ${subject}: ${String(value)} is not an integer between ${String(min)} and ${String(max)}`
    );
  }
  return value;
}

/**
 * Whether `year` has a 29th of February in the proleptic Gregorian calendar.
 */
export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

/**
 * Number of days in `month` (1-12) of `year`.
 */
export function daysInMonth(year: number, month: number): number {
  const days = MONTH_DAYS[month - 1] ?? 0;
  return month === 2 && isLeapYear(year) ? days + 1 : days;
}

/**
 * A signed integer of arbitrary size, optionally with units.
 */
export class IntegerValue {
  readonly kind = 'integer';
  readonly value: bigint;
  readonly units: Units | undefined;

  /**
   * @param value - A bigint, a safe integer, or decimal digits with an optional sign.
   * @param units - Optional units.
   */
  constructor(value: bigint | number | string, units?: Units) {
    if (typeof value === 'bigint') {
      this.value = value;
    } else if (typeof value === 'number') {
      if (!Number.isSafeInteger(value)) {
        throw new ValidationError('integer', String(value));
      }
      this.value = BigInt(value);
    } else {
      if (!INTEGER_PATTERN.test(value)) {
        throw new ValidationError('integer', value);
      }
      this.value = BigInt(value);
    }
    this.units = units;
  }

  /** The value as a JavaScript number; precision is lost past 2^53. */
  toNumber(): number {
    return Number(this.value);
  }

  toBigInt(): bigint {
    return this.value;
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * An integer written in an explicit radix, `radix#digits#`.
 *
 * The digit text is kept exactly as given so that it renders back unchanged;
 * the base-10 value is derived once, at construction.
 */
export class BasedIntegerValue {
  readonly kind = 'based_integer';
  readonly radix: number;
  /** Digits as written, including any sign and original letter case. */
  readonly digits: string;
  /** Base-10 value of `digits` in `radix`. */
  readonly value: bigint;
  readonly units: Units | undefined;

  /**
   * @param radix - Base between 2 and 16.
   * @param digits - Digits valid for `radix`, with an optional leading sign.
   * @param units - Optional units.
   * @throws ValidationError if the radix is out of range or a digit is not valid for it.
   */
  constructor(radix: number, digits: string, units?: Units) {
    this.radix = requireInteger(radix, 'radix', 2, 16);
    const match = BASED_DIGITS_PATTERN.exec(digits);
    const sign = match?.[1];
    const body = match?.[2];
    if (sign === undefined || body === undefined) {
      throw new ValidationError('based integer digits', digits);
    }
    const base = BigInt(radix);
    let magnitude = 0n;
    for (const ch of body) {
      const digit = Number.parseInt(ch, 36);
      if (digit >= radix) {
        throw new ValidationError(
          'based integer digits',
          digits,
          `Invalid based integer digits: '${ch}' is not a base-${String(radix)} digit in '${digits}'`
        );
      }
      magnitude = magnitude * base + BigInt(digit);
    }
    this.digits = digits;
    this.value = sign === '-' ? -magnitude : magnitude;
    this.units = units;
  }

  toNumber(): number {
    return Number(this.value);
  }

  toBigInt(): bigint {
    return this.value;
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * A finite floating-point value, optionally with units.
 */
export class RealValue {
  readonly kind = 'real';
  readonly value: number;
  readonly units: Units | undefined;

  /**
   * @param value - A finite number, or its decimal text (`1.`, `.5`, `-2.5E3`, ...).
   * @param units - Optional units.
   */
  constructor(value: number | string, units?: Units) {
    let numeric: number;
    if (typeof value === 'string') {
      if (!REAL_PATTERN.test(value)) {
        throw new ValidationError('real', value);
      }
      numeric = Number(value);
    } else {
      numeric = value;
    }
    if (!Number.isFinite(numeric)) {
      throw new ValidationError('real', String(value), `Invalid real: '${String(value)}' is not finite`);
    }
    this.value = numeric;
    this.units = units;
  }

  toNumber(): number {
    return this.value;
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * A calendar date, either year-month-day or year-day-of-year.
 *
 * In the day-of-year form `month` is undefined and `day` counts from the
 * first of January.
 */
export class DateValue {
  readonly kind = 'date';
  readonly year: number;
  readonly month: number | undefined;
  readonly day: number;

  /**
   * @param year - Non-negative year.
   * @param month - Month 1-12, or undefined for the day-of-year form.
   * @param day - Day of the month, or day of the year when `month` is undefined.
   */
  constructor(year: number, month: number | undefined, day: number) {
    this.year = requireInteger(year, 'year', 0, Number.MAX_SAFE_INTEGER);
    if (month === undefined) {
      this.month = undefined;
      this.day = requireInteger(day, 'day of year', 1, isLeapYear(year) ? 366 : 365);
    } else {
      this.month = requireInteger(month, 'month', 1, 12);
      this.day = requireInteger(day, 'day of month', 1, daysInMonth(year, month));
    }
  }

  /** True for the year-day-of-year form. */
  get isDayOfYear(): boolean {
    return this.month === undefined;
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * Fields accepted by {@link TimeValue}.
 */
export interface TimeFields {
  readonly hour: number;
  readonly minute: number;
  /** Seconds, possibly fractional. */
  readonly second?: number | undefined;
  /** Universal time. Takes precedence over a zone offset. */
  readonly utc?: boolean | undefined;
  /** Zone offset hours, -12 to 12. */
  readonly zoneHour?: number | undefined;
  /** Zone offset minutes; only meaningful with `zoneHour`. */
  readonly zoneMinute?: number | undefined;
}

/** How a time relates to a time zone. */
export type TimeZoneKind = 'local' | 'utc' | 'offset';

/**
 * A time of day: local, UTC, or at a zone offset.
 */
export class TimeValue {
  readonly kind = 'time';
  readonly hour: number;
  readonly minute: number;
  readonly second: number | undefined;
  readonly utc: boolean;
  readonly zoneHour: number | undefined;
  readonly zoneMinute: number | undefined;

  /**
   * @throws ValidationError if a field is out of range, or a zone minute is
   * given without a zone hour.
   */
  constructor(fields: TimeFields) {
    this.hour = requireInteger(fields.hour, 'hour', 0, 23);
    this.minute = requireInteger(fields.minute, 'minute', 0, 59);
    if (fields.second !== undefined) {
      if (!Number.isFinite(fields.second) || fields.second < 0 || fields.second >= 60) {
        throw new ValidationError(
          'second',
          String(fields.second),
          `Invalid second: ${String(fields.second)} is not between 0 and 60`
        );
      }
    }
    this.second = fields.second;
    this.utc = fields.utc ?? false;

    if (this.utc) {
      this.zoneHour = undefined;
      this.zoneMinute = undefined;
      return;
    }
    if (fields.zoneHour === undefined) {
      if (fields.zoneMinute !== undefined) {
        throw new ValidationError(
          'zone minute',
          String(fields.zoneMinute),
          'Invalid zone minute: a zone minute requires a zone hour'
        );
      }
      this.zoneHour = undefined;
      this.zoneMinute = undefined;
      return;
    }
    this.zoneHour = requireInteger(fields.zoneHour, 'zone hour', -12, 12);
    this.zoneMinute =
      fields.zoneMinute === undefined
        ? undefined
        : requireInteger(fields.zoneMinute, 'zone minute', 0, 59);
  }

  get zone(): TimeZoneKind {
    if (this.utc) {
      return 'utc';
    }
    return this.zoneHour === undefined ? 'local' : 'offset';
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * A date and a time, written `date T time`.
 */
export class DateTimeValue {
  readonly kind = 'date_time';
  readonly date: DateValue;
  readonly time: TimeValue;

  constructor(date: DateValue, time: TimeValue) {
    this.date = date;
    this.time = time;
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * Quoted text. Any ASCII except the double quote, line breaks included.
 */
export class TextValue {
  readonly kind = 'text';
  readonly value: string;

  constructor(value: string) {
    if (!TEXT_PATTERN.test(value)) {
      throw new ValidationError(
        'text',
        value,
        'Invalid text: only ASCII characters other than \'"\' are allowed'
      );
    }
    this.value = value;
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * A quoted symbol. Printable ASCII except the apostrophe, upper-cased.
 */
export class SymbolValue {
  readonly kind = 'symbol';
  readonly value: string;

  constructor(value: string) {
    if (!SYMBOL_PATTERN.test(value)) {
      throw new ValidationError('symbol', value);
    }
    this.value = value.toUpperCase();
  }

  toString(): string {
    return formatValue(this);
  }
}

/**
 * A bare identifier used as a value, e.g. `TARGET_NAME = MARS`.
 */
export class IdentifierValue {
  readonly kind = 'identifier';
  readonly identifier: Identifier;

  /**
   * @throws ValidationError if the identifier is invalid or carries a
   * namespace or pointer marker.
   */
  constructor(identifier: Identifier | string) {
    const id = Identifier.from(identifier);
    if (!id.isPlain) {
      throw new ValidationError('identifier value', id.text);
    }
    this.identifier = id;
  }

  /** Canonical upper-case text of the identifier. */
  get value(): string {
    return this.identifier.text;
  }

  toString(): string {
    return formatValue(this);
  }
}
