/**
 * Units expressions attached to numeric values, written `<KM/SEC**2>`.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors/index.js';
import { RESERVED_WORDS } from './identifier.js';

const UNIT_NAME = '[A-Za-z](?:_?[A-Za-z0-9])*';
const FACTOR = `${UNIT_NAME}(?:\\*\\*[+-]?[0-9]+)?`;
const EXPRESSION_PATTERN = new RegExp(`^${FACTOR}(?:[*/]${FACTOR})*$`);
const UNIT_NAME_PATTERN = /[A-Za-z][A-Za-z0-9_]*/g;

/**
 * A units expression: `factor (('*' | '/') factor)*`, where a factor is a
 * unit name optionally raised to a signed integer power with `**`.
 */
export class Units {
  /** Canonical upper-case expression, without the angle brackets. */
  readonly expression: string;

  /**
   * @param expression - The expression, without angle brackets or whitespace.
   * @throws ValidationError if the expression is malformed or uses a reserved word.
   */
  constructor(expression: string) {
    if (!EXPRESSION_PATTERN.test(expression)) {
      throw new ValidationError('units expression', expression);
    }
    for (const match of expression.matchAll(UNIT_NAME_PATTERN)) {
      if (RESERVED_WORDS.has(match[0].toUpperCase())) {
        throw new ValidationError(
          'units expression',
          expression,
          `Invalid units expression: '${expression}' uses reserved word '${match[0]}'`
        );
      }
    }
    this.expression = expression.toUpperCase();
  }

  equals(other: Units | undefined): boolean {
    return other !== undefined && other.expression === this.expression;
  }

  /** The bracketed form, e.g. `<KM/SEC**2>`. */
  toString(): string {
    return `<${this.expression}>`;
  }
}

/**
 * Compares two optional units; absent equals absent.
 */
export function unitsEqual(a: Units | undefined, b: Units | undefined): boolean {
  return a === undefined ? b === undefined : a.equals(b);
}
