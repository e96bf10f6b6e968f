/**
 * Identifiers name statements and can also appear as bare values.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors/index.js';

/**
 * Words the grammar reserves for statement structure. None of them can name
 * an attribute, a block, a namespace or a unit.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'END',
  'GROUP',
  'BEGIN_GROUP',
  'END_GROUP',
  'OBJECT',
  'BEGIN_OBJECT',
  'END_OBJECT',
]);

/**
 * A letter followed by letters and digits, each optionally preceded by a
 * single underscore. Rules out trailing and doubled underscores.
 */
const WORD_PATTERN = /^[A-Za-z](?:_?[A-Za-z0-9])*$/;

/**
 * Tests whether `word` is a syntactically valid, non-reserved identifier
 * word (no namespace, no pointer marker).
 */
export function isIdentifierWord(word: string): boolean {
  return WORD_PATTERN.test(word) && !RESERVED_WORDS.has(word.toUpperCase());
}

function validateWord(word: string, subject: string): string {
  if (!WORD_PATTERN.test(word)) {
    throw new ValidationError(subject, word);
  }
  const upper = word.toUpperCase();
  if (RESERVED_WORDS.has(upper)) {
    throw new ValidationError(subject, word, `Invalid ${subject}: '${word}' is a reserved word`);
  }
  return upper;
}

/**
 * Parts of an identifier.
 */
export interface IdentifierParts {
  /** The identifier word itself. */
  readonly name: string;
  /** Optional namespace written before a colon. */
  readonly namespace?: string | undefined;
  /** Whether the identifier carries the `^` pointer marker. */
  readonly pointer?: boolean | undefined;
}

/**
 * A case-folded identifier, optionally namespaced (`NS:NAME`) and/or marked
 * as a pointer (`^NAME`).
 *
 * Construction validates and upper-cases every part, so comparing canonical
 * text is a case-insensitive comparison of what the caller wrote.
 *
 * @example
 * ```typescript
 * const id = Identifier.parse('^ctx:image');
 * id.text;      // '^CTX:IMAGE'
 * id.pointer;   // true
 * id.namespace; // 'CTX'
 * ```
 */
export class Identifier {
  /** Canonical upper-case text, including any pointer marker and namespace. */
  readonly text: string;
  /** Upper-case identifier word. */
  readonly name: string;
  /** Upper-case namespace, if any. */
  readonly namespace: string | undefined;
  /** Whether the identifier is a pointer (`^`). */
  readonly pointer: boolean;

  /**
   * @param parts - Identifier word and optional namespace and pointer flag.
   * @throws ValidationError if any part is not a valid, non-reserved word.
   */
  constructor(parts: IdentifierParts) {
    this.name = validateWord(parts.name, 'identifier');
    this.namespace =
      parts.namespace === undefined ? undefined : validateWord(parts.namespace, 'namespace');
    this.pointer = parts.pointer ?? false;
    this.text = `${this.pointer ? '^' : ''}${
      this.namespace === undefined ? '' : `${this.namespace}:`
    }${this.name}`;
  }

  /**
   * Parses the written form `[^][namespace:]name`.
   *
   * @throws ValidationError if `text` is not a valid identifier.
   */
  static parse(text: string): Identifier {
    const pointer = text.startsWith('^');
    const body = pointer ? text.slice(1) : text;
    const parts = body.split(':');
    if (parts.length === 1 && parts[0] !== undefined) {
      return new Identifier({ name: parts[0], pointer });
    }
    if (parts.length === 2 && parts[0] !== undefined && parts[1] !== undefined) {
      return new Identifier({ namespace: parts[0], name: parts[1], pointer });
    }
    throw new ValidationError('identifier', text);
  }

  /**
   * Coerces a string or identifier into an identifier.
   */
  static from(value: Identifier | string): Identifier {
    return value instanceof Identifier ? value : Identifier.parse(value);
  }

  /** True when there is neither a namespace nor a pointer marker. */
  get isPlain(): boolean {
    return !this.pointer && this.namespace === undefined;
  }

  /**
   * Case-insensitive comparison with another identifier or written form.
   */
  equals(other: Identifier | string): boolean {
    return typeof other === 'string'
      ? this.text === other.toUpperCase()
      : this.text === other.text;
  }

  toString(): string {
    return this.text;
  }
}
