/**
 * Character classes of the label grammar, over single ASCII byte values.
 *
 * @packageDocumentation
 */

/** Byte values of the punctuation the grammar uses. */
export const CHAR = {
  TAB: 0x09,
  LF: 0x0a,
  VT: 0x0b,
  FF: 0x0c,
  CR: 0x0d,
  SPACE: 0x20,
  DOUBLE_QUOTE: 0x22,
  HASH: 0x23,
  APOSTROPHE: 0x27,
  OPEN_PAREN: 0x28,
  CLOSE_PAREN: 0x29,
  ASTERISK: 0x2a,
  PLUS: 0x2b,
  COMMA: 0x2c,
  MINUS: 0x2d,
  DOT: 0x2e,
  SLASH: 0x2f,
  COLON: 0x3a,
  LESS_THAN: 0x3c,
  EQUALS: 0x3d,
  GREATER_THAN: 0x3e,
  CIRCUMFLEX: 0x5e,
  UNDERSCORE: 0x5f,
  OPEN_BRACE: 0x7b,
  CLOSE_BRACE: 0x7d,
} as const;

export function isDigit(c: number | undefined): boolean {
  return c !== undefined && c >= 0x30 && c <= 0x39;
}

export function isLetter(c: number | undefined): boolean {
  return c !== undefined && ((c >= 0x41 && c <= 0x5a) || (c >= 0x61 && c <= 0x7a));
}

export function isAlphanumeric(c: number | undefined): boolean {
  return isLetter(c) || isDigit(c);
}

/** Letters, digits and underscore: the characters an identifier word is made of. */
export function isWordChar(c: number | undefined): boolean {
  return isAlphanumeric(c) || c === CHAR.UNDERSCORE;
}

/** Printable ASCII, space through tilde. */
export function isPrintableAscii(c: number | undefined): boolean {
  return c !== undefined && c >= 0x20 && c <= 0x7e;
}

/** Space, horizontal tab, line feed, vertical tab, form feed and carriage return. */
export function isWhitespace(c: number | undefined): boolean {
  return (
    c === CHAR.SPACE ||
    c === CHAR.TAB ||
    c === CHAR.LF ||
    c === CHAR.VT ||
    c === CHAR.FF ||
    c === CHAR.CR
  );
}

/** Line terminators; a comment may not span one. */
export function isLineBreak(c: number | undefined): boolean {
  return c === CHAR.LF || c === CHAR.CR || c === CHAR.VT || c === CHAR.FF;
}

export function isSign(c: number | undefined): boolean {
  return c === CHAR.PLUS || c === CHAR.MINUS;
}
