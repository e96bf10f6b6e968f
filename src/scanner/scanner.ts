/**
 * Cursor over a random-access byte range.
 *
 * The scanner never throws: every match method either consumes input and
 * reports what it consumed, or leaves the cursor untouched and reports no
 * match. Whether a missing match is fatal is the parser's decision.
 *
 * @packageDocumentation
 */

import { CHAR, isLetter, isLineBreak, isWhitespace, isWordChar } from './chars.js';

/**
 * Any randomly addressable sequence of byte values.
 *
 * `Uint8Array`, `Buffer` and views over a mapped file all satisfy it; the
 * scanner reads through it without copying.
 */
export interface ByteSource {
  readonly length: number;
  readonly [index: number]: number;
}

/**
 * 1-based line and column of a byte offset.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
}

/** Longest lexeme quoted back in error messages. */
const MAX_LEXEME_LENGTH = 32;

/**
 * Scanner over a {@link ByteSource}.
 *
 * @example
 * ```typescript
 * const scanner = new Scanner(new TextEncoder().encode('  NAME = 1'));
 * scanner.skipInsignificant();
 * scanner.readWord(); // 'NAME'
 * ```
 */
export class Scanner {
  private cursor: number;

  /**
   * @param source - Bytes to scan.
   * @param start - Initial cursor offset.
   */
  constructor(
    private readonly source: ByteSource,
    start = 0
  ) {
    this.cursor = start;
  }

  /** Current byte offset. */
  get position(): number {
    return this.cursor;
  }

  /** Moves the cursor to an absolute offset, for lookahead that must be undone. */
  seek(position: number): void {
    this.cursor = Math.max(0, Math.min(position, this.source.length));
  }

  atEnd(): boolean {
    return this.cursor >= this.source.length;
  }

  /**
   * Byte at `offset` past the cursor, or undefined past the end.
   */
  peek(offset = 0): number | undefined {
    const index = this.cursor + offset;
    if (index < 0 || index >= this.source.length) {
      return undefined;
    }
    return this.source[index];
  }

  advance(count = 1): void {
    this.seek(this.cursor + count);
  }

  /**
   * Skips whitespace and `/* ... *\/` comments.
   *
   * @returns `false` if a comment is not closed before the end of its line;
   * the cursor is then left on the comment's opening slash.
   */
  skipInsignificant(): boolean {
    for (;;) {
      while (isWhitespace(this.peek())) {
        this.cursor++;
      }
      if (this.peek() !== CHAR.SLASH || this.peek(1) !== CHAR.ASTERISK) {
        return true;
      }
      const close = this.findCommentEnd(this.cursor + 2);
      if (close === -1) {
        return false;
      }
      this.cursor = close + 2;
    }
  }

  /**
   * Consumes `byte` if it is next.
   */
  matchByte(byte: number): boolean {
    if (this.peek() !== byte) {
      return false;
    }
    this.cursor++;
    return true;
  }

  /**
   * Consumes the next byte if it is either of the letter's cases.
   *
   * @param letter - A single ASCII letter.
   */
  matchLetter(letter: string): boolean {
    const c = this.peek();
    if (c === undefined) {
      return false;
    }
    const ch = String.fromCharCode(c);
    if (ch.toUpperCase() !== letter.toUpperCase()) {
      return false;
    }
    this.cursor++;
    return true;
  }

  /**
   * Consumes `literal` if the input continues with it, byte for byte.
   */
  matchLiteral(literal: string): boolean {
    for (let i = 0; i < literal.length; i++) {
      if (this.peek(i) !== literal.charCodeAt(i)) {
        return false;
      }
    }
    this.cursor += literal.length;
    return true;
  }

  /**
   * Consumes the longest run of bytes satisfying `predicate`.
   *
   * @returns The consumed text, empty when nothing matched.
   */
  readWhile(predicate: (c: number | undefined) => boolean): string {
    const start = this.cursor;
    while (!this.atEnd() && predicate(this.peek())) {
      this.cursor++;
    }
    return this.text(start, this.cursor);
  }

  /**
   * Consumes a word: a letter followed by letters, digits and underscores.
   * Whether the word is a valid identifier is checked by the model.
   */
  readWord(): string | undefined {
    if (!isLetter(this.peek())) {
      return undefined;
    }
    return this.readWhile(isWordChar);
  }

  /**
   * Offset of the next occurrence of `byte` at or after `from`, or -1.
   */
  indexOf(byte: number, from = this.cursor): number {
    for (let i = from; i < this.source.length; i++) {
      if (this.source[i] === byte) {
        return i;
      }
    }
    return -1;
  }

  /**
   * Decodes `[start, end)` one byte per character. Bytes above 0x7f come
   * through as their Latin-1 characters so that validation can reject them.
   */
  text(start: number, end: number): string {
    const from = Math.max(0, start);
    const to = Math.min(end, this.source.length);
    let out = '';
    for (let i = from; i < to; i++) {
      out += String.fromCharCode(this.source[i] ?? 0);
    }
    return out;
  }

  /**
   * The token at `position`, as quoted in error messages: a word or number
   * run, or the single byte found there. Empty at end of input.
   */
  lexemeAt(position: number = this.cursor): string {
    if (position >= this.source.length) {
      return '';
    }
    let end = position;
    while (
      end < this.source.length &&
      end - position < MAX_LEXEME_LENGTH &&
      isWordChar(this.source[end])
    ) {
      end++;
    }
    if (end === position) {
      end = position + 1;
    }
    return this.text(position, end);
  }

  /**
   * Line and column of `position`, counting LF (and lone CR) as line breaks.
   */
  locate(position: number = this.cursor): SourceLocation {
    let line = 1;
    let lineStart = 0;
    const end = Math.min(position, this.source.length);
    for (let i = 0; i < end; i++) {
      const c = this.source[i];
      if (c === CHAR.LF || (c === CHAR.CR && this.source[i + 1] !== CHAR.LF)) {
        line++;
        lineStart = i + 1;
      }
    }
    return { line, column: position - lineStart + 1 };
  }

  private findCommentEnd(from: number): number {
    for (let i = from; i < this.source.length; i++) {
      const c = this.source[i];
      if (isLineBreak(c)) {
        return -1;
      }
      if (c === CHAR.ASTERISK && this.source[i + 1] === CHAR.SLASH) {
        return i;
      }
    }
    return -1;
  }
}
