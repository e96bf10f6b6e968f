/**
 * Recursive-descent parser for label text.
 *
 * Parsing is all-or-nothing: the first problem aborts the whole parse with a
 * {@link ParseError} and no partial label is returned. Bytes after the
 * terminating `END` statement are never read, so a label may be followed by
 * any payload.
 *
 * @packageDocumentation
 */

import { ParseError, ValidationError } from '../errors/index.js';
import type { ParseErrorCode } from '../errors/index.js';
import {
  CHAR,
  Scanner,
  isAlphanumeric,
  isDigit,
  isLetter,
  isPrintableAscii,
  isSign,
} from '../scanner/index.js';
import type { ByteSource } from '../scanner/index.js';
import { Attribute, Group, ObjectStatement, Statements } from '../statements/index.js';
import type { GroupStatements, Label, Statement } from '../statements/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import {
  BasedIntegerValue,
  DateTimeValue,
  DateValue,
  Identifier,
  IdentifierValue,
  IntegerValue,
  RealValue,
  Sequence1D,
  Sequence2D,
  SetValue,
  SymbolValue,
  TextValue,
  TimeValue,
  Units,
  isSetMember,
} from '../values/index.js';
import type { IdentifierParts, Scalar, SetMember, Value } from '../values/index.js';

/**
 * Options for {@link parse} and {@link safeParse}.
 */
export interface ParseOptions {
  /** Receives `label_parsed` and `label_parse_failed` debug events. */
  readonly logger?: Logger;
}

/**
 * Outcome of {@link safeParse}.
 */
export type ParseResult =
  | {
      readonly success: true;
      readonly label: Label;
      /** Byte offset just past the `END` keyword; the payload, if any, follows. */
      readonly end: number;
    }
  | {
      readonly success: false;
      readonly error: ParseError;
    };

type BlockKind = 'group' | 'object';
type Terminator = 'END' | 'END_GROUP' | 'END_OBJECT';

const BLOCK_OPENERS: ReadonlyMap<string, BlockKind> = new Map<string, BlockKind>([
  ['GROUP', 'group'],
  ['BEGIN_GROUP', 'group'],
  ['OBJECT', 'object'],
  ['BEGIN_OBJECT', 'object'],
]);

const TERMINATORS: ReadonlySet<string> = new Set<Terminator>(['END', 'END_GROUP', 'END_OBJECT']);

/** Longest literal text quoted back in an error. */
const MAX_LITERAL_LENGTH = 64;

function isExponentMarker(c: number | undefined): boolean {
  return c === 0x45 || c === 0x65;
}

class LabelParser {
  private readonly scanner: Scanner;

  constructor(source: ByteSource) {
    this.scanner = new Scanner(source);
  }

  get position(): number {
    return this.scanner.position;
  }

  parseLabel(): Label {
    const label = Statements.label();
    this.parseBody(label, 'END');
    return label;
  }

  /**
   * Parses statements into `container` until the `terminator` keyword, which
   * is consumed.
   */
  private parseBody(container: Statements<Statement> | GroupStatements, terminator: Terminator): void {
    for (;;) {
      this.skip();
      const start = this.scanner.position;
      if (this.scanner.atEnd()) {
        throw this.error('unexpected_end', `Unexpected end of input, expected ${terminator}`, start);
      }

      let statement: Statement;
      if (this.scanner.matchByte(CHAR.CIRCUMFLEX)) {
        statement = this.parseAttribute(this.expectWord('an identifier after \'^\''), true, start);
      } else {
        const word = this.scanner.readWord();
        if (word === undefined) {
          throw this.error(
            'expected_token',
            `Expected a statement instead of '${this.scanner.lexemeAt(start)}'`,
            start
          );
        }
        const keyword = word.toUpperCase();
        if (keyword === terminator) {
          return;
        }
        if (TERMINATORS.has(keyword)) {
          throw this.error('mismatched_block', `Expected ${terminator} instead of '${word}'`, start);
        }
        const block = BLOCK_OPENERS.get(keyword);
        statement =
          block === undefined ? this.parseAttribute(word, false, start) : this.parseBlock(block);
      }

      try {
        container.append(statement);
      } catch (error) {
        throw this.wrap(error, 'invalid_statement', start);
      }
    }
  }

  private parseAttribute(word: string, pointer: boolean, start: number): Attribute {
    const parts: { name: string; namespace?: string; pointer: boolean } = { name: word, pointer };
    if (this.scanner.matchByte(CHAR.COLON)) {
      parts.namespace = word;
      parts.name = this.expectWord("an identifier after ':'");
    }
    const identifier = this.identifier(parts, start);
    this.expectEquals();
    return new Attribute(identifier, this.parseValue());
  }

  private parseBlock(kind: BlockKind): Statement {
    this.expectEquals();
    this.skip();
    const nameStart = this.scanner.position;
    const identifier = this.identifier({ name: this.expectWord('a block name') }, nameStart);

    if (kind === 'group') {
      const body = Statements.group();
      this.parseBody(body, 'END_GROUP');
      this.parseBlockEnd(identifier, 'END_GROUP');
      return new Group(identifier, body);
    }
    const body = Statements.object();
    this.parseBody(body, 'END_OBJECT');
    this.parseBlockEnd(identifier, 'END_OBJECT');
    return new ObjectStatement(identifier, body);
  }

  /**
   * Checks the optional `= NAME` after a block terminator against the name
   * the block was opened with.
   */
  private parseBlockEnd(identifier: Identifier, terminator: 'END_GROUP' | 'END_OBJECT'): void {
    this.skip();
    if (!this.scanner.matchByte(CHAR.EQUALS)) {
      return;
    }
    this.skip();
    const start = this.scanner.position;
    const name = this.expectWord(`a name after ${terminator}`);
    if (!identifier.equals(name)) {
      throw this.error(
        'mismatched_block',
        `${terminator} name '${name}' does not match '${identifier.text}'`,
        start
      );
    }
  }

  private parseValue(): Value {
    this.skip();
    const c = this.scanner.peek();
    if (c === CHAR.OPEN_PAREN) {
      return this.parseSequence();
    }
    if (c === CHAR.OPEN_BRACE) {
      return this.parseSet();
    }
    return this.parseScalar();
  }

  /**
   * A parenthesised sequence; two-dimensional when its first element is
   * itself parenthesised.
   */
  private parseSequence(): Sequence1D | Sequence2D {
    const open = this.scanner.position;
    this.scanner.advance();
    this.skip();
    const nested = this.scanner.peek() === CHAR.OPEN_PAREN;
    if (!nested) {
      this.scanner.seek(open);
      return this.parseSequence1D();
    }

    const rows: Sequence1D[] = [];
    this.parseList(CHAR.CLOSE_PAREN, ')', false, () => {
      this.skip();
      if (this.scanner.peek() !== CHAR.OPEN_PAREN) {
        throw this.unexpected("'('");
      }
      rows.push(this.parseSequence1D());
    });
    return new Sequence2D(rows);
  }

  private parseSequence1D(): Sequence1D {
    this.scanner.advance();
    const items: Scalar[] = [];
    this.parseList(CHAR.CLOSE_PAREN, ')', false, () => {
      items.push(this.parseScalar());
    });
    return new Sequence1D(items);
  }

  private parseSet(): SetValue {
    this.scanner.advance();
    const members: SetMember[] = [];
    this.parseList(CHAR.CLOSE_BRACE, '}', true, () => {
      this.skip();
      const start = this.scanner.position;
      const member = this.parseScalar();
      if (!isSetMember(member)) {
        throw this.error(
          'expected_token',
          `Expected an integer or symbol in a set instead of '${this.literal(start)}'`,
          start
        );
      }
      members.push(member);
    });
    return new SetValue(members);
  }

  /**
   * Comma-separated items up to `close`, which is consumed.
   */
  private parseList(close: number, closeText: string, allowEmpty: boolean, parseItem: () => void): void {
    this.skip();
    if (allowEmpty && this.scanner.matchByte(close)) {
      return;
    }
    for (;;) {
      parseItem();
      this.skip();
      if (this.scanner.matchByte(close)) {
        return;
      }
      if (!this.scanner.matchByte(CHAR.COMMA)) {
        throw this.unexpected(`',' or '${closeText}'`);
      }
    }
  }

  private parseScalar(): Scalar {
    this.skip();
    const c = this.scanner.peek();
    if (c === CHAR.DOUBLE_QUOTE) {
      return this.parseQuoted(CHAR.DOUBLE_QUOTE, 'text', (content) => new TextValue(content));
    }
    if (c === CHAR.APOSTROPHE) {
      return this.parseQuoted(
        CHAR.APOSTROPHE,
        'symbol',
        (content) => new SymbolValue(content),
        isPrintableAscii
      );
    }
    if (isLetter(c)) {
      const start = this.scanner.position;
      const word = this.expectWord('a value');
      return this.construct(() => new IdentifierValue(word), start);
    }
    if (isDigit(c) || isSign(c) || c === CHAR.DOT) {
      return this.parseNumericOrTemporal();
    }
    throw this.unexpected('a value');
  }

  private parseQuoted<T extends Scalar>(
    quote: number,
    what: string,
    build: (content: string) => T,
    accepts?: (c: number | undefined) => boolean
  ): T {
    const start = this.scanner.position;
    const close = this.scanner.indexOf(quote, start + 1);
    if (close === -1) {
      throw this.error('unexpected_end', `Unterminated ${what}`, start);
    }
    if (accepts !== undefined) {
      for (let offset = 1; start + offset < close; offset++) {
        if (!accepts(this.scanner.peek(offset))) {
          throw this.error('malformed_literal', `Invalid character in ${what}`, start + offset);
        }
      }
    }
    const content = this.scanner.text(start + 1, close);
    this.scanner.seek(close + 1);
    return this.construct(() => build(content), start);
  }

  /**
   * Integers, based integers, reals, dates, times and date-times all start
   * with a digit (or a sign or dot for the numeric forms). The byte after
   * the leading digit run decides which one is being read.
   */
  private parseNumericOrTemporal(): Scalar {
    const start = this.scanner.position;
    const sign = isSign(this.scanner.peek()) ? this.scanner.text(start, start + 1) : '';
    this.scanner.advance(sign.length);
    const whole = this.scanner.readWhile(isDigit);
    const next = this.scanner.peek();

    if (whole !== '') {
      if (next === CHAR.HASH) {
        return this.parseBasedInteger(sign, whole, start);
      }
      if (sign === '' && next === CHAR.MINUS && isDigit(this.scanner.peek(1))) {
        return this.parseDate(whole, start);
      }
      if (sign === '' && next === CHAR.COLON && isDigit(this.scanner.peek(1))) {
        return this.parseTime(whole, start);
      }
    }

    let real = false;
    if (this.scanner.matchByte(CHAR.DOT)) {
      this.scanner.readWhile(isDigit);
      real = true;
    }
    if (
      isExponentMarker(this.scanner.peek()) &&
      (isDigit(this.scanner.peek(1)) ||
        (isSign(this.scanner.peek(1)) && isDigit(this.scanner.peek(2))))
    ) {
      this.scanner.advance(isSign(this.scanner.peek(1)) ? 2 : 1);
      this.scanner.readWhile(isDigit);
      real = true;
    }

    const literal = this.scanner.text(start, this.scanner.position);
    if (!/[0-9]/.test(literal)) {
      throw this.error('malformed_literal', `Malformed number '${literal}'`, start);
    }
    const units = this.parseOptionalUnits();
    return this.construct(
      () => (real ? new RealValue(literal, units) : new IntegerValue(literal, units)),
      start
    );
  }

  private parseBasedInteger(sign: string, radix: string, start: number): BasedIntegerValue {
    this.scanner.advance();
    const digitsStart = this.scanner.position;
    if (isSign(this.scanner.peek())) {
      if (sign !== '') {
        throw this.error('malformed_literal', 'Based integer has two signs', start);
      }
      this.scanner.advance();
    }
    this.scanner.readWhile(isAlphanumeric);
    const digits = sign + this.scanner.text(digitsStart, this.scanner.position);
    if (!this.scanner.matchByte(CHAR.HASH)) {
      throw this.unexpected("'#'");
    }
    const units = this.parseOptionalUnits();
    return this.construct(() => new BasedIntegerValue(Number(radix), digits, units), start);
  }

  private parseDate(year: string, start: number): DateValue | DateTimeValue {
    this.scanner.advance();
    const second = this.scanner.readWhile(isDigit);
    let month: string | undefined;
    let day = second;
    if (this.scanner.peek() === CHAR.MINUS && isDigit(this.scanner.peek(1))) {
      this.scanner.advance();
      month = second;
      day = this.scanner.readWhile(isDigit);
    }
    const date = this.construct(
      () => new DateValue(Number(year), month === undefined ? undefined : Number(month), Number(day)),
      start
    );

    const separator = this.scanner.peek();
    if ((separator === 0x54 || separator === 0x74) && isDigit(this.scanner.peek(1))) {
      this.scanner.advance();
      const hour = this.scanner.readWhile(isDigit);
      if (this.scanner.peek() !== CHAR.COLON) {
        throw this.unexpected("':'");
      }
      const time = this.parseTime(hour, start);
      return new DateTimeValue(date, time);
    }
    return date;
  }

  /**
   * The part of a time after its hour digits: `:MM[:SS[.fff]]` followed by
   * `Z` or a `±HH[:MM]` zone offset.
   */
  private parseTime(hour: string, start: number): TimeValue {
    this.scanner.advance();
    const minute = this.scanner.readWhile(isDigit);
    if (minute === '') {
      throw this.unexpected('minutes');
    }

    let second: string | undefined;
    if (
      this.scanner.peek() === CHAR.COLON &&
      (isDigit(this.scanner.peek(1)) || this.scanner.peek(1) === CHAR.DOT)
    ) {
      this.scanner.advance();
      const secondStart = this.scanner.position;
      this.scanner.readWhile(isDigit);
      if (this.scanner.matchByte(CHAR.DOT)) {
        this.scanner.readWhile(isDigit);
      }
      second = this.scanner.text(secondStart, this.scanner.position);
      if (!/[0-9]/.test(second)) {
        throw this.error('malformed_literal', `Malformed seconds '${second}'`, secondStart);
      }
    }

    let utc = false;
    let zoneHour: string | undefined;
    let zoneMinute: string | undefined;
    if (this.scanner.matchLetter('Z')) {
      utc = true;
    } else if (isSign(this.scanner.peek()) && isDigit(this.scanner.peek(1))) {
      const zoneStart = this.scanner.position;
      this.scanner.advance();
      this.scanner.readWhile(isDigit);
      zoneHour = this.scanner.text(zoneStart, this.scanner.position);
      if (this.scanner.peek() === CHAR.COLON && isDigit(this.scanner.peek(1))) {
        this.scanner.advance();
        zoneMinute = this.scanner.readWhile(isDigit);
      }
    }

    return this.construct(
      () =>
        new TimeValue({
          hour: Number(hour),
          minute: Number(minute),
          second: second === undefined ? undefined : Number(second),
          utc,
          zoneHour: zoneHour === undefined ? undefined : Number(zoneHour),
          zoneMinute: zoneMinute === undefined ? undefined : Number(zoneMinute),
        }),
      start
    );
  }

  /**
   * A `<units>` suffix, if one follows. Whitespace inside the brackets is
   * ignored.
   */
  private parseOptionalUnits(): Units | undefined {
    const before = this.scanner.position;
    this.skip();
    const start = this.scanner.position;
    if (!this.scanner.matchByte(CHAR.LESS_THAN)) {
      this.scanner.seek(before);
      return undefined;
    }
    const close = this.scanner.indexOf(CHAR.GREATER_THAN);
    if (close === -1) {
      throw this.error('unexpected_end', 'Unterminated units expression', start);
    }
    const expression = this.scanner.text(this.scanner.position, close).replace(/\s+/g, '');
    this.scanner.seek(close + 1);
    return this.construct(() => new Units(expression), start);
  }

  private identifier(parts: IdentifierParts, start: number): Identifier {
    return this.construct(() => new Identifier(parts), start);
  }

  private expectWord(what: string): string {
    this.skip();
    const word = this.scanner.readWord();
    if (word === undefined) {
      throw this.unexpected(what);
    }
    return word;
  }

  private expectEquals(): void {
    this.skip();
    if (!this.scanner.matchByte(CHAR.EQUALS)) {
      throw this.unexpected("'='");
    }
  }

  private skip(): void {
    if (!this.scanner.skipInsignificant()) {
      throw this.error('expected_token', "Comment is not closed by '*/' on its line", this.scanner.position);
    }
  }

  /**
   * Runs a model constructor, turning its ValidationError into a ParseError
   * pointing at the literal that was being built.
   */
  private construct<T>(build: () => T, start: number): T {
    try {
      return build();
    } catch (error) {
      throw this.wrap(error, 'malformed_literal', start);
    }
  }

  private wrap(error: unknown, code: ParseErrorCode, start: number): unknown {
    if (!(error instanceof ValidationError)) {
      return error;
    }
    return this.error(code, `${error.message} in '${this.literal(start)}'`, start, error);
  }

  /** Error for a missing token at the cursor. */
  private unexpected(expected: string): ParseError {
    const position = this.scanner.position;
    if (this.scanner.atEnd()) {
      return this.error('unexpected_end', `Unexpected end of input, expected ${expected}`, position);
    }
    return this.error(
      'expected_token',
      `Expected ${expected} instead of '${this.scanner.lexemeAt(position)}'`,
      position
    );
  }

  /** Source text from `start` to the cursor, shortened for messages. */
  private literal(start: number): string {
    const end = Math.max(start + 1, this.scanner.position);
    const text = this.scanner.text(start, Math.min(end, start + MAX_LITERAL_LENGTH));
    return end - start > MAX_LITERAL_LENGTH ? `${text}...` : text;
  }

  private error(code: ParseErrorCode, message: string, position: number, cause?: Error): ParseError {
    const { line, column } = this.scanner.locate(position);
    const lexeme = code === 'malformed_literal' ? this.literal(position) : this.scanner.lexemeAt(position);
    return new ParseError(message, { code, lexeme, position, line, column }, cause);
  }
}

function toByteSource(input: ByteSource | string): ByteSource {
  return typeof input === 'string' ? new TextEncoder().encode(input) : input;
}

/**
 * Parses the label at the start of `input`.
 *
 * @param input - Bytes (or text) beginning with a label; anything after the
 * `END` statement is ignored.
 * @param options - Parse options.
 * @returns The parsed label.
 * @throws ParseError if `input` does not begin with a valid label.
 *
 * @example
 * ```typescript
 * const label = parse('PDS_VERSION_ID = PDS3\r\nEND\r\n');
 * label.getValue('pds_version_id')?.toString(); // 'PDS3'
 * ```
 */
export function parse(input: ByteSource | string, options: ParseOptions = {}): Label {
  const result = safeParse(input, options);
  if (!result.success) {
    throw result.error;
  }
  return result.label;
}

/**
 * Parses the label at the start of `input` without throwing on malformed
 * input.
 *
 * @param input - Bytes (or text) beginning with a label.
 * @param options - Parse options.
 * @returns The label and the offset where it ends, or the ParseError.
 */
export function safeParse(input: ByteSource | string, options: ParseOptions = {}): ParseResult {
  const log = options.logger ?? defaultLogger;
  const source = toByteSource(input);
  const parser = new LabelParser(source);
  try {
    const label = parser.parseLabel();
    log.debug('label_parsed', { statements: label.length, end: parser.position, bytes: source.length });
    return { success: true, label, end: parser.position };
  } catch (error) {
    if (!(error instanceof ParseError)) {
      throw error;
    }
    log.debug('label_parse_failed', {
      code: error.code,
      lexeme: error.lexeme,
      line: error.line,
      column: error.column,
    });
    return { success: false, error };
  }
}
