/**
 * Error taxonomy for label parsing, model validation and serialization.
 *
 * Three failure families are kept apart so that callers can tell malformed
 * external input ({@link ParseError}) from invalid API usage
 * ({@link ValidationError}) and from a tree that cannot be written out
 * ({@link SerializationError}).
 *
 * @packageDocumentation
 */

/**
 * Category of a parse failure.
 *
 * - `unexpected_end`: the input ran out before the `END` statement.
 * - `expected_token`: a required token (such as `=`) was not found.
 * - `malformed_literal`: a literal was recognised but its contents are invalid
 *   (bad digit for a radix, impossible date, non-ASCII text).
 * - `mismatched_block`: a block was closed by the wrong terminator or name.
 * - `invalid_statement`: a statement is not allowed where it appears.
 */
export type ParseErrorCode =
  | 'unexpected_end'
  | 'expected_token'
  | 'malformed_literal'
  | 'mismatched_block'
  | 'invalid_statement';

/**
 * Location details attached to a {@link ParseError}.
 */
export interface ParseErrorDetails {
  /** Failure category. */
  readonly code: ParseErrorCode;
  /** Text of the offending token, empty at end of input. */
  readonly lexeme: string;
  /** Byte offset of the offending token. */
  readonly position: number;
  /** 1-based line of the offending token. */
  readonly line: number;
  /** 1-based column of the offending token. */
  readonly column: number;
}

/**
 * Error raised when a byte range does not start with a valid label.
 */
export class ParseError extends Error {
  /** Failure category. */
  public readonly code: ParseErrorCode;
  /** Text of the offending token, empty at end of input. */
  public readonly lexeme: string;
  /** Byte offset of the offending token. */
  public readonly position: number;
  /** 1-based line of the offending token. */
  public readonly line: number;
  /** 1-based column of the offending token. */
  public readonly column: number;
  /** The model error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ParseError.
   *
   * @param message - Descriptive error message.
   * @param details - Where and why parsing stopped.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, details: ParseErrorDetails, cause?: Error) {
    super(`${message} (line ${String(details.line)}, column ${String(details.column)})`);
    this.name = 'ParseError';
    this.code = details.code;
    this.lexeme = details.lexeme;
    this.position = details.position;
    this.line = details.line;
    this.column = details.column;
    this.cause = cause;
  }
}

/**
 * Error raised when a value, identifier or statement does not meet its
 * syntactic constraints, or a statement kind is not allowed in a container.
 */
export class ValidationError extends Error {
  /** What was being validated, e.g. `identifier` or `month`. */
  public readonly subject: string;
  /** The rejected input, rendered as text. */
  public readonly value: string;

  /**
   * Creates a new ValidationError.
   *
   * @param subject - What was being validated.
   * @param value - The rejected input.
   * @param message - Optional detailed error message.
   */
  constructor(subject: string, value: string, message?: string) {
    super(message ?? `Invalid ${subject}: '${value}'`);
    this.name = 'ValidationError';
    this.subject = subject;
    this.value = value;
  }
}

/**
 * Error raised when a tree cannot be rendered, which only happens for a
 * sequence left empty after mutation.
 */
export class SerializationError extends Error {
  /** Identifier of the statement being rendered, when known. */
  public readonly identifier: string | undefined;

  /**
   * Creates a new SerializationError.
   *
   * @param message - Descriptive error message.
   * @param identifier - Identifier of the statement being rendered.
   */
  constructor(message: string, identifier?: string) {
    super(identifier === undefined ? message : `${message} in '${identifier}'`);
    this.name = 'SerializationError';
    this.identifier = identifier;
  }
}
