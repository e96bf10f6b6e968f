/**
 * pds-label
 *
 * Reads, edits and writes Planetary Data System (ODL) labels: the
 * `KEY = value` text headers that describe data products.
 *
 * @example
 * ```typescript
 * import { parse, renderToString, IntegerValue } from 'pds-label';
 *
 * const label = parse(bytes);
 * label.set('RECORD_BYTES', new IntegerValue(2048));
 * renderToString(label);
 * ```
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export { ParseError, SerializationError, ValidationError } from './errors/index.js';
export type { ParseErrorCode, ParseErrorDetails } from './errors/index.js';

export { Scanner } from './scanner/index.js';
export type { ByteSource, SourceLocation } from './scanner/index.js';

export {
  BasedIntegerValue,
  DateTimeValue,
  DateValue,
  Identifier,
  IdentifierValue,
  IntegerValue,
  RESERVED_WORDS,
  RealValue,
  Sequence1D,
  Sequence2D,
  SetValue,
  SymbolValue,
  TextValue,
  TimeValue,
  Units,
  cloneValue,
  daysInMonth,
  formatValue,
  isIdentifierWord,
  isLeapYear,
  isScalar,
  isSetMember,
  unitsEqual,
  valuesEqual,
} from './values/index.js';
export type {
  IdentifierParts,
  NumericValue,
  Scalar,
  ScalarKind,
  SetMember,
  TemporalValue,
  TimeFields,
  TimeZoneKind,
  Value,
  ValueKind,
} from './values/index.js';

export {
  Attribute,
  Group,
  ObjectStatement,
  Statements,
  cloneStatement,
  statementsEqual,
} from './statements/index.js';
export type {
  ContainerKind,
  ContainerPolicy,
  GroupStatements,
  Label,
  ObjectStatements,
  Statement,
  StatementKind,
  StatementValue,
} from './statements/index.js';

export { parse, safeParse } from './parser/index.js';
export type { ParseOptions, ParseResult } from './parser/index.js';

export { render, renderToString } from './serializer/index.js';
export type { RenderCallOptions } from './serializer/index.js';

export {
  ConfigParseError,
  ConfigValidationError,
  DEFAULT_RENDER_OPTIONS,
  EnvCoercionError,
  loadRenderOptions,
  parseConfig,
  validateRenderOptions,
} from './config/index.js';
export type { Config, LineEnding, RenderOptions } from './config/index.js';

export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
