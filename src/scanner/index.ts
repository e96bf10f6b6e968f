/**
 * Byte-level scanning primitives used by the label parser.
 *
 * @packageDocumentation
 */

export { Scanner } from './scanner.js';
export type { ByteSource, SourceLocation } from './scanner.js';
export {
  CHAR,
  isAlphanumeric,
  isDigit,
  isLetter,
  isLineBreak,
  isPrintableAscii,
  isSign,
  isWhitespace,
  isWordChar,
} from './chars.js';
