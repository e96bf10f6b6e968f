/**
 * Error types shared by the parser, the document model and the serializer.
 *
 * @packageDocumentation
 */

export { ParseError, SerializationError, ValidationError } from './errors.js';
export type { ParseErrorCode, ParseErrorDetails } from './errors.js';
